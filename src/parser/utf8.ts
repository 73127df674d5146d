export const REPLACEMENT_CHAR = "�";

/** The decoder needs more bytes before it can produce a scalar value. */
export const UTF8_PENDING = -1;
/** The byte ended a bad sequence; emit U+FFFD, then feed the byte again. */
export const UTF8_REPROCESS = -2;

/**
 * Incremental UTF-8 decoder that keeps partial sequences across calls.
 * Follows the WHATWG decoding algorithm, so overlong forms and surrogates
 * are rejected the same way TextDecoder rejects them.
 */
export class Utf8Decoder {
  private codepoint = 0;
  private needed = 0;
  private seen = 0;
  private lower = 0x80;
  private upper = 0xbf;

  /** Whether a multi-byte sequence is in progress. */
  get pending(): boolean {
    return this.needed > 0;
  }

  /**
   * Feed one byte. Returns a code point, {@link UTF8_PENDING} or
   * {@link UTF8_REPROCESS}.
   */
  push(byte: number): number {
    if (this.needed === 0) {
      if (byte <= 0x7f) return byte;
      if (byte >= 0xc2 && byte <= 0xdf) {
        this.needed = 1;
        this.codepoint = byte & 0x1f;
      } else if (byte >= 0xe0 && byte <= 0xef) {
        if (byte === 0xe0) this.lower = 0xa0;
        if (byte === 0xed) this.upper = 0x9f;
        this.needed = 2;
        this.codepoint = byte & 0x0f;
      } else if (byte >= 0xf0 && byte <= 0xf4) {
        if (byte === 0xf0) this.lower = 0x90;
        if (byte === 0xf4) this.upper = 0x8f;
        this.needed = 3;
        this.codepoint = byte & 0x07;
      } else {
        return 0xfffd;
      }
      return UTF8_PENDING;
    }

    if (byte < this.lower || byte > this.upper) {
      this.reset();
      return UTF8_REPROCESS;
    }

    this.lower = 0x80;
    this.upper = 0xbf;
    this.codepoint = (this.codepoint << 6) | (byte & 0x3f);
    this.seen += 1;
    if (this.seen < this.needed) return UTF8_PENDING;
    const codepoint = this.codepoint;
    this.reset();
    return codepoint;
  }

  reset(): void {
    this.codepoint = 0;
    this.needed = 0;
    this.seen = 0;
    this.lower = 0x80;
    this.upper = 0xbf;
  }
}
