import type { NamedKey } from "./types";

const textEncoder = new TextEncoder();

/** Byte sequences for the named keys. */
export const sequences: Readonly<Record<NamedKey, string>> = Object.freeze({
  Backspace: "\x08",
  Enter: "\r",
  Space: " ",
  Tab: "\t",
  Escape: "\x1b",
  ArrowUp: "\x1b[A",
  ArrowDown: "\x1b[B",
  ArrowRight: "\x1b[C",
  ArrowLeft: "\x1b[D",
});

export function isNamedKey(key: string): key is NamedKey {
  return Object.prototype.hasOwnProperty.call(sequences, key);
}

/** UTF-8 encode text for the PTY. */
export function encodeText(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * Map a logical key to the bytes the PTY expects. Named keys use their fixed
 * sequence, anything else non-empty is sent as its UTF-8 text. Other named
 * keys the window system reports (Shift, F1, ...) have no encoding.
 */
export function encodeKey(key: string): Uint8Array | null {
  if (isNamedKey(key)) return textEncoder.encode(sequences[key]);
  if (!key) return null;
  // Multi-character names without a mapping ("Shift", "F5") are not text.
  if (Array.from(key).length > 1 && /^[A-Z][A-Za-z0-9]+$/.test(key)) return null;
  return textEncoder.encode(key);
}
