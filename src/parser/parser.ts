import type { ParserEventSink, ParserState } from "./types";
import { REPLACEMENT_CHAR, UTF8_PENDING, UTF8_REPROCESS, Utf8Decoder } from "./utf8";

const ESC = 0x1b;
const BEL = 0x07;
const CAN = 0x18;
const SUB = 0x1a;
const DEL = 0x7f;
const SEMICOLON = 0x3b;

const MAX_PARAMS = 32;
const MAX_INTERMEDIATES = 2;
const MAX_PARAM_VALUE = 0xffff;
const MAX_OSC_BYTES = 4096;
const MAX_OSC_PARAMS = 16;

function isParamByte(byte: number): boolean {
  return (byte >= 0x30 && byte <= 0x39) || byte === SEMICOLON;
}

function isIntermediateByte(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x2f;
}

function isPrivateMarker(byte: number): boolean {
  return byte >= 0x3c && byte <= 0x3f;
}

function isFinalByte(byte: number): boolean {
  return byte >= 0x40 && byte <= 0x7e;
}

/** C0 controls other than the ones handled in every state (CAN, SUB, ESC). */
function isExecuteByte(byte: number): boolean {
  return byte < 0x20 && byte !== CAN && byte !== SUB && byte !== ESC;
}

/**
 * Byte-level VT500-style control sequence decoder.
 *
 * All state lives on the instance, so input may be split at any byte
 * (including inside an escape sequence or a UTF-8 sequence) and the event
 * stream is the same as for the concatenated input.
 */
export class Parser {
  private state: ParserState = "ground";
  private params: number[] = [];
  private currentParam = 0;
  private paramStarted = false;
  private intermediates = "";
  private ignoring = false;
  private oscBytes: number[] = [];
  private readonly utf8 = new Utf8Decoder();

  /** Current state, exposed for diagnostics and tests. */
  get currentState(): ParserState {
    return this.state;
  }

  /** Consume bytes in order, emitting events to `sink`. Never throws on input. */
  advance(bytes: Uint8Array, sink: ParserEventSink): void {
    for (let i = 0; i < bytes.length; i += 1) {
      this.advanceByte(bytes[i], sink);
    }
  }

  private advanceByte(byte: number, sink: ParserEventSink): void {
    if (this.state === "ground") {
      this.advanceGround(byte, sink);
      return;
    }

    if (byte === CAN || byte === SUB) {
      if (this.state === "dcs-passthrough") sink({ type: "dcs-unhook" });
      sink({ type: "execute", byte });
      this.state = "ground";
      return;
    }

    if (byte === ESC) {
      if (this.state === "osc-string") this.dispatchOsc(false, sink);
      if (this.state === "dcs-passthrough") sink({ type: "dcs-unhook" });
      this.clear();
      this.state = "escape";
      return;
    }

    switch (this.state) {
      case "escape":
        this.advanceEscape(byte, sink);
        return;
      case "escape-intermediate":
        if (isExecuteByte(byte)) sink({ type: "execute", byte });
        else if (isIntermediateByte(byte)) this.collect(byte);
        else if (byte >= 0x30 && byte <= 0x7e) this.dispatchEsc(byte, sink);
        return;
      case "csi-entry":
        if (isExecuteByte(byte)) sink({ type: "execute", byte });
        else if (isIntermediateByte(byte)) {
          this.collect(byte);
          this.state = "csi-intermediate";
        } else if (isParamByte(byte)) {
          this.param(byte);
          this.state = "csi-param";
        } else if (isPrivateMarker(byte)) {
          this.collect(byte);
          this.state = "csi-param";
        } else if (byte === 0x3a) this.state = "csi-ignore";
        else if (isFinalByte(byte)) this.dispatchCsi(byte, sink);
        return;
      case "csi-param":
        if (isExecuteByte(byte)) sink({ type: "execute", byte });
        else if (isParamByte(byte)) this.param(byte);
        else if (byte === 0x3a || isPrivateMarker(byte)) this.state = "csi-ignore";
        else if (isIntermediateByte(byte)) {
          this.collect(byte);
          this.state = "csi-intermediate";
        } else if (isFinalByte(byte)) this.dispatchCsi(byte, sink);
        return;
      case "csi-intermediate":
        if (isExecuteByte(byte)) sink({ type: "execute", byte });
        else if (isIntermediateByte(byte)) this.collect(byte);
        else if (byte >= 0x30 && byte <= 0x3f) this.state = "csi-ignore";
        else if (isFinalByte(byte)) this.dispatchCsi(byte, sink);
        return;
      case "csi-ignore":
        if (isExecuteByte(byte)) sink({ type: "execute", byte });
        else if (isFinalByte(byte)) {
          this.ignoring = true;
          this.dispatchCsi(byte, sink);
        }
        return;
      case "dcs-entry":
        if (isIntermediateByte(byte)) {
          this.collect(byte);
          this.state = "dcs-intermediate";
        } else if (isParamByte(byte)) {
          this.param(byte);
          this.state = "dcs-param";
        } else if (isPrivateMarker(byte)) {
          this.collect(byte);
          this.state = "dcs-param";
        } else if (byte === 0x3a) this.state = "dcs-ignore";
        else if (isFinalByte(byte)) this.hook(byte, sink);
        return;
      case "dcs-param":
        if (isParamByte(byte)) this.param(byte);
        else if (byte === 0x3a || isPrivateMarker(byte)) this.state = "dcs-ignore";
        else if (isIntermediateByte(byte)) {
          this.collect(byte);
          this.state = "dcs-intermediate";
        } else if (isFinalByte(byte)) this.hook(byte, sink);
        return;
      case "dcs-intermediate":
        if (isIntermediateByte(byte)) this.collect(byte);
        else if (byte >= 0x30 && byte <= 0x3f) this.state = "dcs-ignore";
        else if (isFinalByte(byte)) this.hook(byte, sink);
        return;
      case "dcs-passthrough":
        if (byte !== DEL) sink({ type: "dcs-put", byte });
        return;
      case "osc-string":
        if (byte === BEL) this.dispatchOsc(true, sink);
        else if (byte >= 0x20) this.oscPut(byte);
        return;
      case "dcs-ignore":
      case "sos-pm-apc-string":
        return;
    }
  }

  private advanceGround(byte: number, sink: ParserEventSink): void {
    if (this.utf8.pending || byte >= 0x80) {
      const result = this.utf8.push(byte);
      if (result === UTF8_PENDING) return;
      if (result === UTF8_REPROCESS) {
        sink({ type: "print", char: REPLACEMENT_CHAR });
        this.advanceByte(byte, sink);
        return;
      }
      sink({ type: "print", char: String.fromCodePoint(result) });
      return;
    }
    if (byte === ESC) {
      this.clear();
      this.state = "escape";
      return;
    }
    if (byte < 0x20) {
      sink({ type: "execute", byte });
      return;
    }
    if (byte === DEL) return;
    sink({ type: "print", char: String.fromCharCode(byte) });
  }

  private advanceEscape(byte: number, sink: ParserEventSink): void {
    if (isExecuteByte(byte)) {
      sink({ type: "execute", byte });
      return;
    }
    if (isIntermediateByte(byte)) {
      this.collect(byte);
      this.state = "escape-intermediate";
      return;
    }
    switch (byte) {
      case 0x5b: // [
        this.clear();
        this.state = "csi-entry";
        return;
      case 0x5d: // ]
        this.oscBytes = [];
        this.state = "osc-string";
        return;
      case 0x50: // P
        this.clear();
        this.state = "dcs-entry";
        return;
      case 0x58: // X
      case 0x5e: // ^
      case 0x5f: // _
        this.state = "sos-pm-apc-string";
        return;
    }
    if (byte >= 0x30 && byte <= 0x7e) this.dispatchEsc(byte, sink);
  }

  private clear(): void {
    this.params = [];
    this.currentParam = 0;
    this.paramStarted = false;
    this.intermediates = "";
    this.ignoring = false;
  }

  private collect(byte: number): void {
    if (this.intermediates.length >= MAX_INTERMEDIATES) {
      this.ignoring = true;
      return;
    }
    this.intermediates += String.fromCharCode(byte);
  }

  private param(byte: number): void {
    if (byte === SEMICOLON) {
      this.finishParam();
      this.paramStarted = true;
      return;
    }
    this.currentParam = Math.min(MAX_PARAM_VALUE, this.currentParam * 10 + (byte - 0x30));
    this.paramStarted = true;
  }

  private finishParam(): void {
    if (this.params.length >= MAX_PARAMS) {
      this.ignoring = true;
    } else {
      this.params.push(this.currentParam);
    }
    this.currentParam = 0;
    this.paramStarted = false;
  }

  private dispatchCsi(final: number, sink: ParserEventSink): void {
    if (this.paramStarted) this.finishParam();
    sink({
      type: "csi",
      params: this.params,
      intermediates: this.intermediates,
      final: String.fromCharCode(final),
      ignore: this.ignoring,
    });
    this.state = "ground";
  }

  private dispatchEsc(final: number, sink: ParserEventSink): void {
    sink({
      type: "esc",
      intermediates: this.intermediates,
      final: String.fromCharCode(final),
      ignore: this.ignoring,
    });
    this.state = "ground";
  }

  private hook(final: number, sink: ParserEventSink): void {
    if (this.paramStarted) this.finishParam();
    sink({
      type: "dcs-hook",
      params: this.params,
      intermediates: this.intermediates,
      final: String.fromCharCode(final),
      ignore: this.ignoring,
    });
    this.state = "dcs-passthrough";
  }

  private oscPut(byte: number): void {
    // Payload past the limit is dropped; the command still dispatches.
    if (this.oscBytes.length < MAX_OSC_BYTES) this.oscBytes.push(byte);
  }

  private dispatchOsc(bellTerminated: boolean, sink: ParserEventSink): void {
    const params: Uint8Array[] = [];
    let start = 0;
    for (let i = 0; i < this.oscBytes.length; i += 1) {
      if (this.oscBytes[i] === SEMICOLON && params.length < MAX_OSC_PARAMS - 1) {
        params.push(Uint8Array.from(this.oscBytes.slice(start, i)));
        start = i + 1;
      }
    }
    params.push(Uint8Array.from(this.oscBytes.slice(start)));
    sink({ type: "osc", params, bellTerminated });
    this.oscBytes = [];
    this.state = "ground";
  }
}
