/**
 * Events emitted by the VT decoder. One dispatch function consumes them, see
 * `ScreenBuffer.dispatch`.
 */
export type ParserEvent =
  | PrintEvent
  | ExecuteEvent
  | CsiEvent
  | EscEvent
  | OscEvent
  | DcsHookEvent
  | DcsPutEvent
  | DcsUnhookEvent;

/** A printable Unicode scalar value. */
export type PrintEvent = { type: "print"; char: string };

/** A C0 control byte (LF, CR, BS, HT, BEL, ...). */
export type ExecuteEvent = { type: "execute"; byte: number };

/**
 * A complete control sequence `ESC [ <params> <intermediates> <final>`.
 * Private markers (`<`, `=`, `>`, `?`) are collected into `intermediates`.
 */
export type CsiEvent = {
  type: "csi";
  /** Numeric parameters; an empty parameter reads as 0. */
  params: number[];
  intermediates: string;
  final: string;
  /** Set when the sequence overflowed parser limits or was malformed. */
  ignore: boolean;
};

/** A complete escape sequence `ESC <intermediates> <final>`. */
export type EscEvent = {
  type: "esc";
  intermediates: string;
  final: string;
  ignore: boolean;
};

/** An operating system command `ESC ] ... (BEL | ESC \)`. */
export type OscEvent = {
  type: "osc";
  /** Raw payload split at `;`. */
  params: Uint8Array[];
  /** Whether BEL (rather than ST) ended the string. */
  bellTerminated: boolean;
};

/** Start of a device control string. */
export type DcsHookEvent = {
  type: "dcs-hook";
  params: number[];
  intermediates: string;
  final: string;
  ignore: boolean;
};

/** One payload byte of a device control string. */
export type DcsPutEvent = { type: "dcs-put"; byte: number };

/** End of a device control string. */
export type DcsUnhookEvent = { type: "dcs-unhook" };

/** Receiver of decoder events. */
export type ParserEventSink = (event: ParserEvent) => void;

/**
 * Decoder states, after the DEC VT500 state diagram.
 */
export type ParserState =
  | "ground"
  | "escape"
  | "escape-intermediate"
  | "csi-entry"
  | "csi-param"
  | "csi-intermediate"
  | "csi-ignore"
  | "dcs-entry"
  | "dcs-param"
  | "dcs-intermediate"
  | "dcs-passthrough"
  | "dcs-ignore"
  | "osc-string"
  | "sos-pm-apc-string";
