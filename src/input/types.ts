/**
 * Keys with a fixed byte encoding. Names follow the window system's
 * logical key names.
 */
export type NamedKey =
  | "Backspace"
  | "Enter"
  | "Space"
  | "Tab"
  | "Escape"
  | "ArrowUp"
  | "ArrowDown"
  | "ArrowRight"
  | "ArrowLeft";

/** Anything that can move the viewport, usually a `ScreenBuffer`. */
export type ScrollTarget = {
  scroll: (delta: number) => void;
};

/**
 * Input handler construction options.
 */
export type InputHandlerOptions = {
  /** Sink for encoded key bytes, usually the PTY transport. */
  sendInput: (data: Uint8Array) => void;
  /** Viewport moved by wheel events. */
  scrollTarget?: ScrollTarget;
  /** Largest row count one wheel event may scroll (default 5). */
  maxScrollStep?: number;
};

/**
 * Keyboard and wheel entry points for the window system.
 */
export type InputHandler = {
  /**
   * Encode and send a key. `key` is a named key or printable text.
   * Returns false for keys without an encoding.
   */
  handleKey: (key: string) => boolean;
  /** Send text verbatim as UTF-8 (paste, IME commit). */
  handleText: (text: string) => void;
  /**
   * Apply a wheel delta. Positive deltas scroll towards older rows.
   * Returns the number of rows applied.
   */
  handleWheel: (delta: number) => number;
};
