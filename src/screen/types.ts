/** Index into the 8-color ANSI palette (0 black ... 7 white). */
export type AnsiColor = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * One grid position. `char` holds a single Unicode scalar, or
 * `EMPTY_CHAR` for a cell that has never been written or was erased.
 */
export type Cell = {
  char: string;
  /** Foreground palette index, or null for the default foreground. */
  fg: AnsiColor | null;
  /** Background palette index, or null for the default background. */
  bg: AnsiColor | null;
  bold: boolean;
  underline: boolean;
};

/** Attributes applied to newly printed cells. */
export type Pen = Omit<Cell, "char">;

/** One scrollback line. Grows on write, erased cells are reset in place. */
export type Row = Cell[];

/** Window over the scrollback presented to the renderer. */
export type Viewport = {
  /** Scrollback index of the first visible row. */
  topRow: number;
  /** Columns. */
  width: number;
  /** Rows. */
  height: number;
};

/** Cursor position relative to the viewport (0-based). */
export type Cursor = {
  x: number;
  y: number;
};

/** Scroll region recorded from `CSI top ; bottom r` (1-based, inclusive). */
export type ScrollRegion = {
  top: number;
  bottom: number;
};

/** Entry yielded by the grid query. */
export type VisibleCell = {
  row: number;
  col: number;
  cell: Readonly<Cell>;
};

export type ScreenStats = {
  /** Rows stored in the scrollback. */
  rows: number;
  topRow: number;
  cursor: Cursor;
};

export type ScreenBufferOptions = {
  cols: number;
  rows: number;
  /** Tab stop interval in columns (default 8). */
  tabWidth?: number;
  /** Called for BEL. */
  onBell?: () => void;
};
