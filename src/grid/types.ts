/**
 * Visible grid size plus the cell metrics it was derived from.
 */
export type GridState = CellMetrics & {
  /** Number of columns in the terminal grid. */
  cols: number;
  /** Number of rows in the terminal grid. */
  rows: number;
};

/**
 * Per-cell pixel metrics. Fixed for a given font and size; window resizes
 * only change how many cells fit.
 */
export type CellMetrics = {
  /** Cell width in pixels. */
  cellW: number;
  /** Cell height in pixels. */
  cellH: number;
  /** Resolved font size in pixels. */
  fontSizePx: number;
  /** Font units to pixels. */
  scale: number;
  /** Unrounded line height in pixels. */
  lineHeight: number;
  /** Vertical offset from cell top to text baseline in pixels. */
  baselineOffset: number;
  /** Vertical padding added above the line inside a cell. */
  yPad: number;
};

/**
 * Grid configuration for font sizing.
 */
export type GridConfig = {
  /** Base font size in pixels. */
  fontSize: number;
  /**
   * How fontSize is interpreted by the rasterizer.
   * - height: pixel height of the line
   * - width: pixel width of a single cell
   * - upem: units-per-em
   */
  sizeMode: "height" | "width" | "upem";
};

/** Result of applying a new pixel size to the grid. */
export type GridResize = {
  changed: boolean;
  cols: number;
  rows: number;
};
