import type { CellMetrics, GridConfig, GridResize, GridState } from "./types";

/**
 * Font metrics interface used to measure glyph dimensions and compute cell sizes.
 */
export type FontMetricsProvider = {
  /** Return the scale factor for a given pixel size and sizing mode. */
  scaleForSize(sizePx: number, sizeMode: string): number;
  /** Look up the glyph ID for a character, or null/undefined if missing. */
  glyphIdForChar(char: string): number | undefined | null;
  /** Return the advance width of a glyph in font units. */
  advanceWidth(glyphId: number): number;
  /** Font ascender in font units. */
  readonly ascender: number;
  /** Font descender in font units (typically negative). */
  readonly descender?: number;
  /** Explicit font height in font units, if available. */
  readonly height?: number;
  /** Units per em of the font. */
  readonly upem: number;
};

/** Resolve the font height in font units, falling back to ascender-descender or upem. */
export function fontHeightUnits(font: FontMetricsProvider): number {
  const height = font.height;
  if (height !== undefined && Number.isFinite(height) && height > 0) return height;
  const fallback = font.ascender - (font.descender ?? 0);
  if (Number.isFinite(fallback) && fallback > 0) return fallback;
  return font.upem || 1000;
}

/**
 * Compute cell width, height, and baseline from font metrics. The cell is
 * as wide as "M" and as tall as the font's line height.
 */
export function computeCellMetrics(
  font: FontMetricsProvider,
  config: GridConfig,
  dpr = 1,
): CellMetrics {
  const fontSizePx = Math.max(1, Math.round(config.fontSize * dpr));
  const scale = font.scaleForSize(fontSizePx, config.sizeMode);
  const glyphId = font.glyphIdForChar("M");
  const advanceUnits =
    glyphId !== undefined && glyphId !== null ? font.advanceWidth(glyphId) : font.upem / 2;
  const cellW = Math.max(1, Math.round(advanceUnits * scale));
  const lineHeight = fontHeightUnits(font) * scale;
  const cellH = Math.max(1, Math.round(lineHeight));
  const baselineOffset = font.ascender * scale;
  const yPad = Math.max(0, (cellH - lineHeight) * 0.5);

  return { cellW, cellH, fontSizePx, scale, lineHeight, baselineOffset, yPad };
}

/**
 * Metrics for a fixed cell size, used when no font is loaded. The baseline
 * sits at 80% of the cell height.
 */
export function fixedCellMetrics(cellW: number, cellH: number, fontSizePx: number): CellMetrics {
  const w = Math.max(1, Math.round(cellW));
  const h = Math.max(1, Math.round(cellH));
  return {
    cellW: w,
    cellH: h,
    fontSizePx,
    scale: 1,
    lineHeight: h,
    baselineOffset: h * 0.8,
    yPad: 0,
  };
}

/** Number of whole cells that fit into a pixel area, at least one each way. */
export function computeGridSize(
  metrics: Pick<CellMetrics, "cellW" | "cellH">,
  widthPx: number,
  heightPx: number,
): { cols: number; rows: number } {
  const cols = Math.max(1, Math.floor(widthPx / metrics.cellW));
  const rows = Math.max(1, Math.floor(heightPx / metrics.cellH));
  return {
    cols: Number.isFinite(cols) ? cols : 1,
    rows: Number.isFinite(rows) ? rows : 1,
  };
}

/** Create a grid state for the given metrics with a single cell. */
export function createGridState(metrics: CellMetrics): GridState {
  return { ...metrics, cols: 1, rows: 1 };
}

/**
 * Recompute grid dimensions from cell metrics and a new pixel size.
 * Mutates state in place and returns whether cols/rows/metrics changed.
 */
export function updateGridState(
  state: GridState,
  metrics: CellMetrics,
  widthPx: number,
  heightPx: number,
): GridResize {
  if (!Number.isFinite(widthPx) || !Number.isFinite(heightPx)) {
    return { changed: false, cols: state.cols, rows: state.rows };
  }
  const { cols, rows } = computeGridSize(metrics, widthPx, heightPx);

  const changed =
    cols !== state.cols ||
    rows !== state.rows ||
    metrics.fontSizePx !== state.fontSizePx ||
    metrics.cellW !== state.cellW ||
    metrics.cellH !== state.cellH;

  Object.assign(state, metrics, { cols, rows });

  return { changed, cols, rows };
}
