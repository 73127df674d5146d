/**
 * Single-channel coverage bitmap with tightly described rows.
 */
export type GlyphBitmap = {
  width: number;
  rows: number;
  /** Bytes per row in `buffer`. */
  pitch: number;
  buffer: Uint8Array;
};

/**
 * A rasterized glyph and the offsets needed to place it on a baseline.
 */
export type RasterizedGlyph = {
  bitmap: GlyphBitmap;
  /** Pixels from the pen position to the bitmap's left edge. */
  bearingX: number;
  /** Pixels from the baseline up to the bitmap's top edge. */
  bearingY: number;
};

/**
 * Opaque font rasterizer. Returns null when the font has no outline for the
 * character; zero-sized bitmaps (space) are valid results.
 */
export type GlyphRasterizer = {
  rasterize: (char: string, fontSize: number) => RasterizedGlyph | null;
};

