export {
  createGlyphRasterizer,
  createTextShaperRasterizer,
  loadFontFile,
  loadTextShaperRasterizer,
  type FontSizeMode,
  type GlyphSource,
  type RasterizeGlyphFn,
  type TextShaperRasterizerOptions,
} from "./text-shaper";
export type { GlyphBitmap, GlyphRasterizer, RasterizedGlyph } from "./types";
