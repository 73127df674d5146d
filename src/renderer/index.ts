export { buildFrame, pushRect, type BuildFrameOptions, type FrameSource } from "./glyph-quads";
export { DEFAULT_PALETTE, resolveCellColors } from "./palette";
export { GLYPH_STRIDE, RECT_STRIDE } from "./types";
export type { Color, FrameData, FrameResult, GlyphData, Palette, RectData } from "./types";
