export { createAtlasBitmap, copyBitmapToAtlas } from "./bitmap-utils";
export { GlyphAtlas } from "./glyph-atlas";
export { LruCache } from "./lru-cache";
export { GuillotinePacker } from "./packer";
export { AtlasError } from "./types";
export type {
  AtlasErrorCode,
  AtlasStats,
  AtlasUpload,
  GlyphAtlasOptions,
  GlyphLookup,
  GlyphPlacement,
  GlyphRect,
} from "./types";
