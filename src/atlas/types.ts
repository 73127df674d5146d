import type { GlyphRasterizer } from "../fonts/types";
import type { Logger } from "../logger";

/** Region of the atlas surface holding one glyph, padding excluded. */
export type GlyphRect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/** Glyph rect plus the bearings needed to place it in a cell. */
export type GlyphPlacement = GlyphRect & {
  bearingX: number;
  bearingY: number;
};

export type AtlasErrorCode = "atlas-full";

/**
 * Result of a glyph lookup. `rect` is null when the character has no
 * visible pixels and nothing was stored.
 */
export type GlyphLookup =
  | { ok: true; rect: GlyphPlacement | null }
  | { ok: false; error: AtlasError };

/**
 * Region of the surface that changed since the last upload. `full` marks a
 * whole-surface upload after the atlas grew.
 */
export type AtlasUpload = {
  x: number;
  y: number;
  width: number;
  height: number;
  full: boolean;
};

export type AtlasStats = {
  size: number;
  generation: number;
  cachedGlyphs: number;
  usedArea: number;
  evictions: number;
  growths: number;
  /** Re-packs at the maximum size that reclaimed evicted space. */
  compactions: number;
};

export type GlyphAtlasOptions = {
  rasterizer: GlyphRasterizer;
  fontSize: number;
  initialSize?: number;
  maxSize?: number;
  capacity?: number;
  padding?: number;
  logger?: Logger;
};

/** Raised through a failed GlyphLookup when a glyph cannot fit even at the maximum size. */
export class AtlasError extends Error {
  readonly code: AtlasErrorCode;
  readonly char: string;
  readonly maxSize: number;

  constructor(code: AtlasErrorCode, char: string, maxSize: number) {
    super(`glyph ${JSON.stringify(char)} does not fit in a ${maxSize}px atlas`);
    this.name = "AtlasError";
    this.code = code;
    this.char = char;
    this.maxSize = maxSize;
  }
}
