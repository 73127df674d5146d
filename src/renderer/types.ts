import type { AtlasError, AtlasUpload } from "../atlas/types";

/** Linear RGBA, each channel 0..1. */
export type Color = [number, number, number, number];

/** Flat array of rect instance data (x, y, w, h, r, g, b, a per rect). */
export type RectData = number[];

/**
 * Flat array of glyph instance data: x, y, w, h in pixels, u0, v0, u1, v1
 * in atlas space, then foreground r, g, b, a.
 */
export type GlyphData = number[];

export const RECT_STRIDE = 8;
export const GLYPH_STRIDE = 12;

export type Palette = {
  foreground: Color;
  background: Color;
  /** The 8 ANSI colors, indexed by palette number. */
  ansi: readonly Color[];
};

/** Everything a backend needs to draw one frame. */
export type FrameData = {
  /** Non-default cell backgrounds and underlines. */
  rects: RectData;
  glyphs: GlyphData;
  /** Atlas generation the UVs were computed against. */
  atlasGeneration: number;
  atlasSize: number;
  /** Surface regions to upload before drawing. */
  uploads: AtlasUpload[];
};

/** Frame build result; a full atlas skips the frame. */
export type FrameResult = { ok: true; frame: FrameData } | { ok: false; error: AtlasError };
