import { readFile } from "node:fs/promises";
import {
  Font,
  PixelMode,
  rasterizeGlyph,
  type FontSizeMode,
  type GlyphRasterizeOptions,
} from "text-shaper";
import type { GlyphBitmap, GlyphRasterizer, RasterizedGlyph } from "./types";

export type { FontSizeMode } from "text-shaper";

/** The part of a font the rasterizer needs to map characters to glyphs. */
export type GlyphSource = {
  glyphIdForChar: (char: string) => number | null | undefined;
};

export type RasterizeGlyphFn<F extends GlyphSource> = (
  font: F,
  glyphId: number,
  fontSize: number,
  options: GlyphRasterizeOptions,
) => { bitmap: GlyphBitmap; bearingX: number; bearingY: number } | null;

export type TextShaperRasterizerOptions = {
  sizeMode?: FontSizeMode;
  hinting?: boolean;
};

/** Load a font file from disk. */
export async function loadFontFile(path: string): Promise<Font> {
  const data = await readFile(path);
  const buffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(buffer).set(data);
  try {
    return await Font.loadAsync(buffer);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`font load failed (${path}): ${message}`);
  }
}

/**
 * Wrap a font and a rasterize function into a GlyphRasterizer. Characters
 * the font has no glyph for come back as null, so the cell is skipped.
 */
export function createGlyphRasterizer<F extends GlyphSource>(
  font: F,
  rasterize: RasterizeGlyphFn<F>,
  options: TextShaperRasterizerOptions = {},
): GlyphRasterizer {
  const rasterOptions: GlyphRasterizeOptions = {
    padding: 0,
    pixelMode: PixelMode.Gray,
    sizeMode: options.sizeMode ?? "height",
    hinting: options.hinting ?? false,
  };

  return {
    rasterize: (char: string, fontSize: number): RasterizedGlyph | null => {
      const glyphId = font.glyphIdForChar(char);
      if (glyphId === undefined || glyphId === null || glyphId === 0) return null;
      const raster = rasterize(font, glyphId, fontSize, rasterOptions);
      if (!raster) return null;
      const { width, rows, pitch, buffer } = raster.bitmap;
      return {
        bitmap: { width, rows, pitch, buffer },
        bearingX: raster.bearingX,
        bearingY: raster.bearingY,
      };
    },
  };
}

/** Rasterizer backed by a text-shaper font in gray coverage mode. */
export function createTextShaperRasterizer(
  font: Font,
  options: TextShaperRasterizerOptions = {},
): GlyphRasterizer {
  return createGlyphRasterizer(font, rasterizeGlyph, options);
}

/** Load a font file and wrap it in a rasterizer. */
export async function loadTextShaperRasterizer(
  path: string,
  options: TextShaperRasterizerOptions = {},
): Promise<GlyphRasterizer> {
  const font = await loadFontFile(path);
  return createTextShaperRasterizer(font, options);
}
