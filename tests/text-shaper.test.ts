import { PixelMode, type GlyphRasterizeOptions } from "text-shaper";
import { expect, test } from "vitest";
import { createGlyphRasterizer, type RasterizeGlyphFn } from "../src/fonts";

type FakeFont = { glyphIdForChar: (char: string) => number | null | undefined };

const fakeFont: FakeFont = {
  glyphIdForChar: (char) => (char === "A" ? 36 : char === "?" ? undefined : 0),
};

function recordingRasterize(seen: Array<[number, number, GlyphRasterizeOptions]>) {
  const rasterize: RasterizeGlyphFn<FakeFont> = (_font, glyphId, fontSize, options) => {
    seen.push([glyphId, fontSize, options]);
    return {
      bitmap: { width: 3, rows: 4, pitch: 4, buffer: new Uint8Array(16).fill(255) },
      bearingX: -1,
      bearingY: 9,
    };
  };
  return rasterize;
}

test("glyph rasterizer maps a font glyph to a coverage bitmap", () => {
  const seen: Array<[number, number, GlyphRasterizeOptions]> = [];
  const rasterizer = createGlyphRasterizer(fakeFont, recordingRasterize(seen));

  const glyph = rasterizer.rasterize("A", 16);
  expect(glyph).toEqual({
    bitmap: { width: 3, rows: 4, pitch: 4, buffer: new Uint8Array(16).fill(255) },
    bearingX: -1,
    bearingY: 9,
  });
  expect(seen).toEqual([
    [36, 16, { padding: 0, pixelMode: PixelMode.Gray, sizeMode: "height", hinting: false }],
  ]);
});

test("glyph rasterizer returns null for characters the font lacks", () => {
  const seen: Array<[number, number, GlyphRasterizeOptions]> = [];
  const rasterizer = createGlyphRasterizer(fakeFont, recordingRasterize(seen));

  expect(rasterizer.rasterize("B", 16)).toBeNull();
  expect(rasterizer.rasterize("?", 16)).toBeNull();
  expect(seen).toEqual([]);
});

test("glyph rasterizer forwards hinting", () => {
  const seen: Array<[number, number, GlyphRasterizeOptions]> = [];
  const rasterizer = createGlyphRasterizer(fakeFont, recordingRasterize(seen), { hinting: true });
  rasterizer.rasterize("A", 24);
  expect(seen[0]?.[2].hinting).toBe(true);
  expect(seen[0]?.[1]).toBe(24);
});

test("glyph rasterizer passes through a missing raster", () => {
  const rasterizer = createGlyphRasterizer(fakeFont, () => null);
  expect(rasterizer.rasterize("A", 16)).toBeNull();
});
