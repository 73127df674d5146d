import { expect, test } from "vitest";
import { GlyphAtlas } from "../src/atlas";
import type { GlyphRasterizer } from "../src/fonts";
import { fixedCellMetrics } from "../src/grid";
import { DEFAULT_PALETTE, GLYPH_STRIDE, RECT_STRIDE, buildFrame } from "../src/renderer";
import { Terminal } from "../src/terminal";

const encoder = new TextEncoder();

function rasterizer(width: number, rows: number): GlyphRasterizer {
  return {
    rasterize: (char) =>
      char.trim()
        ? {
            bitmap: { width, rows, pitch: width, buffer: new Uint8Array(width * rows).fill(200) },
            bearingX: 1,
            bearingY: rows,
          }
        : null,
  };
}

function screenWith(cols: number, rows: number, text: string) {
  const term = new Terminal({ cols, rows });
  term.process(encoder.encode(text));
  return term.screen;
}

// cellW 10, cellH 20, baseline at 16
const metrics = fixedCellMetrics(10, 20, 16);

test("frame emits one background rect and one glyph quad per drawn cell", () => {
  const atlas = new GlyphAtlas({ rasterizer: rasterizer(4, 6), fontSize: 16, initialSize: 64 });
  const result = buildFrame(screenWith(2, 1, "\x1b[41mA"), atlas, { metrics, fontSize: 16 });
  if (!result.ok) throw result.error;
  const { frame } = result;

  const red = DEFAULT_PALETTE.ansi[1];
  const fg = DEFAULT_PALETTE.foreground;
  expect(frame.rects).toEqual([0, 0, 10, 20, red[0], red[1], red[2], red[3]]);
  expect(frame.glyphs).toEqual([
    1,
    10,
    4,
    6,
    1 / 64,
    1 / 64,
    5 / 64,
    7 / 64,
    fg[0],
    fg[1],
    fg[2],
    fg[3],
  ]);
  expect(frame.atlasGeneration).toBe(0);
  expect(frame.atlasSize).toBe(64);
  expect(frame.uploads).toEqual([{ x: 1, y: 1, width: 4, height: 6, full: false }]);
});

test("frame places glyphs by row and column", () => {
  const atlas = new GlyphAtlas({ rasterizer: rasterizer(4, 6), fontSize: 16, initialSize: 64 });
  const result = buildFrame(screenWith(4, 2, "\x1b[2;3HZ"), atlas, { metrics, fontSize: 16 });
  if (!result.ok) throw result.error;
  expect(result.frame.glyphs.slice(0, 2)).toEqual([2 * 10 + 1, 20 + 10]);
  expect(result.frame.rects).toEqual([]);
});

test("frame draws underlines below the baseline in the foreground color", () => {
  const atlas = new GlyphAtlas({ rasterizer: rasterizer(4, 6), fontSize: 16, initialSize: 64 });
  const result = buildFrame(screenWith(2, 1, "\x1b[4;32m_"), atlas, { metrics, fontSize: 16 });
  if (!result.ok) throw result.error;
  const green = DEFAULT_PALETTE.ansi[2];
  // round(16) + 1
  expect(result.frame.rects).toEqual([0, 17, 10, 1, green[0], green[1], green[2], green[3]]);
  expect(result.frame.glyphs.length).toBe(GLYPH_STRIDE);
});

test("frame underlines an erased cell without drawing a glyph", () => {
  const atlas = new GlyphAtlas({ rasterizer: rasterizer(4, 6), fontSize: 16, initialSize: 64 });
  const screen = screenWith(3, 1, "ab\x1b[1;1H\x1b[K\x1b[4;33m");
  const result = buildFrame(screen, atlas, { metrics, fontSize: 16 });
  if (!result.ok) throw result.error;
  const yellow = DEFAULT_PALETTE.ansi[3];
  expect(result.frame.rects).toEqual([0, 17, 10, 1, yellow[0], yellow[1], yellow[2], yellow[3]]);
  expect(result.frame.glyphs).toEqual([]);
});

test("frame skips empty cells and spaces", () => {
  const calls: string[] = [];
  const atlas = new GlyphAtlas({
    rasterizer: {
      rasterize: (char) => {
        calls.push(char);
        return null;
      },
    },
    fontSize: 16,
  });
  const result = buildFrame(screenWith(4, 2, "a b"), atlas, { metrics, fontSize: 16 });
  if (!result.ok) throw result.error;
  expect(calls).toEqual(["a", "b"]);
  expect(result.frame.glyphs).toEqual([]);
  expect(result.frame.rects.length % RECT_STRIDE).toBe(0);
});

test("frame is rebuilt against the grown atlas", () => {
  const atlas = new GlyphAtlas({
    rasterizer: rasterizer(6, 6),
    fontSize: 16,
    initialSize: 16,
    maxSize: 64,
  });
  const result = buildFrame(screenWith(6, 1, "ABCDE"), atlas, { metrics, fontSize: 16 });
  if (!result.ok) throw result.error;
  const { frame } = result;

  expect(frame.atlasGeneration).toBe(1);
  expect(frame.atlasSize).toBe(32);
  expect(frame.uploads).toEqual([{ x: 0, y: 0, width: 32, height: 32, full: true }]);
  expect(frame.glyphs.length).toBe(5 * GLYPH_STRIDE);
  for (let i = 0; i < frame.glyphs.length; i += GLYPH_STRIDE) {
    const [u0, v0, u1, v1] = frame.glyphs.slice(i + 4, i + 8);
    expect(u0).toBeGreaterThan(0);
    expect(v0).toBeGreaterThan(0);
    expect(u1).toBeLessThanOrEqual(1);
    expect(v1).toBeLessThanOrEqual(1);
  }
});

test("frame fails with the atlas error when a glyph cannot fit", () => {
  const atlas = new GlyphAtlas({
    rasterizer: rasterizer(40, 40),
    fontSize: 16,
    initialSize: 16,
    maxSize: 32,
  });
  const result = buildFrame(screenWith(2, 1, "W"), atlas, { metrics, fontSize: 16 });
  expect(result.ok).toBe(false);
  if (result.ok) return;
  expect(result.error.code).toBe("atlas-full");
});

test("frame is rebuilt once after the atlas compacts at its maximum size", () => {
  const atlas = new GlyphAtlas({
    rasterizer: rasterizer(6, 6),
    fontSize: 16,
    initialSize: 16,
    maxSize: 16,
    capacity: 2,
  });
  const warm = buildFrame(screenWith(5, 1, "ABCD"), atlas, { metrics, fontSize: 16 });
  if (!warm.ok) throw warm.error;

  const result = buildFrame(screenWith(5, 1, "DE"), atlas, { metrics, fontSize: 16 });
  if (!result.ok) throw result.error;
  expect(result.frame.atlasGeneration).toBe(1);
  expect(result.frame.atlasSize).toBe(16);
  expect(result.frame.glyphs.length).toBe(2 * GLYPH_STRIDE);
  expect(atlas.stats()).toMatchObject({ growths: 0, compactions: 1 });
});

test("frame fails when its glyphs cannot share the surface", () => {
  const atlas = new GlyphAtlas({
    rasterizer: rasterizer(6, 6),
    fontSize: 16,
    initialSize: 16,
    maxSize: 16,
    capacity: 2,
  });
  const result = buildFrame(screenWith(6, 1, "ABCDE"), atlas, { metrics, fontSize: 16 });
  expect(result.ok).toBe(false);
  if (result.ok) return;
  expect(result.error.code).toBe("atlas-full");
  expect(result.error.maxSize).toBe(16);
});
