import type { GlyphAtlas } from "../atlas/glyph-atlas";
import { AtlasError } from "../atlas/types";
import type { CellMetrics } from "../grid/types";
import { EMPTY_CHAR } from "../screen/cell";
import type { VisibleCell } from "../screen/types";
import { DEFAULT_PALETTE, resolveCellColors } from "./palette";
import type { Color, FrameResult, GlyphData, Palette, RectData } from "./types";

/** Anything that can enumerate the cells on screen. */
export type FrameSource = {
  visibleCells: () => Iterable<VisibleCell>;
};

export type BuildFrameOptions = {
  metrics: Pick<CellMetrics, "cellW" | "cellH" | "baselineOffset" | "yPad">;
  fontSize: number;
  palette?: Palette;
};

/** Append one rect instance. */
export function pushRect(
  out: RectData,
  x: number,
  y: number,
  w: number,
  h: number,
  color: Color,
): void {
  out.push(x, y, w, h, color[0], color[1], color[2], color[3]);
}

/** `staleAt` names the character whose lookup replaced the atlas surface. */
type EmitResult =
  | { ok: true; rects: RectData; glyphs: GlyphData; staleAt: string | null }
  | { ok: false; error: AtlasError };

function emitCells(
  source: FrameSource,
  atlas: GlyphAtlas,
  options: BuildFrameOptions,
  generation: number,
): EmitResult {
  const { cellW, cellH, baselineOffset, yPad } = options.metrics;
  const palette = options.palette ?? DEFAULT_PALETTE;
  const baseY = yPad + baselineOffset;
  const rects: RectData = [];
  const glyphs: GlyphData = [];

  for (const { row, col, cell } of source.visibleCells()) {
    const x = col * cellW;
    const y = row * cellH;
    const { fg, bg } = resolveCellColors(cell, palette);
    if (bg) pushRect(rects, x, y, cellW, cellH, bg);
    if (cell.underline) {
      pushRect(rects, x, y + Math.min(cellH - 1, Math.round(baseY) + 1), cellW, 1, fg);
    }
    if (cell.char === EMPTY_CHAR || cell.char === " ") continue;

    const lookup = atlas.getOrCreate(cell.char, options.fontSize);
    if (!lookup.ok) return lookup;
    if (atlas.generation !== generation) return { ok: true, rects, glyphs, staleAt: cell.char };
    const rect = lookup.rect;
    if (!rect) continue;

    const size = atlas.size;
    glyphs.push(
      Math.round(x + rect.bearingX),
      Math.round(y + baseY - rect.bearingY),
      rect.width,
      rect.height,
      rect.x / size,
      rect.y / size,
      (rect.x + rect.width) / size,
      (rect.y + rect.height) / size,
      fg[0],
      fg[1],
      fg[2],
      fg[3],
    );
  }
  return { ok: true, rects, glyphs, staleAt: null };
}

/**
 * Build rect and glyph instances for every visible cell. Empty cells and
 * spaces produce no glyph; zero-area glyphs are skipped. When the atlas
 * grows mid-frame every placement moves, so the frame is rebuilt against
 * the new surface. Growth is bounded by the atlas maximum; a second
 * compaction at the same size means the frame's glyphs cannot share the
 * surface, which is reported as a full atlas.
 */
export function buildFrame(
  source: FrameSource,
  atlas: GlyphAtlas,
  options: BuildFrameOptions,
): FrameResult {
  let size = atlas.size;
  let compacted = false;
  for (;;) {
    const generation = atlas.generation;
    const result = emitCells(source, atlas, options, generation);
    if (!result.ok) return result;
    if (result.staleAt !== null) {
      if (atlas.size !== size) {
        size = atlas.size;
        compacted = false;
      } else if (compacted) {
        return { ok: false, error: new AtlasError("atlas-full", result.staleAt, size) };
      } else {
        compacted = true;
      }
      continue;
    }
    return {
      ok: true,
      frame: {
        rects: result.rects,
        glyphs: result.glyphs,
        atlasGeneration: generation,
        atlasSize: atlas.size,
        uploads: atlas.takeUploads(),
      },
    };
  }
}
