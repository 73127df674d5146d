import { DEFAULT_TERMINAL_CONFIG, clampFiniteNumber } from "../config";
import type { GlyphBitmap, GlyphRasterizer, RasterizedGlyph } from "../fonts/types";
import { silentLogger, type Logger } from "../logger";
import { createAtlasBitmap, copyBitmapToAtlas } from "./bitmap-utils";
import { LruCache } from "./lru-cache";
import { GuillotinePacker } from "./packer";
import {
  AtlasError,
  type AtlasStats,
  type AtlasUpload,
  type GlyphAtlasOptions,
  type GlyphLookup,
  type GlyphPlacement,
} from "./types";

type CacheEntry = {
  char: string;
  fontSize: number;
  placement: GlyphPlacement;
};

type PendingGlyph = {
  entry: CacheEntry;
  raster: RasterizedGlyph;
};

type AtlasLayout = {
  size: number;
  packer: GuillotinePacker;
  surface: GlyphBitmap;
};

function cacheKey(char: string, fontSize: number): string {
  return `${fontSize}:${char}`;
}

function hasPixels(raster: RasterizedGlyph | null): raster is RasterizedGlyph {
  return !!raster && raster.bitmap.width > 0 && raster.bitmap.rows > 0;
}

/**
 * Square single-channel glyph atlas with an LRU lookup in front of it.
 *
 * Glyphs are packed once and never moved until the surface grows; growth
 * doubles the edge, re-rasterizes every cached glyph oldest first and packs
 * them into the fresh surface. Evicting a lookup does not free its packed
 * space, so the surface only fills up between growths. Once doubling would
 * pass `maxSize`, a full surface is compacted in place instead: the live
 * glyphs are re-packed at the current size.
 */
export class GlyphAtlas {
  private readonly rasterizer: GlyphRasterizer;
  private readonly fontSize: number;
  private readonly maxSize: number;
  private readonly padding: number;
  private readonly log: Logger;
  private readonly cache: LruCache<string, CacheEntry>;
  private layout: AtlasLayout;
  private uploads: AtlasUpload[] = [];
  private gen = 0;
  private evictions = 0;
  private growths = 0;
  private compactions = 0;

  constructor(options: GlyphAtlasOptions) {
    const d = DEFAULT_TERMINAL_CONFIG;
    this.rasterizer = options.rasterizer;
    this.fontSize = options.fontSize;
    const initialSize = clampFiniteNumber(options.initialSize, d.atlasInitialSize, 1, 16384, true);
    this.maxSize = Math.max(
      initialSize,
      clampFiniteNumber(options.maxSize, d.atlasMaxSize, 1, 16384, true),
    );
    this.padding = clampFiniteNumber(options.padding, d.atlasPadding, 0, 64, true);
    this.cache = new LruCache(
      clampFiniteNumber(options.capacity, d.glyphCacheCapacity, 1, 1 << 20, true),
    );
    this.log = options.logger ?? silentLogger;
    this.layout = this.createLayout(initialSize);
  }

  /** Current edge length in pixels. */
  get size(): number {
    return this.layout.size;
  }

  /** Bumped whenever the surface is replaced and every UV must be recomputed. */
  get generation(): number {
    return this.gen;
  }

  /** The backing coverage bitmap, `size` by `size`. */
  get surface(): GlyphBitmap {
    return this.layout.surface;
  }

  has(char: string, fontSize: number = this.fontSize): boolean {
    return this.cache.has(cacheKey(char, fontSize));
  }

  stats(): AtlasStats {
    return {
      size: this.layout.size,
      generation: this.gen,
      cachedGlyphs: this.cache.size,
      usedArea: this.layout.packer.usedArea,
      evictions: this.evictions,
      growths: this.growths,
      compactions: this.compactions,
    };
  }

  /** Regions written since the previous call, in write order. */
  takeUploads(): AtlasUpload[] {
    const out = this.uploads;
    this.uploads = [];
    return out;
  }

  getOrCreate(char: string, fontSize: number = this.fontSize): GlyphLookup {
    const key = cacheKey(char, fontSize);
    const hit = this.cache.get(key);
    if (hit) return { ok: true, rect: hit.placement };

    const raster = this.rasterizer.rasterize(char, fontSize);
    if (!hasPixels(raster)) return { ok: true, rect: null };

    let placement = this.place(this.layout, raster);
    if (placement) {
      const { x, y, width, height } = placement;
      this.uploads.push({ x, y, width, height, full: false });
    } else {
      placement = this.grow(raster);
      if (!placement) {
        const error = new AtlasError("atlas-full", char, this.maxSize);
        this.log.warn(error.message);
        return { ok: false, error };
      }
    }

    const evicted = this.cache.set(key, { char, fontSize, placement });
    if (evicted) this.evictions += 1;
    return { ok: true, rect: placement };
  }

  private createLayout(size: number): AtlasLayout {
    return {
      size,
      packer: new GuillotinePacker(size, size),
      surface: createAtlasBitmap(size, size),
    };
  }

  /** Pack and copy one glyph; null when the layout has no room. */
  private place(layout: AtlasLayout, raster: RasterizedGlyph): GlyphPlacement | null {
    const pad = this.padding;
    const { bitmap } = raster;
    const slot = layout.packer.allocate(bitmap.width + pad * 2, bitmap.rows + pad * 2);
    if (!slot) return null;
    const x = slot.x + pad;
    const y = slot.y + pad;
    copyBitmapToAtlas(bitmap, layout.surface, x, y);
    return {
      x,
      y,
      width: bitmap.width,
      height: bitmap.rows,
      bearingX: raster.bearingX,
      bearingY: raster.bearingY,
    };
  }

  /**
   * Double the surface until every cached glyph and `incoming` fit, up to
   * `maxSize`; at the limit, re-pack at the current size. Nothing is
   * committed unless a layout succeeds.
   */
  private grow(incoming: RasterizedGlyph): GlyphPlacement | null {
    const pending: PendingGlyph[] = [];
    for (const [, entry] of this.cache.entries()) {
      const raster = this.rasterizer.rasterize(entry.char, entry.fontSize);
      if (hasPixels(raster)) pending.push({ entry, raster });
    }

    const doubled = this.layout.size * 2;
    let size = doubled <= this.maxSize ? doubled : this.layout.size;
    while (size <= this.maxSize) {
      const layout = this.createLayout(size);
      const replaced: CacheEntry[] = [];
      let fits = true;
      for (const { entry, raster } of pending) {
        const placement = this.place(layout, raster);
        if (!placement) {
          fits = false;
          break;
        }
        replaced.push({ ...entry, placement });
      }
      const placement = fits ? this.place(layout, incoming) : null;
      if (placement) {
        this.commitGrowth(layout, replaced);
        return placement;
      }
      this.log.debug(`re-pack into ${size}px failed`);
      size *= 2;
    }
    return null;
  }

  private commitGrowth(layout: AtlasLayout, entries: CacheEntry[]): void {
    const from = this.layout.size;
    this.layout = layout;
    this.cache.clear();
    for (const entry of entries) {
      this.cache.set(cacheKey(entry.char, entry.fontSize), entry);
    }
    this.gen += 1;
    this.uploads = [{ x: 0, y: 0, width: layout.size, height: layout.size, full: true }];
    if (layout.size === from) {
      this.compactions += 1;
      this.log.debug(`compacted ${from}px, repacked ${entries.length} glyphs`);
      return;
    }
    this.growths += 1;
    this.log.debug(`grew ${from}px -> ${layout.size}px, repacked ${entries.length} glyphs`);
  }
}
