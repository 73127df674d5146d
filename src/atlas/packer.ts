import type { GlyphRect } from "./types";

type FreeRect = GlyphRect;

/**
 * Guillotine rectangle packer. Free space is a list of disjoint rectangles;
 * each allocation takes the best-short-side fit and splits the remainder
 * along the shorter leftover axis. Space is never returned.
 */
export class GuillotinePacker {
  readonly width: number;
  readonly height: number;
  private free: FreeRect[];
  private used = 0;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.free = width > 0 && height > 0 ? [{ x: 0, y: 0, width, height }] : [];
  }

  get usedArea(): number {
    return this.used;
  }

  get freeRects(): readonly GlyphRect[] {
    return this.free;
  }

  allocate(width: number, height: number): GlyphRect | null {
    if (width <= 0 || height <= 0) return null;

    let bestIndex = -1;
    let bestShort = Infinity;
    let bestLong = Infinity;
    for (let i = 0; i < this.free.length; i += 1) {
      const rect = this.free[i];
      if (rect.width < width || rect.height < height) continue;
      const leftoverX = rect.width - width;
      const leftoverY = rect.height - height;
      const short = Math.min(leftoverX, leftoverY);
      const long = Math.max(leftoverX, leftoverY);
      if (short < bestShort || (short === bestShort && long < bestLong)) {
        bestIndex = i;
        bestShort = short;
        bestLong = long;
      }
    }
    if (bestIndex < 0) return null;

    const target = this.free[bestIndex];
    this.free.splice(bestIndex, 1);
    const placed = { x: target.x, y: target.y, width, height };
    this.split(target, placed);
    this.used += width * height;
    return placed;
  }

  private split(target: FreeRect, placed: GlyphRect): void {
    const leftoverX = target.width - placed.width;
    const leftoverY = target.height - placed.height;
    // Shorter leftover axis: cut so the larger remainder stays whole.
    const horizontal = leftoverX <= leftoverY;

    const right: FreeRect = {
      x: target.x + placed.width,
      y: target.y,
      width: leftoverX,
      height: horizontal ? placed.height : target.height,
    };
    const bottom: FreeRect = {
      x: target.x,
      y: target.y + placed.height,
      width: horizontal ? target.width : placed.width,
      height: leftoverY,
    };
    if (right.width > 0 && right.height > 0) this.free.push(right);
    if (bottom.width > 0 && bottom.height > 0) this.free.push(bottom);
  }
}
