import type { GlyphBitmap } from "../fonts/types";

/** Zeroed single-channel surface. */
export function createAtlasBitmap(width: number, height: number): GlyphBitmap {
  const pitch = Math.max(1, width);
  return {
    width,
    rows: height,
    pitch,
    buffer: new Uint8Array(pitch * height),
  };
}

export function copyBitmapToAtlas(
  src: GlyphBitmap,
  dst: GlyphBitmap,
  dstX: number,
  dstY: number,
): void {
  const rowBytes = src.width;
  for (let y = 0; y < src.rows; y += 1) {
    const srcRow = y * src.pitch;
    const dstRow = (dstY + y) * dst.pitch + dstX;
    dst.buffer.set(src.buffer.subarray(srcRow, srcRow + rowBytes), dstRow);
  }
}
