/**
 * Unbounded FIFO of output chunks waiting for the next frame. There is no
 * backpressure: a fast producer grows the queue until the next drain.
 */
export class ChunkQueue {
  private chunks: Uint8Array[] = [];
  private bytes = 0;

  get length(): number {
    return this.chunks.length;
  }

  get byteLength(): number {
    return this.bytes;
  }

  push(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.bytes += chunk.length;
  }

  /** Remove every queued chunk and return them concatenated in arrival order. */
  drain(): Uint8Array | null {
    if (this.chunks.length === 0) return null;
    const chunks = this.chunks;
    const total = this.bytes;
    this.chunks = [];
    this.bytes = 0;
    if (chunks.length === 1) return chunks[0];
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  clear(): void {
    this.chunks = [];
    this.bytes = 0;
  }
}
