import { GlyphAtlas } from "../atlas/glyph-atlas";
import {
  createScopedLogger,
  resolveTerminalConfig,
  type TerminalConfig,
  type TerminalConfigOptions,
} from "../config";
import type { GlyphRasterizer } from "../fonts/types";
import { createGridState, fixedCellMetrics, updateGridState } from "../grid/grid";
import type { CellMetrics, GridResize, GridState } from "../grid/types";
import { createInputHandler } from "../input";
import type { InputHandler } from "../input/types";
import type { Logger } from "../logger";
import type { PtyTransport } from "../pty/types";
import { buildFrame } from "../renderer/glyph-quads";
import type { FrameResult, Palette } from "../renderer/types";
import { ChunkQueue } from "./chunk-queue";
import { Terminal } from "./terminal";

export type TerminalSessionOptions = TerminalConfigOptions & {
  transport: PtyTransport;
  rasterizer: GlyphRasterizer;
  /** Cell metrics from the font; fixed metrics from config otherwise. */
  metrics?: CellMetrics;
  /** Initial surface size in pixels. */
  widthPx: number;
  heightPx: number;
  palette?: Palette;
  /** Called when queued output is waiting for `frame()`. */
  requestRedraw?: () => void;
  onExit?: (code: number) => void;
  onBell?: () => void;
};

/**
 * Ties a transport to a terminal and its glyph atlas. Output is queued as
 * it arrives and applied once per frame.
 */
export class TerminalSession {
  readonly config: TerminalConfig;
  readonly terminal: Terminal;
  readonly atlas: GlyphAtlas;
  private readonly transport: PtyTransport;
  private readonly queue = new ChunkQueue();
  private readonly grid: GridState;
  private readonly metrics: CellMetrics;
  private readonly input: InputHandler;
  private readonly log: Logger;
  private readonly palette?: Palette;
  private readonly requestRedraw: () => void;
  private readonly onExit?: (code: number) => void;
  private exitCode: number | null = null;
  private disposed = false;

  constructor(options: TerminalSessionOptions) {
    this.config = resolveTerminalConfig(options);
    const { config } = this;
    this.log = createScopedLogger("session", config, options.onLog);
    this.transport = options.transport;
    this.palette = options.palette;
    this.requestRedraw = options.requestRedraw ?? (() => {});
    this.onExit = options.onExit;

    this.metrics =
      options.metrics ?? fixedCellMetrics(config.cellWidth, config.cellHeight, config.fontSize);
    this.grid = createGridState(this.metrics);
    const { cols, rows } = updateGridState(
      this.grid,
      this.metrics,
      options.widthPx,
      options.heightPx,
    );

    this.terminal = new Terminal({
      cols,
      rows,
      tabWidth: config.tabWidth,
      logger: createScopedLogger("vt", config, options.onLog),
      onBell: options.onBell,
    });
    this.atlas = new GlyphAtlas({
      rasterizer: options.rasterizer,
      fontSize: config.fontSize,
      initialSize: config.atlasInitialSize,
      maxSize: config.atlasMaxSize,
      capacity: config.glyphCacheCapacity,
      padding: config.atlasPadding,
      logger: createScopedLogger("atlas", config, options.onLog),
    });
    this.input = createInputHandler({
      sendInput: (bytes) => {
        if (!this.transport.sendInput(bytes)) {
          this.log.debug(`dropped ${bytes.length} input bytes, transport not connected`);
        }
      },
      scrollTarget: this.terminal,
      maxScrollStep: config.maxScrollStep,
    });
  }

  get cols(): number {
    return this.grid.cols;
  }

  get rows(): number {
    return this.grid.rows;
  }

  /** Exit code once the child has gone away, null while running. */
  get exited(): number | null {
    return this.exitCode;
  }

  /** Bytes received but not yet applied. */
  get pendingBytes(): number {
    return this.queue.byteLength;
  }

  async start(): Promise<void> {
    if (this.disposed) throw new Error("session is disposed");
    await this.transport.connect({
      cols: this.grid.cols,
      rows: this.grid.rows,
      callbacks: {
        onConnect: () => {
          this.log.info(`connected ${this.grid.cols}x${this.grid.rows}`);
        },
        onData: (data) => {
          this.queue.push(data);
          this.requestRedraw();
        },
        onError: (message, error) => {
          this.log.error(message, error);
        },
        onExit: (code) => {
          this.exitCode = code;
          this.log.info(`child exited with code ${code}`);
          this.onExit?.(code);
        },
        onDisconnect: () => {
          this.log.debug("disconnected");
        },
      },
    });
  }

  /**
   * Apply all queued output in one pass. Returns whether anything was
   * processed.
   */
  frame(): boolean {
    const bytes = this.queue.drain();
    if (!bytes) return false;
    this.terminal.process(bytes);
    return true;
  }

  /** Build draw data for the current screen. */
  render(): FrameResult {
    const result = buildFrame(this.terminal.screen, this.atlas, {
      metrics: this.metrics,
      fontSize: this.config.fontSize,
      palette: this.palette,
    });
    if (!result.ok) this.log.warn(`frame skipped: ${result.error.message}`);
    return result;
  }

  /** Recompute the grid for a new surface size and tell the child. */
  resize(widthPx: number, heightPx: number): GridResize {
    const result = updateGridState(this.grid, this.metrics, widthPx, heightPx);
    if (!result.changed) return result;
    this.terminal.resize(result.cols, result.rows);
    if (!this.transport.resize(result.cols, result.rows)) {
      this.log.debug(`resize ${result.cols}x${result.rows} not forwarded`);
    }
    this.requestRedraw();
    return result;
  }

  sendKey(key: string): boolean {
    return this.input.handleKey(key);
  }

  sendText(text: string): void {
    this.input.handleText(text);
  }

  /** Scroll the viewport for a wheel delta; returns the rows moved. */
  wheel(delta: number): number {
    const rows = this.input.handleWheel(delta);
    if (rows !== 0) this.requestRedraw();
    return rows;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.queue.clear();
    this.transport.disconnect();
    await this.transport.destroy?.();
  }
}
