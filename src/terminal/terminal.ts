import { silentLogger, type Logger } from "../logger";
import { Parser } from "../parser/parser";
import type { ParserEvent } from "../parser/types";
import { ScreenBuffer } from "../screen/screen-buffer";

export type TerminalOptions = {
  cols: number;
  rows: number;
  tabWidth?: number;
  logger?: Logger;
  onBell?: () => void;
};

/**
 * Decoder plus screen buffer. Bytes go in through `process`, in any
 * chunking; the screen reflects everything consumed so far.
 */
export class Terminal {
  readonly screen: ScreenBuffer;
  private readonly parser = new Parser();
  private readonly dispatch: (event: ParserEvent) => void;

  constructor(options: TerminalOptions) {
    this.screen = new ScreenBuffer(
      {
        cols: options.cols,
        rows: options.rows,
        tabWidth: options.tabWidth,
        onBell: options.onBell,
      },
      options.logger ?? silentLogger,
    );
    this.dispatch = (event) => this.screen.dispatch(event);
  }

  get cols(): number {
    return this.screen.viewport.width;
  }

  get rows(): number {
    return this.screen.viewport.height;
  }

  process(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    this.parser.advance(bytes, this.dispatch);
  }

  resize(cols: number, rows: number): void {
    this.screen.resize(cols, rows);
  }

  /** Move the viewport; positive deltas move towards newer rows. */
  scroll(delta: number): void {
    this.screen.scroll(delta);
  }

  toText(): string {
    return this.screen.toText();
  }
}
