import { silentLogger, type Logger } from "../logger";
import type { CsiEvent, EscEvent, OscEvent, ParserEvent } from "../parser";
import { EMPTY_CELL, EMPTY_CHAR, createDefaultPen, createEmptyCell, resetCell, toAnsiColor } from "./cell";
import type {
  Cell,
  Cursor,
  Pen,
  Row,
  ScreenBufferOptions,
  ScreenStats,
  ScrollRegion,
  Viewport,
  VisibleCell,
} from "./types";

const LF = 0x0a;
const CR = 0x0d;
const BS = 0x08;
const HT = 0x09;
const BEL = 0x07;

const textDecoder = new TextDecoder();

/** Render a CSI event back to its textual form for log lines, e.g. `CSI ?25h`. */
export function describeCsi(event: CsiEvent): string {
  return `CSI ${event.intermediates}${event.params.join(";")}${event.final}`;
}

function clampIndex(value: number, size: number): number {
  return Math.max(0, Math.min(size - 1, value));
}

function resetRange(row: Row, from: number, to: number): void {
  const end = Math.min(to, row.length);
  for (let i = Math.max(0, from); i < end; i += 1) resetCell(row[i]);
}

/**
 * Scrollback, cursor and viewport state mutated by decoder events.
 *
 * Rows live in an append-only arena addressed by index. The cursor is
 * relative to the viewport, and the viewport follows output: a line feed on
 * the last visible row moves `topRow` down by one.
 */
export class ScreenBuffer {
  private readonly rows: Row[] = [];
  private readonly view: Viewport;
  private readonly pos: Cursor = { x: 0, y: 0 };
  private pen: Pen = createDefaultPen();
  private region: ScrollRegion | null = null;
  private dcsBytes = 0;
  private readonly tabWidth: number;
  private readonly onBell?: () => void;
  private readonly logger: Logger;

  constructor(options: ScreenBufferOptions, logger: Logger = silentLogger) {
    this.view = {
      topRow: 0,
      width: Math.max(1, Math.floor(options.cols)),
      height: Math.max(1, Math.floor(options.rows)),
    };
    this.tabWidth = Math.max(1, options.tabWidth ?? 8);
    this.onBell = options.onBell;
    this.logger = logger;
  }

  get cursor(): Cursor {
    return { x: this.pos.x, y: this.pos.y };
  }

  get viewport(): Viewport {
    return { ...this.view };
  }

  get scrollbackLength(): number {
    return this.rows.length;
  }

  /** Last `CSI r` region. Recorded only; scrolling ignores it. */
  get scrollRegion(): ScrollRegion | null {
    return this.region;
  }

  /** Attributes the next printed cell receives. */
  get currentPen(): Pen {
    return { ...this.pen };
  }

  /** Apply one decoder event. */
  dispatch(event: ParserEvent): void {
    switch (event.type) {
      case "print":
        this.print(event.char);
        return;
      case "execute":
        this.execute(event.byte);
        return;
      case "csi":
        this.csi(event);
        return;
      case "esc":
        this.esc(event);
        return;
      case "osc":
        this.osc(event);
        return;
      case "dcs-hook":
        this.dcsBytes = 0;
        this.logger.debug(
          `unhandled DCS ${event.intermediates}${event.params.join(";")}${event.final}`,
        );
        return;
      case "dcs-put":
        this.dcsBytes += 1;
        return;
      case "dcs-unhook":
        this.logger.debug(`DCS ended, ${this.dcsBytes} payload bytes dropped`);
        this.dcsBytes = 0;
        return;
    }
  }

  /** Write one character at the cursor and advance, wrapping and scrolling as needed. */
  print(char: string): void {
    const row = this.ensureRow(this.view.topRow + this.pos.y);
    while (row.length < this.pos.x) row.push(createEmptyCell());
    const cell: Cell = { char, ...this.pen };
    if (this.pos.x < row.length) row[this.pos.x] = cell;
    else row.push(cell);

    this.pos.x += 1;
    if (this.pos.x >= this.view.width) {
      this.lineFeed();
    }
  }

  /** Move the viewport by `delta` rows; positive moves towards newer rows. */
  scroll(delta: number): void {
    const steps = Math.trunc(delta);
    if (steps > 0) {
      const maxTop = Math.max(this.view.topRow, this.rows.length - this.view.height);
      this.view.topRow = Math.min(this.view.topRow + steps, maxTop);
    } else if (steps < 0) {
      this.view.topRow = Math.max(0, this.view.topRow + steps);
    }
  }

  /** Change the visible grid size. Stored rows are kept as they are. */
  resize(cols: number, rows: number): void {
    this.view.width = Math.max(1, Math.floor(cols));
    this.view.height = Math.max(1, Math.floor(rows));
    this.pos.x = clampIndex(this.pos.x, this.view.width);
    this.pos.y = clampIndex(this.pos.y, this.view.height);
  }

  /** Cell at a viewport position; positions without stored data read as empty. */
  getCell(col: number, row: number): Readonly<Cell> {
    return this.rows[this.view.topRow + row]?.[col] ?? EMPTY_CELL;
  }

  /** Stored row by scrollback index. */
  getRow(index: number): readonly Readonly<Cell>[] | undefined {
    return this.rows[index];
  }

  /** Row-major walk over the viewport. Every call starts a fresh iteration. */
  *visibleCells(): IterableIterator<VisibleCell> {
    const { topRow, width, height } = this.view;
    for (let row = 0; row < height; row += 1) {
      const stored = this.rows[topRow + row];
      for (let col = 0; col < width; col += 1) {
        yield { row, col, cell: stored?.[col] ?? EMPTY_CELL };
      }
    }
  }

  /** Viewport contents as plain text, one line per row, trailing blanks trimmed. */
  toText(): string {
    const lines: string[] = [];
    for (let row = 0; row < this.view.height; row += 1) {
      let line = "";
      for (let col = 0; col < this.view.width; col += 1) {
        const ch = this.getCell(col, row).char;
        line += ch === EMPTY_CHAR ? " " : ch;
      }
      lines.push(line.replace(/ +$/, ""));
    }
    return lines.join("\n");
  }

  getStats(): ScreenStats {
    return { rows: this.rows.length, topRow: this.view.topRow, cursor: this.cursor };
  }

  private ensureRow(index: number): Row {
    while (this.rows.length <= index) this.rows.push([]);
    return this.rows[index];
  }

  private currentRow(): Row | undefined {
    return this.rows[this.view.topRow + this.pos.y];
  }

  private lineFeed(): void {
    this.pos.x = 0;
    this.pos.y += 1;
    if (this.pos.y >= this.view.height) {
      this.pos.y = this.view.height - 1;
      this.view.topRow += 1;
    }
    this.ensureRow(this.view.topRow + this.pos.y);
  }

  private execute(byte: number): void {
    switch (byte) {
      case LF:
        this.lineFeed();
        return;
      case CR:
        this.pos.x = 0;
        return;
      case BS:
        this.pos.x = Math.max(0, this.pos.x - 1);
        return;
      case HT:
        this.pos.x += this.tabWidth - (this.pos.x % this.tabWidth);
        if (this.pos.x >= this.view.width) this.lineFeed();
        return;
      case BEL:
        this.onBell?.();
        return;
      default:
        this.logger.debug(`unhandled control 0x${byte.toString(16).padStart(2, "0")}`);
    }
  }

  private csi(event: CsiEvent): void {
    if (event.ignore) {
      this.logger.debug(`ignored malformed ${describeCsi(event)}`);
      return;
    }
    if (event.intermediates) {
      this.logger.debug(`unhandled ${describeCsi(event)}`);
      return;
    }
    const { params } = event;
    const count = Math.max(1, params[0] ?? 1);
    const { width, height } = this.view;

    switch (event.final) {
      case "A":
        this.pos.y = Math.max(0, this.pos.y - count);
        return;
      case "B":
        this.pos.y = Math.min(height - 1, this.pos.y + count);
        return;
      case "C":
        this.pos.x = Math.min(width - 1, this.pos.x + count);
        return;
      case "D":
        this.pos.x = Math.max(0, this.pos.x - count);
        return;
      case "H":
      case "f":
        this.pos.y = clampIndex((params[0] || 1) - 1, height);
        this.pos.x = clampIndex((params[1] || 1) - 1, width);
        return;
      case "K":
        this.eraseInLine(params[0] ?? 0, event);
        return;
      case "J":
        this.eraseInDisplay(params[0] ?? 0, event);
        return;
      case "P": {
        const row = this.currentRow();
        if (row && this.pos.x < row.length) row.splice(this.pos.x, count);
        return;
      }
      case "r":
        this.region = { top: params[0] || 1, bottom: params[1] || height };
        this.logger.debug(
          `scroll region ${this.region.top}-${this.region.bottom} recorded, not enforced`,
        );
        return;
      case "m":
        this.selectGraphicRendition(params.length ? params : [0]);
        return;
      default:
        this.logger.debug(`unhandled ${describeCsi(event)}`);
    }
  }

  private eraseInLine(mode: number, event: CsiEvent): void {
    const row = this.currentRow();
    switch (mode) {
      case 0:
        if (row) resetRange(row, this.pos.x, row.length);
        return;
      case 1:
        if (row) resetRange(row, 0, this.pos.x + 1);
        return;
      case 2:
        if (row) resetRange(row, 0, row.length);
        return;
      default:
        this.logger.debug(`unhandled erase mode in ${describeCsi(event)}`);
    }
  }

  private eraseInDisplay(mode: number, event: CsiEvent): void {
    const current = this.view.topRow + this.pos.y;
    switch (mode) {
      case 0:
        for (let i = current; i < this.rows.length; i += 1) {
          const row = this.rows[i];
          resetRange(row, i === current ? this.pos.x : 0, row.length);
        }
        return;
      case 1:
        for (let i = 0; i <= current && i < this.rows.length; i += 1) {
          const row = this.rows[i];
          resetRange(row, 0, i === current ? this.pos.x + 1 : row.length);
        }
        return;
      case 2:
        for (const row of this.rows) resetRange(row, 0, row.length);
        return;
      default:
        this.logger.debug(`unhandled erase mode in ${describeCsi(event)}`);
    }
  }

  /**
   * SGR. Each attribute updates the pen for later prints and the cell
   * currently under the cursor, if one is stored there.
   */
  private selectGraphicRendition(params: number[]): void {
    const cell = this.currentRow()?.[this.pos.x];
    for (const param of params) {
      if (param === 0) {
        this.pen = createDefaultPen();
        if (cell) Object.assign(cell, createDefaultPen());
      } else if (param === 1 || param === 22) {
        this.pen.bold = param === 1;
        if (cell) cell.bold = param === 1;
      } else if (param === 4 || param === 24) {
        this.pen.underline = param === 4;
        if (cell) cell.underline = param === 4;
      } else if ((param >= 30 && param <= 37) || param === 39) {
        const color = param === 39 ? null : toAnsiColor(param - 30);
        this.pen.fg = color;
        if (cell) cell.fg = color;
      } else if ((param >= 40 && param <= 47) || param === 49) {
        const color = param === 49 ? null : toAnsiColor(param - 40);
        this.pen.bg = color;
        if (cell) cell.bg = color;
      } else {
        this.logger.debug(`unhandled SGR parameter ${param}`);
      }
    }
  }

  private esc(event: EscEvent): void {
    // ST closing an OSC/DCS string
    if (event.final === "\\" && !event.intermediates) return;
    if (!event.ignore && event.intermediates.length === 1 && "()*+".includes(event.intermediates)) {
      this.logger.debug(`charset designation ESC ${event.intermediates}${event.final} ignored`);
      return;
    }
    this.logger.debug(`unhandled ESC ${event.intermediates}${event.final}`);
  }

  private osc(event: OscEvent): void {
    const command = event.params[0] ? textDecoder.decode(event.params[0]) : "";
    this.logger.debug(`unhandled OSC ${command || "(empty)"}`);
  }
}
