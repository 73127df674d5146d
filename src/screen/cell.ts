import type { AnsiColor, Cell, Pen } from "./types";

/** Sentinel character of a cell that has nothing to draw. */
export const EMPTY_CHAR = "\0";

export function createDefaultPen(): Pen {
  return { fg: null, bg: null, bold: false, underline: false };
}

export function createEmptyCell(): Cell {
  return { char: EMPTY_CHAR, fg: null, bg: null, bold: false, underline: false };
}

/** Shared read-only empty cell returned for positions outside stored rows. */
export const EMPTY_CELL: Readonly<Cell> = Object.freeze(createEmptyCell());

export function resetCell(cell: Cell): void {
  cell.char = EMPTY_CHAR;
  cell.fg = null;
  cell.bg = null;
  cell.bold = false;
  cell.underline = false;
}

export function isEmptyCell(cell: Readonly<Cell>): boolean {
  return cell.char === EMPTY_CHAR;
}

export function toAnsiColor(value: number): AnsiColor | null {
  switch (value) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
    case 6:
    case 7:
      return value;
    default:
      return null;
  }
}
