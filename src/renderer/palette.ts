import type { AnsiColor, Cell } from "../screen/types";
import type { Color, Palette } from "./types";

function rgb(r: number, g: number, b: number): Color {
  return [r / 255, g / 255, b / 255, 1];
}

export const DEFAULT_PALETTE: Readonly<Palette> = Object.freeze({
  foreground: rgb(229, 229, 229),
  background: rgb(0, 0, 0),
  ansi: Object.freeze([
    rgb(0, 0, 0),
    rgb(205, 49, 49),
    rgb(13, 188, 121),
    rgb(229, 229, 16),
    rgb(36, 114, 200),
    rgb(188, 63, 188),
    rgb(17, 168, 205),
    rgb(229, 229, 229),
  ]),
});

function ansiColor(palette: Palette, index: AnsiColor | null, fallback: Color): Color {
  if (index === null) return fallback;
  return palette.ansi[index] ?? fallback;
}

/** Resolve a cell's foreground and background through the palette. */
export function resolveCellColors(
  cell: Readonly<Cell>,
  palette: Palette = DEFAULT_PALETTE,
): { fg: Color; bg: Color | null } {
  return {
    fg: ansiColor(palette, cell.fg, palette.foreground),
    bg: cell.bg === null ? null : ansiColor(palette, cell.bg, palette.background),
  };
}
