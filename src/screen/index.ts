export { ScreenBuffer, describeCsi } from "./screen-buffer";
export {
  EMPTY_CHAR,
  EMPTY_CELL,
  createDefaultPen,
  createEmptyCell,
  isEmptyCell,
  resetCell,
  toAnsiColor,
} from "./cell";
export type {
  AnsiColor,
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
