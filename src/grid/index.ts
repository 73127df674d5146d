export {
  computeCellMetrics,
  computeGridSize,
  createGridState,
  fixedCellMetrics,
  fontHeightUnits,
  updateGridState,
  type FontMetricsProvider,
} from "./grid";
export type { CellMetrics, GridConfig, GridResize, GridState } from "./types";
