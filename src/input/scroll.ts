import type { ScrollTarget } from "./types";

export const DEFAULT_MAX_SCROLL_STEP = 5;

/** Truncate a wheel delta to whole rows within ±maxStep. */
export function wheelDeltaToRows(delta: number, maxStep = DEFAULT_MAX_SCROLL_STEP): number {
  if (!Number.isFinite(delta)) return 0;
  const rows = Math.trunc(Math.max(-maxStep, Math.min(maxStep, delta)));
  return rows === 0 ? 0 : rows;
}

/**
 * Scroll the viewport for a wheel delta. Positive deltas move towards older
 * rows, so they lower the target's top row.
 */
export function applyWheelScroll(
  target: ScrollTarget,
  delta: number,
  maxStep = DEFAULT_MAX_SCROLL_STEP,
): number {
  const rows = wheelDeltaToRows(delta, maxStep);
  if (rows !== 0) target.scroll(-rows);
  return rows;
}
