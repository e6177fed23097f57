import type { ScreenPoint } from '../geometry/types';

/**
 * A fillable region in screen space: `forward` followed by `reverse` traces one closed loop.
 */
export interface ClosedArea {
  readonly forward: readonly ScreenPoint[];
  readonly reverse: readonly ScreenPoint[];
  readonly color?: string;
  readonly opacity?: number;
}

const LOOP_TOLERANCE = 1e-9;

export const filterFinitePoints = (points: readonly ScreenPoint[]): ScreenPoint[] =>
  points.filter((p) => Number.isFinite(p.x) && Number.isFinite(p.y));

/**
 * True when `reverse` is exactly `forward` walked backwards, i.e. the area is a single
 * closed outline (polygon, circle) rather than two boundaries joined at their ends.
 */
export function pathsFormSingleLoop(forward: readonly ScreenPoint[], reverse: readonly ScreenPoint[]): boolean {
  if (forward.length < 3 || forward.length !== reverse.length) return false;
  const n = forward.length;
  for (let i = 0; i < n; i++) {
    const a = forward[i];
    const b = reverse[n - 1 - i];
    if (Math.abs(a.x - b.x) > LOOP_TOLERANCE || Math.abs(a.y - b.y) > LOOP_TOLERANCE) return false;
  }
  return true;
}
