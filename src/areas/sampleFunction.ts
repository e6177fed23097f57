import type { AreaBoundary } from '../drawables/types';

/**
 * Value of an area boundary at `x`: the function's value, the constant, or 0 for the x-axis.
 * Throws and non-finite results become `null`.
 */
export function evaluateBoundary(boundary: AreaBoundary, x: number): number | null {
  if (boundary === null) return 0;
  if (typeof boundary === 'number') return Number.isFinite(boundary) ? boundary : null;
  try {
    const y = boundary.evaluate(x);
    return typeof y === 'number' && Number.isFinite(y) ? y : null;
  } catch {
    return null;
  }
}

export interface DeclaredDomain {
  readonly left?: number;
  readonly right?: number;
}

export function boundaryDomain(boundary: AreaBoundary): DeclaredDomain {
  if (boundary === null || typeof boundary === 'number') return {};
  const finiteOrUndefined = (v: number | undefined): number | undefined =>
    v !== undefined && Number.isFinite(v) ? v : undefined;
  return { left: finiteOrUndefined(boundary.leftBound), right: finiteOrUndefined(boundary.rightBound) };
}

/** Tightest interval satisfying every declared bound; sides nobody declares stay undefined. */
export function intersectDomains(...domains: readonly DeclaredDomain[]): DeclaredDomain {
  let left: number | undefined;
  let right: number | undefined;
  for (const d of domains) {
    if (d.left !== undefined) left = left === undefined ? d.left : Math.max(left, d.left);
    if (d.right !== undefined) right = right === undefined ? d.right : Math.min(right, d.right);
  }
  return { left, right };
}

/** `count` (>= 2) evenly spaced values from `left` to `right` inclusive. */
export function linspace(left: number, right: number, count: number): number[] {
  const n = Math.max(2, Math.floor(count));
  const step = (right - left) / (n - 1);
  return Array.from({ length: n }, (_, i) => (i === n - 1 ? right : left + i * step));
}
