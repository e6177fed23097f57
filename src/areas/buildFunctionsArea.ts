import { renderDefaults } from '../config/defaults';
import { projectPoint, tryVisibleBounds, type CoordinateMapperLike } from '../core/coordinateMapper';
import type { FunctionsBoundedAreaDrawable } from '../drawables/types';
import type { ScreenPoint } from '../geometry/types';
import type { ClosedArea } from './closedArea';
import { boundaryDomain, evaluateBoundary, intersectDomains, linspace } from './sampleFunction';

export interface AreaBuildOptions {
  /** Overrides the drawable's own sample count. */
  readonly samples?: number;
}

interface SamplePair {
  readonly upper: ScreenPoint;
  readonly lower: ScreenPoint;
}

/**
 * Resolves the x-range of a function-bounded area: the intersection of both boundaries'
 * declared domains and the area's own bounds, clipped to the visible range when the mapper
 * reports one. Sides nobody declares fall back to the visible range, then to [-10, 10].
 */
export function resolveFunctionsAreaBounds(
  area: FunctionsBoundedAreaDrawable,
  mapper: CoordinateMapperLike
): { readonly left: number; readonly right: number } | null {
  const declared = intersectDomains(
    boundaryDomain(area.func1),
    boundaryDomain(area.func2),
    { left: area.leftBound, right: area.rightBound }
  );
  const visible = tryVisibleBounds(mapper);
  const [fallbackLeft, fallbackRight] = renderDefaults.fallbackDomain;

  let left = declared.left ?? visible?.left ?? fallbackLeft;
  let right = declared.right ?? visible?.right ?? fallbackRight;
  if (visible) {
    left = Math.max(left, visible.left);
    right = Math.min(right, visible.right);
  }
  return Number.isFinite(left) && Number.isFinite(right) && left < right ? { left, right } : null;
}

/** Longest run of consecutive non-null entries (first one wins ties). */
const longestRun = <T>(items: readonly (T | null)[]): T[] => {
  let best: T[] = [];
  let current: T[] = [];
  for (const item of items) {
    if (item === null) {
      if (current.length > best.length) best = current;
      current = [];
    } else {
      current.push(item);
    }
  }
  return current.length > best.length ? current : best;
};

/**
 * Region between two function boundaries (a function, a constant, or the x-axis).
 *
 * Samples where either side cannot be evaluated or projected split the curve; the longest
 * unbroken stretch is filled. Returns null when no stretch has two samples.
 */
export function buildFunctionsBoundedArea(
  area: FunctionsBoundedAreaDrawable,
  mapper: CoordinateMapperLike,
  options?: AreaBuildOptions
): ClosedArea | null {
  try {
    const bounds = resolveFunctionsAreaBounds(area, mapper);
    if (!bounds) return null;

    const samples = options?.samples ?? area.samples ?? renderDefaults.areaSamples;
    const pairs = linspace(bounds.left, bounds.right, samples).map((x): SamplePair | null => {
      const y1 = evaluateBoundary(area.func1, x);
      const y2 = evaluateBoundary(area.func2, x);
      if (y1 === null || y2 === null) return null;
      const upper = projectPoint(mapper, x, y1);
      const lower = projectPoint(mapper, x, y2);
      return upper && lower ? { upper, lower } : null;
    });

    const run = longestRun(pairs);
    if (run.length < 2) return null;
    return {
      forward: run.map((p) => p.upper),
      reverse: run.map((p) => p.lower).reverse(),
      color: area.color,
      opacity: area.opacity,
    };
  } catch (error) {
    console.warn(`buildFunctionsBoundedArea(${area.name}): area skipped.`, error);
    return null;
  }
}
