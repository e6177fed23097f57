import { renderDefaults } from '../config/defaults';
import { projectPoint, type CoordinateMapperLike } from '../core/coordinateMapper';
import type { FunctionSegmentAreaDrawable } from '../drawables/types';
import type { ScreenPoint } from '../geometry/types';
import type { AreaBuildOptions } from './buildFunctionsArea';
import type { ClosedArea } from './closedArea';
import { boundaryDomain, evaluateBoundary, intersectDomains, linspace } from './sampleFunction';

/**
 * Region between a function boundary and a segment, over the segment's x-extent clipped to
 * the function's domain.
 *
 * Samples the function cannot produce are dropped. The closing edge runs back along the
 * segment from its right end to its left end.
 */
export function buildFunctionSegmentArea(
  area: FunctionSegmentAreaDrawable,
  mapper: CoordinateMapperLike,
  options?: AreaBuildOptions
): ClosedArea | null {
  try {
    const { p1, p2 } = area.segment;
    const [leftEnd, rightEnd] = p1.x <= p2.x ? [p1, p2] : [p2, p1];
    const { left, right } = intersectDomains({ left: leftEnd.x, right: rightEnd.x }, boundaryDomain(area.func));
    if (left === undefined || right === undefined || !(left < right)) return null;

    const samples = options?.samples ?? area.samples ?? renderDefaults.areaSamples;
    const forward: ScreenPoint[] = [];
    for (const x of linspace(left, right, samples)) {
      const y = evaluateBoundary(area.func, x);
      if (y === null) continue;
      const p = projectPoint(mapper, x, y);
      if (p) forward.push(p);
    }
    if (forward.length < 2) return null;

    const end = projectPoint(mapper, rightEnd.x, rightEnd.y);
    const start = projectPoint(mapper, leftEnd.x, leftEnd.y);
    if (!end || !start) return null;

    return { forward, reverse: [end, start], color: area.color, opacity: area.opacity };
  } catch (error) {
    console.warn(`buildFunctionSegmentArea(${area.name}): area skipped.`, error);
    return null;
  }
}
