import { buildClosedShapeArea } from '../../areas/buildClosedShapeArea';
import { buildFunctionSegmentArea } from '../../areas/buildFunctionSegmentArea';
import { buildFunctionsBoundedArea } from '../../areas/buildFunctionsArea';
import { buildSegmentsBoundedArea } from '../../areas/buildSegmentsArea';
import { filterFinitePoints, pathsFormSingleLoop, type ClosedArea } from '../../areas/closedArea';
import type { CoordinateMapperLike } from '../../core/coordinateMapper';
import type { AreaDrawable } from '../../drawables/types';
import type { DrawContext } from '../drawContext';
import { withShape } from '../primitives';

export function buildArea(area: AreaDrawable, mapper: CoordinateMapperLike): ClosedArea | null {
  switch (area.type) {
    case 'functionsBoundedArea':
      return buildFunctionsBoundedArea(area, mapper);
    case 'functionSegmentArea':
      return buildFunctionSegmentArea(area, mapper);
    case 'segmentsBoundedArea':
      return buildSegmentsBoundedArea(area, mapper);
    case 'closedShapeArea':
      return buildClosedShapeArea(area, mapper);
  }
}

const clampOpacity = (value: number): number => (Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 1);

/**
 * Fills a built area. A single closed outline goes through `fillPolygon`; two boundaries go
 * through `fillJoinedArea`. Returns false when too few finite points survive.
 */
export function fillClosedArea(context: DrawContext, area: ClosedArea): boolean {
  const forward = filterFinitePoints(area.forward);
  const reverse = filterFinitePoints(area.reverse);
  if (forward.length < 2 || reverse.length < 1) return false;

  const { primitives, style } = context;
  const fill = {
    color: area.color ?? style.areaFillColor,
    opacity: clampOpacity(area.opacity ?? style.areaOpacity),
  };
  withShape(primitives, () => {
    if (pathsFormSingleLoop(forward, reverse)) {
      primitives.fillPolygon(forward, fill);
    } else {
      primitives.fillJoinedArea(forward, reverse, fill);
    }
  });
  return true;
}

export function renderColoredArea(context: DrawContext, area: AreaDrawable): boolean {
  const built = buildArea(area, context.mapper);
  return built !== null && fillClosedArea(context, built);
}
