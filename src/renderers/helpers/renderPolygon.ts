import { projectPoint } from '../../core/coordinateMapper';
import type { PolygonDrawable } from '../../drawables/types';
import { orderSegmentsIntoLoop } from '../../geometry/polygonLoop';
import type { ScreenPoint } from '../../geometry/types';
import type { DrawContext } from '../drawContext';
import { withShape } from '../primitives';

/** Outlines the polygon's vertex loop. Polygons not flagged renderable are skipped. */
export function renderPolygon(context: DrawContext, polygon: PolygonDrawable): boolean {
  if (!polygon.isRenderable) return false;
  const loop = orderSegmentsIntoLoop(polygon.segments);
  if (!loop) return false;

  const points: ScreenPoint[] = [];
  for (const v of loop) {
    const p = projectPoint(context.mapper, v.x, v.y);
    if (!p) return false;
    points.push(p);
  }

  const { primitives, style } = context;
  withShape(primitives, () => {
    primitives.fillPolygon(points, { color: style.fillStyle }, {
      color: polygon.color ?? style.polygonColor,
      width: style.polygonStrokeWidth,
    });
  });
  return true;
}
