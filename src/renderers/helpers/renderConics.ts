import { projectLength, projectPoint } from '../../core/coordinateMapper';
import type { CircleArcDrawable, CircleDrawable, EllipseDrawable } from '../../drawables/types';
import type { DrawContext } from '../drawContext';
import { withShape } from '../primitives';

export function renderCircle(context: DrawContext, circle: CircleDrawable): boolean {
  const center = projectPoint(context.mapper, circle.center.x, circle.center.y);
  const radius = projectLength(context.mapper, circle.radius);
  if (!center || radius === null || !(radius > 0)) return false;

  const { primitives, style } = context;
  withShape(primitives, () => {
    primitives.strokeCircle(center, radius, { color: circle.color ?? style.circleColor, width: style.circleStrokeWidth });
  });
  return true;
}

const TAU = Math.PI * 2;
const MIN_SWEEP = 1e-9;

const wrapPositive = (angle: number): number => ((angle % TAU) + TAU) % TAU;

/**
 * Math-space sweep from `point1` to `point2` around the arc's center, in radians (positive is
 * counter-clockwise). Null when both endpoints lie in the same direction.
 */
export function circleArcSweep(arc: CircleArcDrawable): number | null {
  const start = Math.atan2(arc.point1.y - arc.center.y, arc.point1.x - arc.center.x);
  const target = Math.atan2(arc.point2.y - arc.center.y, arc.point2.x - arc.center.x);
  const ccw = wrapPositive(target - start);
  const cw = wrapPositive(start - target);
  if (Math.min(ccw, cw) < MIN_SWEEP) return null;

  const minor = ccw <= cw ? ccw : -cw;
  const major = ccw <= cw ? -cw : ccw;
  return arc.useMajorArc ? major : minor;
}

export function renderCircleArc(context: DrawContext, arc: CircleArcDrawable): boolean {
  const center = projectPoint(context.mapper, arc.center.x, arc.center.y);
  const start = projectPoint(context.mapper, arc.point1.x, arc.point1.y);
  const radius = projectLength(context.mapper, arc.radius);
  const sweep = circleArcSweep(arc);
  if (!center || !start || radius === null || !(radius > 0) || sweep === null) return false;

  const { primitives, style } = context;
  const startAngle = Math.atan2(start.y - center.y, start.x - center.x);
  // Screen y points down, so a counter-clockwise math sweep decreases the screen angle.
  withShape(primitives, () => {
    primitives.strokeArc(center, radius, startAngle, startAngle - sweep, sweep > 0, {
      color: arc.color ?? style.circleArcColor,
      width: style.circleArcStrokeWidth,
    });
  });
  return true;
}

export function renderEllipse(context: DrawContext, ellipse: EllipseDrawable): boolean {
  const center = projectPoint(context.mapper, ellipse.center.x, ellipse.center.y);
  const rx = projectLength(context.mapper, ellipse.radiusX);
  const ry = projectLength(context.mapper, ellipse.radiusY);
  if (!center || rx === null || ry === null || !(rx > 0) || !(ry > 0) || !Number.isFinite(ellipse.rotation)) {
    return false;
  }

  const { primitives, style } = context;
  // Counter-clockwise in math space is clockwise-negative on a y-down screen.
  const rotation = (-ellipse.rotation * Math.PI) / 180;
  withShape(primitives, () => {
    primitives.strokeEllipse(center, rx, ry, rotation, {
      color: ellipse.color ?? style.ellipseColor,
      width: style.ellipseStrokeWidth,
    });
  });
  return true;
}
