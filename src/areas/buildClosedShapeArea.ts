import { renderDefaults } from '../config/defaults';
import { projectPoint, type CoordinateMapperLike } from '../core/coordinateMapper';
import type { CircleDrawable, ClosedShapeAreaDrawable, EllipseDrawable, SegmentDrawable } from '../drawables/types';
import {
  arcAngleSequence,
  ellipseSegmentIntersections,
  pointOnEllipse,
  sampleClosedEllipse,
  type EllipseGeometry,
} from '../geometry/arcSampling';
import { orderSegmentsIntoLoop } from '../geometry/polygonLoop';
import type { MathPoint, ScreenPoint } from '../geometry/types';
import type { ClosedArea } from './closedArea';

interface MathLoop {
  readonly forward: readonly MathPoint[];
  readonly reverse: readonly MathPoint[];
}

const circleGeometry = (c: CircleDrawable): EllipseGeometry => ({
  cx: c.center.x,
  cy: c.center.y,
  rx: c.radius,
  ry: c.radius,
  rotation: 0,
});

const ellipseGeometry = (e: EllipseDrawable): EllipseGeometry => ({
  cx: e.center.x,
  cy: e.center.y,
  rx: e.radiusX,
  ry: e.radiusY,
  rotation: e.rotation,
});

const outline = (points: readonly MathPoint[]): MathLoop | null =>
  points.length >= 3 ? { forward: points, reverse: [...points].reverse() } : null;

/** Arc cut off by `chord`, closed by the chord itself. Needs two boundary crossings. */
const chordSegment = (
  geometry: EllipseGeometry,
  chord: SegmentDrawable,
  samples: number,
  clockwise: boolean
): MathLoop | null => {
  const crossings = ellipseSegmentIntersections(geometry, chord.p1, chord.p2);
  if (crossings.length < 2) return null;
  const [start, end] = crossings;
  const arc = arcAngleSequence(start.angle, end.angle, samples, clockwise).map((angle) => pointOnEllipse(geometry, angle));
  // Pin the ends to the exact crossings.
  arc[0] = { x: start.x, y: start.y };
  arc[arc.length - 1] = { x: end.x, y: end.y };
  return { forward: arc, reverse: [arc[arc.length - 1], arc[0]] };
};

const mathLoopFor = (area: ClosedShapeAreaDrawable): MathLoop | null => {
  const shape = area.shape;
  switch (shape.kind) {
    case 'polygon': {
      const loop = orderSegmentsIntoLoop(shape.segments);
      return loop ? outline(loop) : null;
    }
    case 'circle':
      return outline(sampleClosedEllipse(circleGeometry(shape.circle), area.resolution ?? renderDefaults.closedShapeResolution));
    case 'ellipse':
      return outline(
        sampleClosedEllipse(ellipseGeometry(shape.ellipse), area.resolution ?? renderDefaults.closedShapeResolution)
      );
    case 'circleSegment':
      return chordSegment(
        circleGeometry(shape.circle),
        shape.chord,
        area.resolution ?? renderDefaults.chordSegmentResolution,
        shape.clockwise ?? false
      );
    case 'ellipseSegment':
      return chordSegment(
        ellipseGeometry(shape.ellipse),
        shape.chord,
        area.resolution ?? renderDefaults.chordSegmentResolution,
        shape.clockwise ?? false
      );
  }
};

const projectAll = (points: readonly MathPoint[], mapper: CoordinateMapperLike): ScreenPoint[] | null => {
  const out: ScreenPoint[] = [];
  for (const p of points) {
    const s = projectPoint(mapper, p.x, p.y);
    if (!s) return null;
    out.push(s);
  }
  return out;
};

/**
 * Fill region of an already-closed boundary: a polygon's segment loop, a circle or ellipse,
 * or the part of one cut off by a chord.
 */
export function buildClosedShapeArea(area: ClosedShapeAreaDrawable, mapper: CoordinateMapperLike): ClosedArea | null {
  try {
    const loop = mathLoopFor(area);
    if (!loop) return null;
    const forward = projectAll(loop.forward, mapper);
    const reverse = projectAll(loop.reverse, mapper);
    if (!forward || !reverse) return null;
    return { forward, reverse, color: area.color, opacity: area.opacity };
  } catch (error) {
    console.warn(`buildClosedShapeArea(${area.name}): area skipped.`, error);
    return null;
  }
}
