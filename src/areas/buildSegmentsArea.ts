import { projectPoint, type CoordinateMapperLike } from '../core/coordinateMapper';
import type { SegmentDrawable, SegmentsBoundedAreaDrawable } from '../drawables/types';
import type { ScreenPoint } from '../geometry/types';
import type { ClosedArea } from './closedArea';

interface ScreenSegment {
  readonly a: ScreenPoint;
  readonly b: ScreenPoint;
}

const projectSegment = (segment: SegmentDrawable, mapper: CoordinateMapperLike): ScreenSegment | null => {
  const a = projectPoint(mapper, segment.p1.x, segment.p1.y);
  const b = projectPoint(mapper, segment.p2.x, segment.p2.y);
  return a && b ? { a, b } : null;
};

/** Screen y of the segment's supporting line at `x`; a vertical segment yields its first endpoint's y. */
const yAt = ({ a, b }: ScreenSegment, x: number): number =>
  b.x === a.x ? a.y : a.y + ((x - a.x) * (b.y - a.y)) / (b.x - a.x);

/**
 * One segment: trapezoid between the segment and the x-axis.
 * Two segments: trapezoid between them over their shared x-range; null when that range is empty.
 */
export function buildSegmentsBoundedArea(area: SegmentsBoundedAreaDrawable, mapper: CoordinateMapperLike): ClosedArea | null {
  try {
    const first = projectSegment(area.segment1, mapper);
    if (!first) return null;

    if (!area.segment2) {
      const axisAtA = projectPoint(mapper, area.segment1.p1.x, 0);
      const axisAtB = projectPoint(mapper, area.segment1.p2.x, 0);
      if (!axisAtA || !axisAtB) return null;
      return {
        forward: [first.a, first.b],
        reverse: [
          { x: first.b.x, y: axisAtB.y },
          { x: first.a.x, y: axisAtA.y },
        ],
        color: area.color,
        opacity: area.opacity,
      };
    }

    const second = projectSegment(area.segment2, mapper);
    if (!second) return null;

    const overlapMin = Math.max(Math.min(first.a.x, first.b.x), Math.min(second.a.x, second.b.x));
    const overlapMax = Math.min(Math.max(first.a.x, first.b.x), Math.max(second.a.x, second.b.x));
    if (!(overlapMax > overlapMin)) return null;

    return {
      forward: [
        { x: overlapMin, y: yAt(first, overlapMin) },
        { x: overlapMax, y: yAt(first, overlapMax) },
      ],
      reverse: [
        { x: overlapMax, y: yAt(second, overlapMax) },
        { x: overlapMin, y: yAt(second, overlapMin) },
      ],
      color: area.color,
      opacity: area.opacity,
    };
  } catch (error) {
    console.warn(`buildSegmentsBoundedArea(${area.name}): area skipped.`, error);
    return null;
  }
}
