import { projectPoint } from '../../core/coordinateMapper';
import type { SegmentDrawable } from '../../drawables/types';
import type { DrawContext } from '../drawContext';
import { withShape } from '../primitives';

export function renderSegment(context: DrawContext, segment: SegmentDrawable): boolean {
  const from = projectPoint(context.mapper, segment.p1.x, segment.p1.y);
  const to = projectPoint(context.mapper, segment.p2.x, segment.p2.y);
  if (!from || !to) return false;

  const { primitives, style } = context;
  withShape(primitives, () => {
    primitives.strokeLine(from, to, { color: segment.color ?? style.segmentColor, width: style.segmentStrokeWidth });
  });
  return true;
}
