import { projectPoint } from '../../core/coordinateMapper';
import type { PointDrawable } from '../../drawables/types';
import { estimateTextRect } from '../../labels/fontSizing';
import type { DrawContext } from '../drawContext';
import { defaultTextAlignment, withShape } from '../primitives';

const formatCoordinate = (value: number): string => {
  const rounded = Math.round(value * 1000) / 1000;
  return String(Object.is(rounded, -0) ? 0 : rounded);
};

export const pointLabelText = (point: PointDrawable): string =>
  `${point.name}(${formatCoordinate(point.x)}, ${formatCoordinate(point.y)})`;

/** Filled dot plus a `name(x, y)` label up and to the right, nudged clear of earlier labels. */
export function renderPoint(context: DrawContext, point: PointDrawable): boolean {
  const { primitives, style } = context;
  const center = projectPoint(context.mapper, point.x, point.y);
  if (!center) return false;

  const radius = style.pointRadius;
  withShape(primitives, () => {
    if (radius > 0) {
      primitives.fillCircle(center, radius, { color: point.color ?? style.pointColor });
    }
    if (point.showLabel === false) return;

    const text = pointLabelText(point);
    const fontSize = style.pointLabelFontSize;
    const anchor = { x: center.x + radius, y: center.y - radius };
    const rect = estimateTextRect([text], anchor, fontSize, defaultTextAlignment);
    const dy = context.labels.getOrPlaceDy(`point:${point.name}`, rect, fontSize);
    primitives.drawText(
      text,
      { x: anchor.x, y: anchor.y + dy },
      { family: style.fontFamily, size: fontSize },
      style.pointLabelColor,
      defaultTextAlignment
    );
  });
  return true;
}
