import { effectiveScale, projectPoint } from '../../core/coordinateMapper';
import type { LabelDrawable } from '../../drawables/types';
import { computeZoomAdjustedFontSize, estimateTextRect, LINE_HEIGHT_EM } from '../../labels/fontSizing';
import type { DrawContext } from '../drawContext';
import { defaultTextAlignment, withShape } from '../primitives';

/**
 * Multi-line text at a math position. Zooming out past the label's reference scale shrinks it;
 * once it falls to the vanish threshold nothing is drawn, which still counts as success.
 */
export function renderLabel(context: DrawContext, label: LabelDrawable): boolean {
  const anchor = projectPoint(context.mapper, label.position.x, label.position.y);
  if (!anchor) return false;

  const { primitives, style } = context;
  const fontSize = computeZoomAdjustedFontSize(
    label.fontSize ?? style.labelFontSize,
    label.referenceScaleFactor ?? context.mapper.referenceScaleFactor,
    effectiveScale(context.mapper),
    style
  );
  if (fontSize <= 0) return true;

  const rect = estimateTextRect(label.lines, anchor, fontSize, defaultTextAlignment);
  const dy = context.labels.getOrPlaceDy(`label:${label.name}`, rect, fontSize);
  const lineHeight = fontSize * LINE_HEIGHT_EM;
  const font = { family: style.fontFamily, size: fontSize };
  const color = label.color ?? style.labelColor;

  withShape(primitives, () => {
    label.lines.forEach((line, i) => {
      primitives.drawText(line, { x: anchor.x, y: anchor.y + dy + i * lineHeight }, font, color, defaultTextAlignment, label.rotation);
    });
  });
  return true;
}
