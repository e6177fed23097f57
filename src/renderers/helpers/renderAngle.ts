import { projectPoint } from '../../core/coordinateMapper';
import type { AngleDrawable } from '../../drawables/types';
import { estimateTextRect } from '../../labels/fontSizing';
import type { DrawContext } from '../drawContext';
import { withShape, type TextAlignment } from '../primitives';

const TAU = Math.PI * 2;
const centered: TextAlignment = { horizontal: 'center', vertical: 'middle' };

/** Wraps a sweep into (-π, π]. */
const wrapSweep = (delta: number): number => {
  let d = delta % TAU;
  if (d > Math.PI) d -= TAU;
  if (d <= -Math.PI) d += TAU;
  return d;
};

/**
 * Screen-space sweep from arm1 to arm2 around the vertex, in radians (positive is clockwise on
 * screen). The inner sweep is the short way round; `reflex` takes the long way.
 */
export function angleSweep(
  vertex: { x: number; y: number },
  arm1: { x: number; y: number },
  arm2: { x: number; y: number },
  reflex: boolean
): { start: number; sweep: number } | null {
  const d1x = arm1.x - vertex.x;
  const d1y = arm1.y - vertex.y;
  const d2x = arm2.x - vertex.x;
  const d2y = arm2.y - vertex.y;
  if ((d1x === 0 && d1y === 0) || (d2x === 0 && d2y === 0)) return null;

  const start = Math.atan2(d1y, d1x);
  const inner = wrapSweep(Math.atan2(d2y, d2x) - start);
  const sweep = reflex ? (inner > 0 ? inner - TAU : inner + TAU) : inner;
  return { start, sweep };
}

export const formatDegrees = (radians: number): string => `${((Math.abs(radians) * 180) / Math.PI).toFixed(1)}°`;

/**
 * Arc between the arms plus a degree label on the bisector. The arc radius shrinks to the
 * shorter arm, and the label font shrinks with it.
 */
export function renderAngle(context: DrawContext, angle: AngleDrawable): boolean {
  const vertex = projectPoint(context.mapper, angle.vertex.x, angle.vertex.y);
  const arm1 = projectPoint(context.mapper, angle.arm1.x, angle.arm1.y);
  const arm2 = projectPoint(context.mapper, angle.arm2.x, angle.arm2.y);
  if (!vertex || !arm1 || !arm2) return false;

  const geometry = angleSweep(vertex, arm1, arm2, angle.reflex);
  if (!geometry) return false;

  const { primitives, style } = context;
  const shortestArm = Math.min(Math.hypot(arm1.x - vertex.x, arm1.y - vertex.y), Math.hypot(arm2.x - vertex.x, arm2.y - vertex.y));
  const radius = Math.min(style.angleArcRadius, shortestArm);
  const shrink = style.angleArcRadius > 0 ? radius / style.angleArcRadius : 1;
  const fontSize = Math.max(style.angleLabelFontSize * shrink, style.labelMinScreenFontPx);
  const color = angle.color ?? style.angleColor;

  withShape(primitives, () => {
    const { start, sweep } = geometry;
    primitives.strokeArc(vertex, radius, start, start + sweep, sweep < 0, { color, width: style.angleStrokeWidth });

    if (!(fontSize > style.labelVanishThresholdPx)) return;
    const bisector = start + sweep / 2;
    const textRadius = radius * style.angleTextArcRadiusFactor;
    const anchor = { x: vertex.x + textRadius * Math.cos(bisector), y: vertex.y + textRadius * Math.sin(bisector) };
    const text = formatDegrees(sweep);
    const rect = estimateTextRect([text], anchor, fontSize, centered);
    const dy = context.labels.getOrPlaceDy(`angle:${angle.name}`, rect, fontSize);
    primitives.drawText(text, { x: anchor.x, y: anchor.y + dy }, { family: style.fontFamily, size: fontSize }, color, centered);
  });
  return true;
}
