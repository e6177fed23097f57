import { projectPoint } from '../../core/coordinateMapper';
import type { VectorDrawable } from '../../drawables/types';
import type { ScreenPoint } from '../../geometry/types';
import type { DrawContext } from '../drawContext';
import { withShape, type RendererPrimitives } from '../primitives';

/**
 * Equilateral-ish arrow head with its apex on `tip`, pointing away from `from`.
 * Returns the three corners, apex first; null for a zero-length shaft.
 */
export function arrowHead(from: ScreenPoint, tip: ScreenPoint, side: number): ScreenPoint[] | null {
  const dx = tip.x - from.x;
  const dy = tip.y - from.y;
  if ((dx === 0 && dy === 0) || !(side > 0)) return null;
  const angle = Math.atan2(dy, dx);
  const half = side / 2;
  const height = Math.sqrt(side * side - half * half);
  const baseX = tip.x - height * Math.cos(angle);
  const baseY = tip.y - height * Math.sin(angle);
  const nx = -Math.sin(angle) * half;
  const ny = Math.cos(angle) * half;
  return [tip, { x: baseX + nx, y: baseY + ny }, { x: baseX - nx, y: baseY - ny }];
}

export const drawArrow = (
  primitives: RendererPrimitives,
  from: ScreenPoint,
  tip: ScreenPoint,
  color: string,
  width: number,
  tipSize: number
): void => {
  primitives.strokeLine(from, tip, { color, width });
  const head = arrowHead(from, tip, tipSize);
  if (head) primitives.fillPolygon(head, { color });
};

export function renderVector(context: DrawContext, vector: VectorDrawable): boolean {
  const from = projectPoint(context.mapper, vector.origin.x, vector.origin.y);
  const tip = projectPoint(context.mapper, vector.tip.x, vector.tip.y);
  if (!from || !tip) return false;

  const { primitives, style } = context;
  withShape(primitives, () => {
    drawArrow(primitives, from, tip, vector.color ?? style.vectorColor, style.vectorStrokeWidth, style.vectorTipSize);
  });
  return true;
}
