import { renderDefaults } from '../../config/defaults';
import { effectiveScale, projectPoint, tryVisibleBounds } from '../../core/coordinateMapper';
import type { PolarGrid } from '../../drawables/types';
import type { DrawContext } from '../drawContext';
import { withShape, type TextAlignment } from '../primitives';
import { formatTickValue, niceGridStep } from './gridLayout';

const radiusAlignment: TextAlignment = { horizontal: 'left', vertical: 'top' };
const angleAlignment: TextAlignment = { horizontal: 'center', vertical: 'middle' };

/**
 * Concentric circles at a "nice" radial spacing and `angularDivisions` radial lines from the
 * origin. Only circles that cross the visible range are drawn.
 */
export function renderPolarGrid(context: DrawContext, grid: PolarGrid): boolean {
  const { mapper, primitives, style } = context;
  const visible = tryVisibleBounds(mapper);
  const origin = projectPoint(mapper, 0, 0);
  if (!visible || !origin) return false;

  const scale = effectiveScale(mapper);
  const step = niceGridStep(scale, renderDefaults.gridMinSpacingPx);
  const maxRadius = Math.max(
    Math.hypot(visible.left, visible.top),
    Math.hypot(visible.right, visible.top),
    Math.hypot(visible.left, visible.bottom),
    Math.hypot(visible.right, visible.bottom)
  );
  const gapX = Math.max(visible.left, 0, -visible.right);
  const gapY = Math.max(visible.bottom, 0, -visible.top);
  const minRadius = Math.hypot(gapX, gapY);

  const radii: number[] = [];
  for (let k = Math.max(1, Math.ceil(minRadius / step)); k * step <= maxRadius; k++) {
    radii.push(Number((k * step).toPrecision(12)));
  }

  const divisions = Math.max(1, Math.floor(grid.angularDivisions));
  withShape(primitives, () => {
    const circleStroke = { color: style.polarCircleColor, width: style.polarStrokeWidth };
    for (const r of radii) primitives.strokeCircle(origin, r * scale, circleStroke);

    const radialStroke = { color: style.polarRadialColor, width: style.polarStrokeWidth };
    for (let k = 0; k < divisions; k++) {
      const theta = (2 * Math.PI * k) / divisions;
      const end = projectPoint(mapper, maxRadius * Math.cos(theta), maxRadius * Math.sin(theta));
      if (end) primitives.strokeLine(origin, end, radialStroke);
    }

    if (!grid.showLabels) return;
    const font = { family: style.fontFamily, size: style.polarLabelFontSize };
    for (const r of radii) {
      primitives.drawText(formatTickValue(r), { x: origin.x + r * scale, y: origin.y }, font, style.polarLabelColor, radiusAlignment);
    }
    const labelRadius = radii.length > 0 ? radii[radii.length - 1] : step;
    for (let k = 0; k < divisions; k++) {
      const theta = (2 * Math.PI * k) / divisions;
      const at = projectPoint(mapper, labelRadius * Math.cos(theta), labelRadius * Math.sin(theta));
      if (at) {
        primitives.drawText(`${formatTickValue((360 * k) / divisions)}°`, at, font, style.polarLabelColor, angleAlignment);
      }
    }
  });
  return true;
}
