import { renderDefaults } from '../../config/defaults';
import { effectiveScale, projectPoint, tryVisibleBounds } from '../../core/coordinateMapper';
import type { CartesianGrid } from '../../drawables/types';
import type { DrawContext } from '../drawContext';
import { withShape, type TextAlignment } from '../primitives';
import { formatTickValue, gridValues, niceGridStep } from './gridLayout';

const xTickAlignment: TextAlignment = { horizontal: 'center', vertical: 'top' };
const yTickAlignment: TextAlignment = { horizontal: 'left', vertical: 'middle' };
const originAlignment: TextAlignment = { horizontal: 'left', vertical: 'top' };

/**
 * Grid lines at a "nice" spacing across the visible range, then the axes through the origin
 * (when it is in view) with tick marks and tick labels.
 */
export function renderCartesianGrid(context: DrawContext, grid: CartesianGrid): boolean {
  const { mapper, primitives, style } = context;
  const visible = tryVisibleBounds(mapper);
  if (!visible) return false;
  const topLeft = projectPoint(mapper, visible.left, visible.top);
  const bottomRight = projectPoint(mapper, visible.right, visible.bottom);
  const origin = projectPoint(mapper, 0, 0);
  if (!topLeft || !bottomRight || !origin) return false;

  const step = niceGridStep(effectiveScale(mapper), renderDefaults.gridMinSpacingPx);
  const xs = gridValues(visible.left, visible.right, step);
  const ys = gridValues(visible.bottom, visible.top, step);
  const screenX = (x: number): number => projectPoint(mapper, x, 0)?.x ?? Number.NaN;
  const screenY = (y: number): number => projectPoint(mapper, 0, y)?.y ?? Number.NaN;

  withShape(primitives, () => {
    if (grid.showGrid) {
      const stroke = { color: style.cartesianGridColor, width: style.cartesianGridStrokeWidth };
      for (const x of xs) {
        const sx = screenX(x);
        primitives.strokeLine({ x: sx, y: topLeft.y }, { x: sx, y: bottomRight.y }, stroke);
      }
      for (const y of ys) {
        const sy = screenY(y);
        primitives.strokeLine({ x: topLeft.x, y: sy }, { x: bottomRight.x, y: sy }, stroke);
      }
    }
    if (!grid.showAxes) return;

    const axis = { color: style.cartesianAxisColor, width: style.cartesianAxisStrokeWidth };
    const tick = style.cartesianTickSize;
    const font = { family: style.fontFamily, size: style.cartesianTickFontSize };
    const xAxisVisible = visible.bottom <= 0 && visible.top >= 0;
    const yAxisVisible = visible.left <= 0 && visible.right >= 0;

    if (xAxisVisible) {
      primitives.strokeLine({ x: topLeft.x, y: origin.y }, { x: bottomRight.x, y: origin.y }, axis);
      for (const x of xs) {
        if (x === 0) continue;
        const sx = screenX(x);
        primitives.strokeLine({ x: sx, y: origin.y - tick }, { x: sx, y: origin.y + tick }, axis);
        if (grid.showTickLabels) {
          primitives.drawText(formatTickValue(x), { x: sx, y: origin.y + tick }, font, style.cartesianLabelColor, xTickAlignment);
        }
      }
    }
    if (yAxisVisible) {
      primitives.strokeLine({ x: origin.x, y: topLeft.y }, { x: origin.x, y: bottomRight.y }, axis);
      for (const y of ys) {
        if (y === 0) continue;
        const sy = screenY(y);
        primitives.strokeLine({ x: origin.x - tick, y: sy }, { x: origin.x + tick, y: sy }, axis);
        if (grid.showTickLabels) {
          primitives.drawText(formatTickValue(y), { x: origin.x + tick, y: sy }, font, style.cartesianLabelColor, yTickAlignment);
        }
      }
    }
    if (grid.showTickLabels && xAxisVisible && yAxisVisible) {
      primitives.drawText('0', { x: origin.x + tick, y: origin.y + tick }, font, style.cartesianLabelColor, originAlignment);
    }
  });
  return true;
}
