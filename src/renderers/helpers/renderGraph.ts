import { projectPoint } from '../../core/coordinateMapper';
import type { GraphDrawable } from '../../drawables/types';
import type { ScreenPoint } from '../../geometry/types';
import type { DrawContext } from '../drawContext';
import { defaultTextAlignment, withShape } from '../primitives';
import { drawArrow } from './renderVector';

/** Edges first (arrows when directed), then vertex dots with their names on top. */
export function renderGraph(context: DrawContext, graph: GraphDrawable): boolean {
  const positions = new Map<string, ScreenPoint>();
  for (const v of graph.vertices) {
    const p = projectPoint(context.mapper, v.x, v.y);
    if (!p) return false;
    positions.set(v.name, p);
  }

  const { primitives, style } = context;
  const color = graph.color ?? style.segmentColor;
  withShape(primitives, () => {
    for (const edge of graph.edges) {
      const from = positions.get(edge.from);
      const to = positions.get(edge.to);
      if (!from || !to) continue;
      if (graph.directed) {
        drawArrow(primitives, from, to, color, style.segmentStrokeWidth, style.vectorTipSize);
      } else {
        primitives.strokeLine(from, to, { color, width: style.segmentStrokeWidth });
      }
    }

    const font = { family: style.fontFamily, size: style.pointLabelFontSize };
    for (const [name, p] of positions) {
      if (style.pointRadius > 0) primitives.fillCircle(p, style.pointRadius, { color: style.pointColor });
      if (name.length > 0) {
        primitives.drawText(
          name,
          { x: p.x + style.pointRadius, y: p.y - style.pointRadius },
          font,
          style.pointLabelColor,
          defaultTextAlignment
        );
      }
    }
  });
  return true;
}
