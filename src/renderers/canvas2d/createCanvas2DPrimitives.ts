import type { ScreenPoint } from '../../geometry/types';
import { toCssFont, type FillStyle, type RendererPrimitives, type StrokeStyle } from '../primitives';

export interface Canvas2DPrimitivesOptions {
  /** Painted by `clearSurface()`; transparent when absent. */
  readonly background?: string;
}

const TAU = Math.PI * 2;

/**
 * Immediate-mode surface over a 2D canvas context. Each shape runs inside `save()`/`restore()`
 * so style changes never leak between drawables.
 *
 * @throws {Error} when the canvas has no 2D context
 */
export function createCanvas2DPrimitives(canvas: HTMLCanvasElement, options?: Canvas2DPrimitivesOptions): RendererPrimitives {
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error('createCanvas2DPrimitives(canvas): canvas.getContext("2d") returned null.');
  }
  let disposed = false;

  const applyStroke = (stroke: StrokeStyle): void => {
    ctx.strokeStyle = stroke.color;
    ctx.lineWidth = stroke.width;
  };

  const applyFill = (fill: FillStyle): void => {
    ctx.fillStyle = fill.color;
    ctx.globalAlpha = fill.opacity ?? 1;
  };

  const tracePath = (points: readonly ScreenPoint[]): void => {
    ctx.beginPath();
    points.forEach((p, i) => {
      if (i === 0) ctx.moveTo(p.x, p.y);
      else ctx.lineTo(p.x, p.y);
    });
  };

  const clearSurface = (): void => {
    if (disposed) return;
    ctx.save();
    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.clearRect(0, 0, canvas.width, canvas.height);
    if (options?.background) {
      ctx.fillStyle = options.background;
      ctx.fillRect(0, 0, canvas.width, canvas.height);
    }
    ctx.restore();
  };

  return {
    backend: 'canvas2d',
    beginFrame: clearSurface,
    endFrame() {
      // Immediate mode: everything is already on the canvas.
    },
    clearSurface,
    dispose() {
      disposed = true;
    },
    beginShape() {
      ctx.save();
    },
    endShape() {
      ctx.restore();
    },
    strokeLine(from, to, stroke) {
      applyStroke(stroke);
      tracePath([from, to]);
      ctx.stroke();
    },
    strokePolyline(points, stroke) {
      if (points.length < 2) return;
      applyStroke(stroke);
      tracePath(points);
      ctx.stroke();
    },
    strokeCircle(center, radius, stroke) {
      applyStroke(stroke);
      ctx.beginPath();
      ctx.arc(center.x, center.y, radius, 0, TAU);
      ctx.stroke();
    },
    fillCircle(center, radius, fill) {
      applyFill(fill);
      ctx.beginPath();
      ctx.arc(center.x, center.y, radius, 0, TAU);
      ctx.fill();
    },
    strokeEllipse(center, radiusX, radiusY, rotation, stroke) {
      applyStroke(stroke);
      ctx.beginPath();
      ctx.ellipse(center.x, center.y, radiusX, radiusY, rotation, 0, TAU);
      ctx.stroke();
    },
    fillPolygon(points, fill, stroke) {
      if (points.length < 3) return;
      tracePath(points);
      ctx.closePath();
      applyFill(fill);
      ctx.fill();
      if (stroke) {
        ctx.globalAlpha = 1;
        applyStroke(stroke);
        ctx.stroke();
      }
    },
    fillJoinedArea(forward, reverse, fill) {
      tracePath([...forward, ...reverse]);
      ctx.closePath();
      applyFill(fill);
      ctx.fill();
    },
    strokeArc(center, radius, startAngle, endAngle, anticlockwise, stroke) {
      applyStroke(stroke);
      ctx.beginPath();
      ctx.arc(center.x, center.y, radius, startAngle, endAngle, anticlockwise);
      ctx.stroke();
    },
    drawText(text, position, font, color, alignment, rotation) {
      ctx.font = toCssFont(font);
      ctx.fillStyle = color;
      ctx.textAlign = alignment.horizontal;
      ctx.textBaseline = alignment.vertical;
      if (rotation) {
        ctx.save();
        ctx.translate(position.x, position.y);
        ctx.rotate((rotation * Math.PI) / 180);
        ctx.fillText(text, 0, 0);
        ctx.restore();
      } else {
        ctx.fillText(text, position.x, position.y);
      }
    },
  };
}
