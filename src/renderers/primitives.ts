import type { ScreenPoint } from '../geometry/types';

export interface StrokeStyle {
  readonly color: string;
  readonly width: number;
}

export interface FillStyle {
  readonly color: string;
  /** In [0, 1]. Default: 1. */
  readonly opacity?: number;
}

export interface FontStyle {
  readonly family: string;
  readonly size: number;
  readonly weight?: 'normal' | 'bold';
}

export type HorizontalAlign = 'left' | 'center' | 'right';
export type VerticalBaseline = 'alphabetic' | 'top' | 'middle' | 'bottom';

export interface TextAlignment {
  readonly horizontal: HorizontalAlign;
  readonly vertical: VerticalBaseline;
}

export const defaultTextAlignment: TextAlignment = { horizontal: 'left', vertical: 'alphabetic' };

/**
 * Drawing surface implemented once per backend. All coordinates are screen pixels.
 *
 * Every emit call must happen between `beginShape()` and `endShape()`; use {@link withShape}.
 */
export interface RendererPrimitives {
  readonly backend: string;
  /** Clears the surface and resets any buffered output. */
  beginFrame(): void;
  /** Flushes buffered output to the surface. */
  endFrame(): void;
  clearSurface(): void;
  /** Releases backend resources; later calls are no-ops. */
  dispose(): void;
  beginShape(): void;
  endShape(): void;
  strokeLine(from: ScreenPoint, to: ScreenPoint, stroke: StrokeStyle): void;
  strokePolyline(points: readonly ScreenPoint[], stroke: StrokeStyle): void;
  strokeCircle(center: ScreenPoint, radius: number, stroke: StrokeStyle): void;
  fillCircle(center: ScreenPoint, radius: number, fill: FillStyle): void;
  /** `rotation` in radians, clockwise on screen. */
  strokeEllipse(center: ScreenPoint, radiusX: number, radiusY: number, rotation: number, stroke: StrokeStyle): void;
  /** Closes the path back to the first point. */
  fillPolygon(points: readonly ScreenPoint[], fill: FillStyle, stroke?: StrokeStyle): void;
  /** Fills the loop `forward` then `reverse`, closed back to `forward[0]`. */
  fillJoinedArea(forward: readonly ScreenPoint[], reverse: readonly ScreenPoint[], fill: FillStyle): void;
  /** Angles in radians, clockwise on screen from +x; `anticlockwise` flips the sweep. */
  strokeArc(
    center: ScreenPoint,
    radius: number,
    startAngle: number,
    endAngle: number,
    anticlockwise: boolean,
    stroke: StrokeStyle
  ): void;
  /** `rotation` in degrees, clockwise on screen. */
  drawText(text: string, position: ScreenPoint, font: FontStyle, color: string, alignment: TextAlignment, rotation?: number): void;
}

/**
 * Runs `draw` inside `beginShape()` / `endShape()`. The shape is released even when `draw` throws
 * or returns early.
 */
export function withShape<T>(primitives: RendererPrimitives, draw: () => T): T {
  primitives.beginShape();
  try {
    return draw();
  } finally {
    primitives.endShape();
  }
}

/** Canvas/CSS font shorthand. */
export const toCssFont = (font: FontStyle): string =>
  `${font.weight === 'bold' ? 'bold ' : ''}${font.size}px ${font.family}`;
