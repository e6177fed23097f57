import { renderDefaults } from '../config/defaults';
import type { MathPoint, ScreenPoint } from '../geometry/types';

/** Math-space rectangle. `top` is the larger y. */
export interface VisibleBounds {
  readonly left: number;
  readonly right: number;
  readonly top: number;
  readonly bottom: number;
}

/**
 * The narrow contract every draw handler and area builder consumes.
 *
 * Implementations may throw or return null/non-finite values; callers go through
 * {@link projectPoint} / {@link projectLength} which turn all of those into `null`.
 */
export interface CoordinateMapperLike {
  mathToScreen(x: number, y: number): ScreenPoint | null;
  scaleValue(length: number): number | null;
  readonly scaleFactor: number;
  /** Scale captured when zoom-relative sizing was last anchored. Defaults to 1 when absent. */
  readonly referenceScaleFactor?: number;
  getVisibleBounds?(): VisibleBounds;
}

export interface CoordinateMapperState {
  readonly scaleFactor: number;
  readonly offsetX: number;
  readonly offsetY: number;
  readonly referenceScaleFactor: number;
  readonly zoomStep: number;
}

export interface CoordinateMapperOptions {
  readonly width: number;
  readonly height: number;
  /** Pixels per math unit. Default: 1. */
  readonly scaleFactor?: number;
  /** Relative zoom per step. Default: 0.1. */
  readonly zoomStep?: number;
}

export type ZoomDirection = 'in' | 'out';

export interface CoordinateMapper extends CoordinateMapperLike {
  readonly referenceScaleFactor: number;
  readonly canvasWidth: number;
  readonly canvasHeight: number;
  screenToMath(sx: number, sy: number): MathPoint | null;
  unscaleValue(length: number): number | null;
  /** Anchors zoom-relative sizing at `value` (default: the current scale). */
  setReferenceScale(value?: number): void;
  /** Multiplies the scale. When `center` is given, the math point under it stays fixed on screen. */
  applyZoom(factor: number, center?: ScreenPoint): void;
  applyZoomStep(direction: ZoomDirection, center?: ScreenPoint): void;
  applyPan(dx: number, dy: number): void;
  resetPan(): void;
  resetTransformations(): void;
  /**
   * Fits the given math rectangle into the canvas, preserving aspect ratio.
   * @throws {RangeError} when bounds are non-finite or enclose no area
   */
  setVisibleBounds(left: number, right: number, top: number, bottom: number): void;
  getVisibleBounds(): VisibleBounds;
  isPointVisible(sx: number, sy: number): boolean;
  isMathPointVisible(x: number, y: number): boolean;
  updateCanvasSize(width: number, height: number): void;
  getState(): CoordinateMapperState;
  setState(state: Partial<CoordinateMapperState>): void;
}

const sanitizeScale = (value: unknown): number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 1.0;

const sanitizeDimension = (value: number): number => (Number.isFinite(value) && value > 0 ? value : 0);

const sanitizeOffset = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

export function createCoordinateMapper(options: CoordinateMapperOptions): CoordinateMapper {
  let width = sanitizeDimension(options.width);
  let height = sanitizeDimension(options.height);
  let scale = sanitizeScale(options.scaleFactor);
  let referenceScale = scale;
  let offsetX = 0;
  let offsetY = 0;
  let zoomStep =
    options.zoomStep !== undefined && Number.isFinite(options.zoomStep) && options.zoomStep > 0 && options.zoomStep < 1
      ? options.zoomStep
      : renderDefaults.zoomStep;

  const originX = (): number => width / 2;
  const originY = (): number => height / 2;

  const mathToScreen = (x: number, y: number): ScreenPoint | null => {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
    const sx = originX() + x * scale + offsetX;
    const sy = originY() - y * scale + offsetY;
    return Number.isFinite(sx) && Number.isFinite(sy) ? { x: sx, y: sy } : null;
  };

  const screenToMath = (sx: number, sy: number): MathPoint | null => {
    if (!Number.isFinite(sx) || !Number.isFinite(sy)) return null;
    const x = (sx - offsetX - originX()) / scale;
    const y = (originY() + offsetY - sy) / scale;
    return Number.isFinite(x) && Number.isFinite(y) ? { x, y } : null;
  };

  const scaleValue = (length: number): number | null => {
    const v = length * scale;
    return Number.isFinite(v) ? v : null;
  };

  const unscaleValue = (length: number): number | null => {
    const v = length / scale;
    return Number.isFinite(v) ? v : null;
  };

  const applyZoom = (factor: number, center?: ScreenPoint): void => {
    if (!Number.isFinite(factor) || factor <= 0) return;
    const anchor = center ? screenToMath(center.x, center.y) : null;
    scale = Math.max(renderDefaults.minScaleFactor, scale * factor);
    if (center && anchor) {
      offsetX = center.x - originX() - anchor.x * scale;
      offsetY = center.y - originY() + anchor.y * scale;
    }
  };

  const getVisibleBounds = (): VisibleBounds => {
    const topLeft = screenToMath(0, 0) ?? { x: 0, y: 0 };
    const bottomRight = screenToMath(width, height) ?? { x: 0, y: 0 };
    return { left: topLeft.x, right: bottomRight.x, top: topLeft.y, bottom: bottomRight.y };
  };

  return {
    get scaleFactor() {
      return scale;
    },
    get referenceScaleFactor() {
      return referenceScale;
    },
    get canvasWidth() {
      return width;
    },
    get canvasHeight() {
      return height;
    },
    mathToScreen,
    screenToMath,
    scaleValue,
    unscaleValue,
    setReferenceScale(value?: number) {
      referenceScale = sanitizeScale(value ?? scale);
    },
    applyZoom,
    applyZoomStep(direction, center) {
      applyZoom(direction === 'in' ? 1 + zoomStep : 1 - zoomStep, center);
    },
    applyPan(dx, dy) {
      if (!Number.isFinite(dx) || !Number.isFinite(dy)) return;
      offsetX += dx;
      offsetY += dy;
    },
    resetPan() {
      offsetX = 0;
      offsetY = 0;
    },
    resetTransformations() {
      scale = 1.0;
      offsetX = 0;
      offsetY = 0;
    },
    setVisibleBounds(left, right, top, bottom) {
      if (![left, right, top, bottom].every(Number.isFinite)) {
        throw new RangeError('setVisibleBounds(bounds): bounds must be finite numbers.');
      }
      if (!(left < right && bottom < top)) {
        throw new RangeError(
          `setVisibleBounds(bounds): expected left < right and bottom < top. Received: ` +
            `left=${left}, right=${right}, top=${top}, bottom=${bottom}.`
        );
      }
      if (width <= 0 || height <= 0) {
        throw new RangeError('setVisibleBounds(bounds): canvas has no area.');
      }
      scale = Math.max(Math.min(width / (right - left), height / (top - bottom)), 1e-9);
      offsetX = -((left + right) / 2) * scale;
      offsetY = ((top + bottom) / 2) * scale;
    },
    getVisibleBounds,
    isPointVisible(sx, sy) {
      return sx >= 0 && sx <= width && sy >= 0 && sy <= height;
    },
    isMathPointVisible(x, y) {
      const p = mathToScreen(x, y);
      return p !== null && p.x >= 0 && p.x <= width && p.y >= 0 && p.y <= height;
    },
    updateCanvasSize(w, h) {
      width = sanitizeDimension(w);
      height = sanitizeDimension(h);
    },
    getState() {
      return { scaleFactor: scale, offsetX, offsetY, referenceScaleFactor: referenceScale, zoomStep };
    },
    setState(state) {
      scale = state.scaleFactor !== undefined ? sanitizeScale(state.scaleFactor) : scale;
      referenceScale =
        state.referenceScaleFactor !== undefined ? sanitizeScale(state.referenceScaleFactor) : referenceScale;
      offsetX = sanitizeOffset(state.offsetX, offsetX);
      offsetY = sanitizeOffset(state.offsetY, offsetY);
      if (state.zoomStep !== undefined && Number.isFinite(state.zoomStep) && state.zoomStep > 0 && state.zoomStep < 1) {
        zoomStep = state.zoomStep;
      }
    },
  };
}

/** Projects through any mapper; throws and non-finite output become `null`. */
export function projectPoint(mapper: CoordinateMapperLike, x: number, y: number): ScreenPoint | null {
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  try {
    const p = mapper.mathToScreen(x, y);
    return p && Number.isFinite(p.x) && Number.isFinite(p.y) ? { x: p.x, y: p.y } : null;
  } catch {
    return null;
  }
}

/** Scales a math length through any mapper; throws and non-finite output become `null`. */
export function projectLength(mapper: CoordinateMapperLike, length: number): number | null {
  if (!Number.isFinite(length)) return null;
  try {
    const v = mapper.scaleValue(length);
    return typeof v === 'number' && Number.isFinite(v) ? v : null;
  } catch {
    return null;
  }
}

/** The mapper's scale factor, coerced to 1 when it is not finite and positive. */
export const effectiveScale = (mapper: CoordinateMapperLike): number => {
  try {
    return sanitizeScale(mapper.scaleFactor);
  } catch {
    return 1.0;
  }
};

/** Visible math bounds when the mapper can report them. */
export const tryVisibleBounds = (mapper: CoordinateMapperLike): VisibleBounds | null => {
  if (!mapper.getVisibleBounds) return null;
  try {
    const b = mapper.getVisibleBounds();
    return [b.left, b.right, b.top, b.bottom].every(Number.isFinite) ? b : null;
  } catch {
    return null;
  }
};
