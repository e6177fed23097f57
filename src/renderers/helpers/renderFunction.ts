import { renderDefaults } from '../../config/defaults';
import { effectiveScale, projectPoint, tryVisibleBounds } from '../../core/coordinateMapper';
import type { FunctionDrawable, ParametricFunctionDrawable } from '../../drawables/types';
import { evaluateBoundary, linspace } from '../../areas/sampleFunction';
import type { ScreenPoint } from '../../geometry/types';
import { estimateTextRect } from '../../labels/fontSizing';
import type { DrawContext } from '../drawContext';
import { defaultTextAlignment, withShape } from '../primitives';

/**
 * Samples `fn` across its declared domain clipped to the visible range and splits the curve
 * into polylines wherever a sample is missing or the curve jumps by more than one screen
 * height between neighbours (vertical asymptotes).
 */
export function sampleFunctionPaths(context: Pick<DrawContext, 'mapper'>, fn: FunctionDrawable): ScreenPoint[][] {
  const visible = tryVisibleBounds(context.mapper);
  const [fallbackLeft, fallbackRight] = renderDefaults.fallbackDomain;
  let left = fn.leftBound ?? visible?.left ?? fallbackLeft;
  let right = fn.rightBound ?? visible?.right ?? fallbackRight;
  if (visible) {
    left = Math.max(left, visible.left);
    right = Math.min(right, visible.right);
  }
  if (!(left < right)) return [];

  const jumpLimit = visible ? (visible.top - visible.bottom) * effectiveScale(context.mapper) : Number.POSITIVE_INFINITY;
  const paths: ScreenPoint[][] = [];
  let current: ScreenPoint[] = [];
  const flush = (): void => {
    if (current.length >= 2) paths.push(current);
    current = [];
  };

  for (const x of linspace(left, right, renderDefaults.functionSamples)) {
    const y = evaluateBoundary(fn, x);
    const p = y === null ? null : projectPoint(context.mapper, x, y);
    if (!p) {
      flush();
      continue;
    }
    const prev = current[current.length - 1];
    if (prev && Math.abs(p.y - prev.y) > jumpLimit) flush();
    current.push(p);
  }
  flush();
  return paths;
}

export function renderFunction(context: DrawContext, fn: FunctionDrawable): boolean {
  const paths = sampleFunctionPaths(context, fn);
  if (paths.length === 0) return false;

  const { primitives, style } = context;
  const color = fn.color ?? style.functionColor;
  withShape(primitives, () => {
    for (const path of paths) {
      primitives.strokePolyline(path, { color, width: style.functionStrokeWidth });
    }
    if (fn.name.length === 0) return;

    const first = paths[0][0];
    const fontSize = style.functionLabelFontSize;
    const anchor = { x: Math.max(first.x, 0), y: Math.max(first.y, fontSize) };
    const rect = estimateTextRect([fn.name], anchor, fontSize, defaultTextAlignment);
    const dy = context.labels.getOrPlaceDy(`function:${fn.name}`, rect, fontSize);
    primitives.drawText(fn.name, { x: anchor.x, y: anchor.y + dy }, { family: style.fontFamily, size: fontSize }, color, defaultTextAlignment);
  });
  return true;
}

const sampleCoordinate = (f: (t: number) => number, t: number): number | null => {
  try {
    const value = f(t);
    return Number.isFinite(value) ? value : null;
  } catch {
    return null;
  }
};

/** Samples (x(t), y(t)) across the t-range; missing or unprojectable samples split the curve. */
export function sampleParametricPaths(context: Pick<DrawContext, 'mapper'>, curve: ParametricFunctionDrawable): ScreenPoint[][] {
  const paths: ScreenPoint[][] = [];
  let current: ScreenPoint[] = [];
  for (const t of linspace(curve.tMin, curve.tMax, curve.samples)) {
    const x = sampleCoordinate(curve.x, t);
    const y = sampleCoordinate(curve.y, t);
    const p = x === null || y === null ? null : projectPoint(context.mapper, x, y);
    if (p) {
      current.push(p);
      continue;
    }
    if (current.length >= 2) paths.push(current);
    current = [];
  }
  if (current.length >= 2) paths.push(current);
  return paths;
}

/** Polylines plus the curve's name, set to the left of where t starts. */
export function renderParametricFunction(context: DrawContext, curve: ParametricFunctionDrawable): boolean {
  const paths = sampleParametricPaths(context, curve);
  if (paths.length === 0) return false;

  const { primitives, style } = context;
  const color = curve.color ?? style.functionColor;
  withShape(primitives, () => {
    for (const path of paths) {
      primitives.strokePolyline(path, { color, width: style.functionStrokeWidth });
    }
    if (curve.name.length === 0) return;

    const first = paths[0][0];
    const fontSize = style.functionLabelFontSize;
    const anchor = { x: first.x - ((1 + curve.name.length) * fontSize) / 2, y: Math.max(first.y, fontSize) };
    const rect = estimateTextRect([curve.name], anchor, fontSize, defaultTextAlignment);
    const dy = context.labels.getOrPlaceDy(`parametricFunction:${curve.name}`, rect, fontSize);
    primitives.drawText(curve.name, { x: anchor.x, y: anchor.y + dy }, { family: style.fontFamily, size: fontSize }, color, defaultTextAlignment);
  });
  return true;
}
