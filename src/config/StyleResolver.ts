import type { RendererStyle } from './types';
import { defaultStyle } from './defaults';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type KeysOfType<T, V> = { [K in keyof T]: T[K] extends V ? K : never }[keyof T];

type StringStyleKey = KeysOfType<RendererStyle, string>;
type NumberStyleKey = KeysOfType<RendererStyle, number>;

const stringKeys: readonly StringStyleKey[] = [
  'canvasBackground',
  'defaultColor',
  'fillStyle',
  'fontFamily',
  'pointColor',
  'pointLabelColor',
  'segmentColor',
  'vectorColor',
  'circleColor',
  'ellipseColor',
  'circleArcColor',
  'angleColor',
  'functionColor',
  'polygonColor',
  'areaFillColor',
  'labelColor',
  'cartesianAxisColor',
  'cartesianGridColor',
  'cartesianLabelColor',
  'polarCircleColor',
  'polarRadialColor',
  'polarLabelColor',
];

// Sizes that must be strictly positive to be drawable.
const positiveKeys: readonly NumberStyleKey[] = [
  'pointLabelFontSize',
  'segmentStrokeWidth',
  'vectorStrokeWidth',
  'vectorTipSize',
  'circleStrokeWidth',
  'ellipseStrokeWidth',
  'circleArcStrokeWidth',
  'angleStrokeWidth',
  'angleArcRadius',
  'angleLabelFontSize',
  'angleTextArcRadiusFactor',
  'functionStrokeWidth',
  'functionLabelFontSize',
  'polygonStrokeWidth',
  'labelFontSize',
  'cartesianTickFontSize',
  'cartesianAxisStrokeWidth',
  'cartesianGridStrokeWidth',
  'polarLabelFontSize',
  'polarStrokeWidth',
];

// Zero is meaningful for these (e.g. a point radius of 0 hides the dot).
const nonNegativeKeys: readonly NumberStyleKey[] = [
  'pointRadius',
  'labelMinScreenFontPx',
  'labelVanishThresholdPx',
  'cartesianTickSize',
];

const unitIntervalKeys: readonly NumberStyleKey[] = ['areaOpacity'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const takeString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const takeNumber = (value: unknown, accept: (n: number) => boolean): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) && accept(value) ? value : undefined;

/**
 * Resolves user style overrides against {@link defaultStyle}.
 *
 * - Unknown keys are ignored.
 * - Values of the wrong kind (or out of range) fall back to the default for that key.
 * - The default table is never mutated; a new frozen object is returned on every call.
 */
export function resolveStyle(overrides?: unknown): RendererStyle {
  const resolved: Mutable<RendererStyle> = { ...defaultStyle };
  if (!isRecord(overrides)) return Object.freeze(resolved);

  for (const key of stringKeys) {
    const v = takeString(overrides[key]);
    if (v !== undefined) resolved[key] = v;
  }
  for (const key of positiveKeys) {
    const v = takeNumber(overrides[key], (n) => n > 0);
    if (v !== undefined) resolved[key] = v;
  }
  for (const key of nonNegativeKeys) {
    const v = takeNumber(overrides[key], (n) => n >= 0);
    if (v !== undefined) resolved[key] = v;
  }
  for (const key of unitIntervalKeys) {
    const v = takeNumber(overrides[key], (n) => n >= 0 && n <= 1);
    if (v !== undefined) resolved[key] = v;
  }

  return Object.freeze(resolved);
}

/** CSS font shorthand for a size in px using the style's font family. */
export const fontFor = (style: RendererStyle, sizePx: number): string => `${sizePx}px ${style.fontFamily}`;
