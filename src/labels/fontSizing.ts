import type { RendererStyle } from '../config/types';
import type { ScreenPoint } from '../geometry/types';
import type { TextAlignment } from '../renderers/primitives';
import type { LabelRect } from './labelOverlapResolver';

// Rough glyph metrics; labels only need a footprint, not exact layout.
const CHAR_WIDTH_EM = 0.6;
export const LINE_HEIGHT_EM = 1.2;

const positiveOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;

/**
 * Font size for a label anchored at `referenceScale`, viewed at `currentScale`.
 *
 * Zooming in never enlarges text. Zooming out shrinks it proportionally, hides it (returns 0)
 * at or below `labelVanishThresholdPx`, and otherwise keeps it at least `labelMinScreenFontPx`.
 */
export function computeZoomAdjustedFontSize(
  baseSize: number,
  referenceScale: number | undefined,
  currentScale: number,
  style: Pick<RendererStyle, 'labelMinScreenFontPx' | 'labelVanishThresholdPx'>
): number {
  const ratio = positiveOr(currentScale, 1) / positiveOr(referenceScale, 1);
  if (!Number.isFinite(ratio) || ratio >= 1) return baseSize;
  const scaled = baseSize * ratio;
  if (scaled <= style.labelVanishThresholdPx) return 0;
  return Math.max(scaled, style.labelMinScreenFontPx);
}

/** Approximate screen footprint of (possibly multi-line) text drawn at `anchor`. */
export function estimateTextRect(
  lines: readonly string[],
  anchor: ScreenPoint,
  fontSize: number,
  alignment: TextAlignment
): LabelRect {
  const longest = lines.reduce((max, line) => Math.max(max, line.length), 0);
  const width = longest * CHAR_WIDTH_EM * fontSize;
  const height = Math.max(1, lines.length) * LINE_HEIGHT_EM * fontSize;

  const minX =
    alignment.horizontal === 'left'
      ? anchor.x
      : alignment.horizontal === 'center'
        ? anchor.x - width / 2
        : anchor.x - width;

  const minY =
    alignment.vertical === 'top'
      ? anchor.y
      : alignment.vertical === 'middle'
        ? anchor.y - height / 2
        : alignment.vertical === 'bottom'
          ? anchor.y - height
          : anchor.y - fontSize;

  return { minX, maxX: minX + width, minY, maxY: minY + height };
}
