const DEFAULT_MAX_TICK_FRACTION_DIGITS = 6;

const tickFormatter = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: DEFAULT_MAX_TICK_FRACTION_DIGITS,
  useGrouping: false,
});

/** Tick label text; `-0` prints as `0`. */
export const formatTickValue = (value: number): string => tickFormatter.format(Object.is(value, -0) ? 0 : value);

/**
 * Smallest 1·10ⁿ, 2·10ⁿ or 5·10ⁿ math step whose on-screen spacing is at least `minSpacingPx`.
 */
export function niceGridStep(scale: number, minSpacingPx: number): number {
  const raw = minSpacingPx / scale;
  if (!Number.isFinite(raw) || raw <= 0) return 1;
  const base = 10 ** Math.floor(Math.log10(raw));
  for (const m of [1, 2, 5]) {
    if (m * base >= raw) return m * base;
  }
  return 10 * base;
}

/** Multiples of `step` inside [min, max], cleaned of accumulated float noise. */
export function gridValues(min: number, max: number, step: number): number[] {
  if (!(step > 0) || !(max >= min)) return [];
  const out: number[] = [];
  for (let k = Math.ceil(min / step); k * step <= max; k++) {
    out.push(Number((k * step).toPrecision(12)));
  }
  return out;
}
