export type Rgba01 = readonly [r: number, g: number, b: number, a: number];

const NAMED_COLORS: Readonly<Record<string, readonly [number, number, number]>> = {
  black: [0, 0, 0],
  white: [255, 255, 255],
  red: [255, 0, 0],
  green: [0, 128, 0],
  blue: [0, 0, 255],
  yellow: [255, 255, 0],
  orange: [255, 165, 0],
  purple: [128, 0, 128],
  grey: [128, 128, 128],
  gray: [128, 128, 128],
  lightgrey: [211, 211, 211],
  lightgray: [211, 211, 211],
  darkgrey: [169, 169, 169],
  darkgray: [169, 169, 169],
  lightblue: [173, 216, 230],
  cyan: [0, 255, 255],
  magenta: [255, 0, 255],
};

const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));

const parseHex = (hex: string): Rgba01 | null => {
  if (!/^[0-9a-f]+$/i.test(hex)) return null;
  const expand = hex.length === 3 || hex.length === 4 ? [...hex].map((c) => c + c).join('') : hex;
  if (expand.length !== 6 && expand.length !== 8) return null;
  const byte = (i: number): number => Number.parseInt(expand.slice(i, i + 2), 16) / 255;
  return [byte(0), byte(2), byte(4), expand.length === 8 ? byte(6) : 1];
};

const parseChannel = (raw: string): number | null => {
  const s = raw.trim();
  const n = Number.parseFloat(s);
  if (!Number.isFinite(n)) return null;
  return clamp01(s.endsWith('%') ? n / 100 : n / 255);
};

const parseAlpha = (raw: string): number | null => {
  const s = raw.trim();
  const n = Number.parseFloat(s);
  if (!Number.isFinite(n)) return null;
  return clamp01(s.endsWith('%') ? n / 100 : n);
};

const parseFunctional = (body: string): Rgba01 | null => {
  // Accepts both `r, g, b[, a]` and `r g b[ / a]`.
  const slash = body.indexOf('/');
  const channelsPart = slash >= 0 ? body.slice(0, slash) : body;
  const slashAlpha = slash >= 0 ? body.slice(slash + 1) : undefined;
  const parts = channelsPart.includes(',')
    ? channelsPart.split(',')
    : channelsPart.trim().split(/\s+/);
  const alphaRaw = slashAlpha ?? (parts.length === 4 ? parts[3] : undefined);
  if (parts.length < 3 || parts.length > 4 || (slashAlpha !== undefined && parts.length !== 3)) return null;

  const r = parseChannel(parts[0]);
  const g = parseChannel(parts[1]);
  const b = parseChannel(parts[2]);
  const a = alphaRaw === undefined ? 1 : parseAlpha(alphaRaw);
  return r === null || g === null || b === null || a === null ? null : [r, g, b, a];
};

/**
 * Parses a CSS color into straight-alpha RGBA channels in [0, 1].
 *
 * Supports `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, `rgb()`/`rgba()`, `transparent`
 * and a small set of named colors. Returns null for anything else.
 */
export function parseCssColorToRgba01(color: string): Rgba01 | null {
  const s = color.trim().toLowerCase();
  if (s.length === 0) return null;
  if (s === 'transparent') return [0, 0, 0, 0];
  if (s.startsWith('#')) return parseHex(s.slice(1));

  const fn = /^rgba?\((.*)\)$/.exec(s);
  if (fn) return parseFunctional(fn[1]);

  const named = NAMED_COLORS[s];
  return named ? [named[0] / 255, named[1] / 255, named[2] / 255, 1] : null;
}
