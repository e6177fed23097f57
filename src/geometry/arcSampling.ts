import type { MathPoint, Vec2 } from './types';

const TAU = Math.PI * 2;
const EPSILON = 1e-9;

export interface EllipseGeometry {
  readonly cx: number;
  readonly cy: number;
  readonly rx: number;
  readonly ry: number;
  /** Degrees, counter-clockwise. */
  readonly rotation: number;
}

/** A boundary crossing with its (pre-rotation) parameter angle in [0, 2π). */
export interface ArcIntersection extends MathPoint {
  readonly angle: number;
}

export const normalizeAngle = (angle: number): number => ((angle % TAU) + TAU) % TAU;

/**
 * `samples` angles from `start` to `end` inclusive, sweeping counter-clockwise unless `clockwise`.
 * Equal start and end sweep the full turn.
 */
export function arcAngleSequence(start: number, end: number, samples: number, clockwise = false): number[] {
  const n = Math.max(2, Math.floor(samples));
  const s = normalizeAngle(start);
  const e = normalizeAngle(end);
  let span = clockwise ? normalizeAngle(s - e) : normalizeAngle(e - s);
  if (span === 0) span = TAU;
  const direction = clockwise ? -1 : 1;
  return Array.from({ length: n }, (_, i) => s + (direction * span * i) / (n - 1));
}

export function pointOnEllipse(e: EllipseGeometry, angle: number): MathPoint {
  const rot = (e.rotation * Math.PI) / 180;
  const lx = e.rx * Math.cos(angle);
  const ly = e.ry * Math.sin(angle);
  return {
    x: lx * Math.cos(rot) - ly * Math.sin(rot) + e.cx,
    y: lx * Math.sin(rot) + ly * Math.cos(rot) + e.cy,
  };
}

/** `samples` evenly spaced boundary points, without repeating the first one. */
export function sampleClosedEllipse(e: EllipseGeometry, samples: number): MathPoint[] {
  const n = Math.max(3, Math.floor(samples));
  return Array.from({ length: n }, (_, i) => pointOnEllipse(e, (TAU * i) / n));
}

/**
 * Crossings of segment p1→p2 with the ellipse boundary, in order along the segment.
 * A circle is an ellipse with equal radii and no rotation.
 */
export function ellipseSegmentIntersections(e: EllipseGeometry, p1: Vec2, p2: Vec2): ArcIntersection[] {
  if (!(e.rx > 0 && e.ry > 0)) return [];
  const rot = (e.rotation * Math.PI) / 180;
  const cos = Math.cos(rot);
  const sin = Math.sin(rot);
  const toLocal = (p: Vec2): Vec2 => {
    const tx = p.x - e.cx;
    const ty = p.y - e.cy;
    return { x: tx * cos + ty * sin, y: -tx * sin + ty * cos };
  };

  const a1 = toLocal(p1);
  const a2 = toLocal(p2);
  const dx = a2.x - a1.x;
  const dy = a2.y - a1.y;
  const rx2 = e.rx * e.rx;
  const ry2 = e.ry * e.ry;
  const a = (dx * dx) / rx2 + (dy * dy) / ry2;
  if (Math.abs(a) < EPSILON) return [];
  const b = 2 * ((a1.x * dx) / rx2 + (a1.y * dy) / ry2);
  const c = (a1.x * a1.x) / rx2 + (a1.y * a1.y) / ry2 - 1;
  const discriminant = b * b - 4 * a * c;
  if (discriminant < -EPSILON) return [];
  const root = Math.sqrt(Math.max(discriminant, 0));

  const out: ArcIntersection[] = [];
  for (const sign of [-1, 1]) {
    const tRaw = (-b + sign * root) / (2 * a);
    if (tRaw < -EPSILON || tRaw > 1 + EPSILON) continue;
    const t = Math.min(Math.max(tRaw, 0), 1);
    const lx = a1.x + t * dx;
    const ly = a1.y + t * dy;
    out.push({
      x: lx * cos - ly * sin + e.cx,
      y: lx * sin + ly * cos + e.cy,
      angle: normalizeAngle(Math.atan2(ly / e.ry, lx / e.rx)),
    });
  }
  return out;
}
