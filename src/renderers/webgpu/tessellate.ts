import type { ScreenPoint } from '../../geometry/types';
import type { Rgba01 } from '../../utils/colors';

/** x, y in screen px followed by straight-alpha RGBA. */
export const FLOATS_PER_VERTEX = 6;

/** Growable CPU-side triangle list. */
export interface TriangleBuffer {
  readonly vertexCount: number;
  addTriangle(a: ScreenPoint, b: ScreenPoint, c: ScreenPoint, color: Rgba01): void;
  /** View of the filled prefix; valid until the next write. */
  view(): Float32Array;
  reset(): void;
}

export function createTriangleBuffer(initialVertices = 1024): TriangleBuffer {
  let data = new Float32Array(Math.max(3, initialVertices) * FLOATS_PER_VERTEX);
  let count = 0;

  const ensure = (extraVertices: number): void => {
    const needed = (count + extraVertices) * FLOATS_PER_VERTEX;
    if (needed <= data.length) return;
    let size = data.length;
    while (size < needed) size *= 2;
    const next = new Float32Array(size);
    next.set(data.subarray(0, count * FLOATS_PER_VERTEX));
    data = next;
  };

  const push = (p: ScreenPoint, [r, g, b, a]: Rgba01): void => {
    const o = count * FLOATS_PER_VERTEX;
    data[o] = p.x;
    data[o + 1] = p.y;
    data[o + 2] = r;
    data[o + 3] = g;
    data[o + 4] = b;
    data[o + 5] = a;
    count++;
  };

  return {
    get vertexCount() {
      return count;
    },
    addTriangle(a, b, c, color) {
      ensure(3);
      push(a, color);
      push(b, color);
      push(c, color);
    },
    view: () => data.subarray(0, count * FLOATS_PER_VERTEX),
    reset() {
      count = 0;
    },
  };
}

/** Segments for a curve of the given radius: about one per 4 px of arc, within [12, 256]. */
export const curveSegments = (radius: number, sweep = Math.PI * 2): number =>
  Math.min(256, Math.max(12, Math.ceil((Math.abs(sweep) * Math.max(radius, 0)) / 4)));

/** Two triangles covering a `width`-wide band around a→b. Zero-length lines emit nothing. */
export function tessellateLine(out: TriangleBuffer, a: ScreenPoint, b: ScreenPoint, width: number, color: Rgba01): void {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const len = Math.hypot(dx, dy);
  if (!(len > 0) || !(width > 0)) return;
  const nx = (-dy / len) * (width / 2);
  const ny = (dx / len) * (width / 2);
  const a0 = { x: a.x + nx, y: a.y + ny };
  const a1 = { x: a.x - nx, y: a.y - ny };
  const b0 = { x: b.x + nx, y: b.y + ny };
  const b1 = { x: b.x - nx, y: b.y - ny };
  out.addTriangle(a0, a1, b0, color);
  out.addTriangle(b0, a1, b1, color);
}

export function tessellatePolyline(
  out: TriangleBuffer,
  points: readonly ScreenPoint[],
  width: number,
  color: Rgba01,
  closed = false
): void {
  for (let i = 1; i < points.length; i++) tessellateLine(out, points[i - 1], points[i], width, color);
  if (closed && points.length > 2) tessellateLine(out, points[points.length - 1], points[0], width, color);
}

/** Points on an ellipse rotated by `rotation` radians (clockwise on screen), without repeating the first. */
export function ellipseOutline(
  center: ScreenPoint,
  radiusX: number,
  radiusY: number,
  rotation: number,
  segments = curveSegments(Math.max(radiusX, radiusY))
): ScreenPoint[] {
  const cos = Math.cos(rotation);
  const sin = Math.sin(rotation);
  const points: ScreenPoint[] = [];
  for (let i = 0; i < segments; i++) {
    const t = (i / segments) * Math.PI * 2;
    const lx = radiusX * Math.cos(t);
    const ly = radiusY * Math.sin(t);
    points.push({ x: center.x + lx * cos - ly * sin, y: center.y + lx * sin + ly * cos });
  }
  return points;
}

/** Points along an arc from `start` to `end`; `anticlockwise` takes the negative direction. */
export function arcPoints(center: ScreenPoint, radius: number, start: number, end: number, anticlockwise: boolean): ScreenPoint[] {
  const TAU = Math.PI * 2;
  let sweep = end - start;
  if (!anticlockwise && sweep < 0) sweep = (sweep % TAU) + TAU;
  if (anticlockwise && sweep > 0) sweep = (sweep % TAU) - TAU;
  const segments = curveSegments(radius, sweep);
  const points: ScreenPoint[] = [];
  for (let i = 0; i <= segments; i++) {
    const t = start + (sweep * i) / segments;
    points.push({ x: center.x + radius * Math.cos(t), y: center.y + radius * Math.sin(t) });
  }
  return points;
}

/** Triangle fan around `center`; the ring closes back to its first point. */
export function tessellateFan(out: TriangleBuffer, center: ScreenPoint, ring: readonly ScreenPoint[], color: Rgba01): void {
  for (let i = 0; i < ring.length; i++) {
    out.addTriangle(center, ring[i], ring[(i + 1) % ring.length], color);
  }
}

const cross = (o: ScreenPoint, a: ScreenPoint, b: ScreenPoint): number => (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);

const insideTriangle = (p: ScreenPoint, a: ScreenPoint, b: ScreenPoint, c: ScreenPoint, sign: number): boolean =>
  cross(a, b, p) * sign > 0 && cross(b, c, p) * sign > 0 && cross(c, a, p) * sign > 0;

/**
 * Ear-clipping triangulation of a simple polygon. Returns index triples into `points`.
 *
 * When no ear can be found (self-intersecting input) the remainder is fanned from its first vertex.
 */
export function triangulatePolygon(points: readonly ScreenPoint[]): [number, number, number][] {
  const n = points.length;
  if (n < 3) return [];

  let area2 = 0;
  for (let i = 0; i < n; i++) {
    const a = points[i];
    const b = points[(i + 1) % n];
    area2 += a.x * b.y - b.x * a.y;
  }
  if (area2 === 0 || !Number.isFinite(area2)) return [];
  const sign = Math.sign(area2);

  const remaining = points.map((_, i) => i);
  const triangles: [number, number, number][] = [];

  while (remaining.length > 3) {
    let clipped = false;
    for (let i = 0; i < remaining.length; i++) {
      const prev = remaining[(i + remaining.length - 1) % remaining.length];
      const cur = remaining[i];
      const next = remaining[(i + 1) % remaining.length];
      const a = points[prev];
      const b = points[cur];
      const c = points[next];
      if (cross(a, b, c) * sign <= 0) continue;
      const blocked = remaining.some(
        (idx) => idx !== prev && idx !== cur && idx !== next && insideTriangle(points[idx], a, b, c, sign)
      );
      if (blocked) continue;
      triangles.push([prev, cur, next]);
      remaining.splice(i, 1);
      clipped = true;
      break;
    }
    if (!clipped) {
      for (let i = 1; i < remaining.length - 1; i++) triangles.push([remaining[0], remaining[i], remaining[i + 1]]);
      return triangles;
    }
  }
  triangles.push([remaining[0], remaining[1], remaining[2]]);
  return triangles;
}

/**
 * Fills between two boundaries sampled in step: `forward[i]` pairs with the point `i` places
 * from the end of `reverse`. Each column becomes two triangles, so boundaries that cross still
 * fill both lobes. Falls back to {@link tessellatePolygon} when the sample counts differ.
 */
export function tessellateJoinedArea(
  out: TriangleBuffer,
  forward: readonly ScreenPoint[],
  reverse: readonly ScreenPoint[],
  color: Rgba01
): void {
  const n = forward.length;
  if (n !== reverse.length) {
    tessellatePolygon(out, [...forward, ...reverse], color);
    return;
  }
  const lower = (i: number): ScreenPoint => reverse[n - 1 - i];
  for (let i = 0; i + 1 < n; i++) {
    out.addTriangle(forward[i], forward[i + 1], lower(i + 1), color);
    out.addTriangle(forward[i], lower(i + 1), lower(i), color);
  }
}

export function tessellatePolygon(out: TriangleBuffer, points: readonly ScreenPoint[], color: Rgba01): void {
  for (const [i, j, k] of triangulatePolygon(points)) out.addTriangle(points[i], points[j], points[k], color);
}
