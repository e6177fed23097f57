import { InvalidShapeError } from '../drawables/InvalidShapeError';
import type { Vec2 } from './types';

/** Named classification flags. Exactly one of `regular` / `irregular` is true. */
export interface PolygonTypeFlags {
  readonly regular: boolean;
  readonly irregular: boolean;
}

/** `isosceles` includes equilateral; `scalene` means no two sides match. */
export interface TriangleTypeFlags {
  readonly equilateral: boolean;
  readonly isosceles: boolean;
  readonly scalene: boolean;
  readonly right: boolean;
}

/** `irregular` is true when none of the other three holds. */
export interface QuadrilateralTypeFlags {
  readonly square: boolean;
  readonly rectangle: boolean;
  readonly rhombus: boolean;
  readonly irregular: boolean;
}

const RELATIVE_EPSILON = 1e-9;
const ANGLE_TOLERANCE_DEG = 1e-3;

const lengthsClose = (a: number, b: number): boolean => {
  const scale = Math.max(Math.abs(a), Math.abs(b), 1);
  return Math.abs(a - b) <= Math.max(RELATIVE_EPSILON * scale * 10, 1e-6);
};

const anglesClose = (a: number, b: number): boolean => Math.abs(a - b) <= ANGLE_TOLERANCE_DEG;

const allClose = (values: readonly number[], close: (a: number, b: number) => boolean): boolean =>
  values.every((v) => close(v, values[0]));

const hasEqualPair = (values: readonly number[]): boolean =>
  values.some((v, i) => values.slice(i + 1).some((w) => lengthsClose(v, w)));

const at = <T>(items: readonly T[], index: number): T => items[((index % items.length) + items.length) % items.length];

/** Twice the signed area; positive for counter-clockwise (math space) vertex order. */
export function signedArea2(vertices: readonly Vec2[]): number {
  let sum = 0;
  for (let i = 0; i < vertices.length; i++) {
    const a = vertices[i];
    const b = at(vertices, i + 1);
    sum += a.x * b.y - b.x * a.y;
  }
  return sum;
}

export function polygonSideLengths(vertices: readonly Vec2[]): number[] {
  return vertices.map((v, i) => {
    const next = at(vertices, i + 1);
    return Math.hypot(next.x - v.x, next.y - v.y);
  });
}

/**
 * Interior angle at each vertex, in degrees.
 *
 * Reflex vertices (relative to the polygon's winding) report angles above 180.
 * @throws {InvalidShapeError} when two consecutive vertices coincide
 */
export function polygonInteriorAngles(vertices: readonly Vec2[]): number[] {
  const orientation = signedArea2(vertices) < 0 ? -1 : 1;
  return vertices.map((v, i) => {
    const prev = at(vertices, i - 1);
    const next = at(vertices, i + 1);
    const inX = v.x - prev.x;
    const inY = v.y - prev.y;
    const outX = next.x - v.x;
    const outY = next.y - v.y;
    if ((inX === 0 && inY === 0) || (outX === 0 && outY === 0)) {
      throw new InvalidShapeError(`polygonInteriorAngles(vertices): vertex ${i} coincides with a neighbour.`);
    }
    const turn = Math.atan2(inX * outY - inY * outX, inX * outX + inY * outY);
    return 180 - (turn * orientation * 180) / Math.PI;
  });
}

/** Regular iff every side and every interior angle matches the first within tolerance. */
export function classifyPolygonVertices(vertices: readonly Vec2[]): PolygonTypeFlags {
  const sides = polygonSideLengths(vertices);
  const angles = polygonInteriorAngles(vertices);
  const regular =
    sides.length >= 3 &&
    allClose(sides, lengthsClose) &&
    allClose(angles, anglesClose);
  return { regular, irregular: !regular };
}

const requireVertexCount = (fn: string, vertices: readonly Vec2[], count: number): void => {
  if (vertices.length !== count) {
    throw new InvalidShapeError(`${fn}(vertices): expected ${count} vertices, received ${vertices.length}.`);
  }
};

/** @throws {InvalidShapeError} unless given exactly three distinct consecutive vertices */
export function classifyTriangleVertices(vertices: readonly Vec2[]): TriangleTypeFlags {
  requireVertexCount('classifyTriangleVertices', vertices, 3);
  const sides = polygonSideLengths(vertices);
  const angles = polygonInteriorAngles(vertices);
  const equilateral = allClose(sides, lengthsClose);
  const equalPair = hasEqualPair(sides);
  return {
    equilateral,
    isosceles: equilateral || equalPair,
    scalene: !equalPair,
    right: angles.some((a) => anglesClose(a, 90)),
  };
}

/**
 * Sides are compared in loop order, so "opposite" means sides 0/2 and 1/3. Right angles use the
 * side-length tolerance rather than the looser angle tolerance.
 * @throws {InvalidShapeError} unless given exactly four distinct consecutive vertices
 */
export function classifyQuadrilateralVertices(vertices: readonly Vec2[]): QuadrilateralTypeFlags {
  requireVertexCount('classifyQuadrilateralVertices', vertices, 4);
  const sides = polygonSideLengths(vertices);
  const allRight = polygonInteriorAngles(vertices).every((a) => lengthsClose(a, 90));
  const rhombus = allClose(sides, lengthsClose);
  const square = rhombus && allRight;
  const rectangle = allRight && lengthsClose(sides[0], sides[2]) && lengthsClose(sides[1], sides[3]);
  return { square, rectangle, rhombus, irregular: !(square || rectangle || rhombus) };
}
