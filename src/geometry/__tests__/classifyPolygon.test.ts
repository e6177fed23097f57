import { describe, it, expect } from 'vitest';
import {
  classifyPolygonVertices,
  classifyQuadrilateralVertices,
  classifyTriangleVertices,
  polygonInteriorAngles,
  polygonSideLengths,
  signedArea2,
} from '../classifyPolygon';
import { orderSegmentsIntoLoop } from '../polygonLoop';
import { createSegment, vertex } from '../../drawables/createDrawables';
import { InvalidShapeError } from '../../drawables/InvalidShapeError';

const square = [
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
];

describe('polygon measurements', () => {
  it('measures sides between consecutive vertices, closing the loop', () => {
    expect(polygonSideLengths([{ x: 0, y: 0 }, { x: 3, y: 0 }, { x: 3, y: 4 }])).toEqual([3, 4, 5]);
  });

  it('reports interior angles regardless of winding', () => {
    for (const angle of [...polygonInteriorAngles(square), ...polygonInteriorAngles([...square].reverse())]) {
      expect(angle).toBeCloseTo(90, 9);
    }
    expect(signedArea2(square)).toBe(2);
    expect(signedArea2([...square].reverse())).toBe(-2);
  });

  it('reports reflex angles above 180 degrees', () => {
    // Arrow head: the notch at (1, 1) is reflex.
    const angles = polygonInteriorAngles([
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 2 },
      { x: 1, y: 1 },
      { x: 0, y: 2 },
    ]);
    expect(angles[3]).toBeCloseTo(270, 9);
    expect(angles.reduce((a, b) => a + b, 0)).toBeCloseTo(540, 9);
  });

  it('throws on coincident consecutive vertices', () => {
    expect(() => polygonInteriorAngles([{ x: 0, y: 0 }, { x: 0, y: 0 }, { x: 1, y: 1 }])).toThrow(InvalidShapeError);
  });

  it('classifies flags as independent, mutually exclusive booleans', () => {
    expect(classifyPolygonVertices(square)).toEqual({ regular: true, irregular: false });
    expect(classifyPolygonVertices([{ x: 0, y: 0 }, { x: 3, y: 0 }, { x: 3, y: 4 }])).toEqual({
      regular: false,
      irregular: true,
    });
  });
});

describe('kind-specific classifiers', () => {
  it('require the matching vertex count', () => {
    expect(() => classifyTriangleVertices(square)).toThrow(
      'classifyTriangleVertices(vertices): expected 3 vertices, received 4.'
    );
    expect(() => classifyQuadrilateralVertices(square.slice(0, 3))).toThrow(InvalidShapeError);
  });

  it('does not call a parallelogram a rectangle', () => {
    expect(
      classifyQuadrilateralVertices([
        { x: 0, y: 0 },
        { x: 2, y: 0 },
        { x: 3, y: 1 },
        { x: 1, y: 1 },
      ])
    ).toEqual({ square: false, rectangle: false, rhombus: false, irregular: true });
  });
});

describe('orderSegmentsIntoLoop', () => {
  const [a, b, c, d] = [vertex('A', 0, 0), vertex('B', 1, 0), vertex('C', 1, 1), vertex('D', 0, 1)];

  it('walks from the first segment in its stated direction', () => {
    const loop = orderSegmentsIntoLoop([
      createSegment(b, c),
      createSegment(d, a),
      createSegment(a, b),
      createSegment(c, d),
    ]);
    expect(loop?.map((v) => v.name)).toEqual(['B', 'C', 'D', 'A']);
  });

  it('returns null for fewer than three segments, branches, or two separate loops', () => {
    expect(orderSegmentsIntoLoop([createSegment(a, b), createSegment(b, a)])).toBeNull();
    expect(
      orderSegmentsIntoLoop([createSegment(a, b), createSegment(b, c), createSegment(c, a), createSegment(a, d)])
    ).toBeNull();
    const [e, f, g] = [vertex('E', 5, 5), vertex('F', 6, 5), vertex('G', 6, 6)];
    expect(
      orderSegmentsIntoLoop([
        createSegment(a, b),
        createSegment(b, c),
        createSegment(c, a),
        createSegment(e, f),
        createSegment(f, g),
        createSegment(g, e),
      ])
    ).toBeNull();
  });

  it('joins unnamed endpoints that differ only by floating-point noise', () => {
    const origin = vertex('', 0, 0);
    const right = vertex('', 1, 0);
    const top = vertex('', 0.3, 1);
    const topAgain = vertex('', 0.1 + 0.2, 1);
    const loop = orderSegmentsIntoLoop([createSegment(origin, right), createSegment(right, top), createSegment(topAgain, origin)]);
    expect(loop?.map(({ x, y }) => [x, y])).toEqual([
      [0, 0],
      [1, 0],
      [0.3, 1],
    ]);
  });

  it('keeps unnamed endpoints further apart than the tolerance distinct', () => {
    const origin = vertex('', 0, 0);
    const right = vertex('', 1, 0);
    expect(
      orderSegmentsIntoLoop([
        createSegment(origin, right),
        createSegment(right, vertex('', 0.3, 1)),
        createSegment(vertex('', 0.3 + 1e-6, 1), origin),
      ])
    ).toBeNull();
  });
});
