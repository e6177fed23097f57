import { describe, it, expect } from 'vitest';
import {
  FLOATS_PER_VERTEX,
  arcPoints,
  createTriangleBuffer,
  curveSegments,
  ellipseOutline,
  tessellateJoinedArea,
  tessellateLine,
  tessellatePolygon,
  tessellatePolyline,
  triangulatePolygon,
} from '../tessellate';

const RED = [1, 0, 0, 1] as const;

describe('createTriangleBuffer', () => {
  it('grows past its initial capacity and keeps earlier vertices', () => {
    const buffer = createTriangleBuffer(3);
    buffer.addTriangle({ x: 1, y: 2 }, { x: 3, y: 4 }, { x: 5, y: 6 }, RED);
    buffer.addTriangle({ x: 7, y: 8 }, { x: 9, y: 10 }, { x: 11, y: 12 }, RED);

    expect(buffer.vertexCount).toBe(6);
    const view = buffer.view();
    expect(view).toHaveLength(6 * FLOATS_PER_VERTEX);
    expect(Array.from(view.subarray(0, 6))).toEqual([1, 2, 1, 0, 0, 1]);
    expect(Array.from(view.subarray(30, 32))).toEqual([11, 12]);
  });

  it('resets to empty', () => {
    const buffer = createTriangleBuffer();
    buffer.addTriangle({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }, RED);
    buffer.reset();
    expect(buffer.vertexCount).toBe(0);
    expect(buffer.view()).toHaveLength(0);
  });
});

describe('curveSegments', () => {
  it('uses about one segment per 4px within bounds', () => {
    expect(curveSegments(1)).toBe(12);
    expect(curveSegments(40)).toBe(63);
    expect(curveSegments(1000)).toBe(256);
    expect(curveSegments(40, Math.PI / 2)).toBe(16);
  });
});

describe('tessellateLine', () => {
  it('emits a quad around the segment', () => {
    const buffer = createTriangleBuffer();
    tessellateLine(buffer, { x: 0, y: 0 }, { x: 0, y: 10 }, 4, RED);

    expect(buffer.vertexCount).toBe(6);
    const xy = [0, 1, 2, 3, 4, 5].map((i) => Array.from(buffer.view().subarray(i * 6, i * 6 + 2)));
    expect(xy).toEqual([
      [-2, 0],
      [2, 0],
      [-2, 10],
      [-2, 10],
      [2, 0],
      [2, 10],
    ]);
  });

  it('skips zero-length and zero-width lines', () => {
    const buffer = createTriangleBuffer();
    tessellateLine(buffer, { x: 1, y: 1 }, { x: 1, y: 1 }, 2, RED);
    tessellateLine(buffer, { x: 0, y: 0 }, { x: 1, y: 1 }, 0, RED);
    expect(buffer.vertexCount).toBe(0);
  });

  it('closes polylines on request', () => {
    const square = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
    ];
    const open = createTriangleBuffer();
    const closed = createTriangleBuffer();
    tessellatePolyline(open, square, 1, RED);
    tessellatePolyline(closed, square, 1, RED, true);
    expect(open.vertexCount).toBe(12);
    expect(closed.vertexCount).toBe(18);
  });
});

describe('curves', () => {
  it('samples an ellipse without repeating the first point', () => {
    const points = ellipseOutline({ x: 0, y: 0 }, 2, 1, 0, 4);
    expect(points).toHaveLength(4);
    expect(points[0]).toEqual({ x: 2, y: 0 });
    expect(points[1].x).toBeCloseTo(0);
    expect(points[1].y).toBeCloseTo(1);
  });

  it('walks arcs in the requested direction', () => {
    const cw = arcPoints({ x: 0, y: 0 }, 10, 0, Math.PI / 2, false);
    expect(cw.at(-1)?.x).toBeCloseTo(0);
    expect(cw.at(-1)?.y).toBeCloseTo(10);

    const ccw = arcPoints({ x: 0, y: 0 }, 10, 0, Math.PI / 2, true);
    expect(ccw[1].y).toBeLessThan(0);
    expect(ccw.at(-1)?.y).toBeCloseTo(10);
  });
});

describe('triangulatePolygon', () => {
  it('clips ears from a concave polygon', () => {
    // Arrow shape with a reflex vertex at index 3.
    const points = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 5, y: 5 },
      { x: 0, y: 10 },
    ];
    const triangles = triangulatePolygon(points);
    expect(triangles).toHaveLength(3);

    const area = triangles.reduce((sum, [i, j, k]) => {
      const a = points[i];
      const b = points[j];
      const c = points[k];
      return sum + Math.abs((b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x)) / 2;
    }, 0);
    expect(area).toBe(75);
  });

  it('returns nothing for degenerate input', () => {
    expect(triangulatePolygon([{ x: 0, y: 0 }, { x: 1, y: 1 }])).toEqual([]);
    expect(
      triangulatePolygon([
        { x: 0, y: 0 },
        { x: 1, y: 1 },
        { x: 2, y: 2 },
      ])
    ).toEqual([]);
  });

  it('fills a polygon into the buffer', () => {
    const buffer = createTriangleBuffer();
    tessellatePolygon(
      buffer,
      [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 10, y: 10 },
        { x: 0, y: 10 },
      ],
      RED
    );
    expect(buffer.vertexCount).toBe(6);
  });
});

const coveredArea = (view: Float32Array): number => {
  let total = 0;
  for (let o = 0; o < view.length; o += 3 * FLOATS_PER_VERTEX) {
    const [ax, ay] = [view[o], view[o + 1]];
    const [bx, by] = [view[o + FLOATS_PER_VERTEX], view[o + FLOATS_PER_VERTEX + 1]];
    const [cx, cy] = [view[o + 2 * FLOATS_PER_VERTEX], view[o + 2 * FLOATS_PER_VERTEX + 1]];
    total += Math.abs((bx - ax) * (cy - ay) - (by - ay) * (cx - ax)) / 2;
  }
  return total;
};

describe('tessellateJoinedArea', () => {
  it('fills both lobes when the boundaries cross', () => {
    // y = x against a horizontal line through the middle: the lobes have equal and opposite winding.
    const forward = [
      { x: 0, y: 0 },
      { x: 10, y: 10 },
      { x: 20, y: 20 },
    ];
    const reverse = [
      { x: 20, y: 10 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ];
    expect(triangulatePolygon([...forward, ...reverse])).toEqual([]);

    const buffer = createTriangleBuffer();
    tessellateJoinedArea(buffer, forward, reverse, RED);

    expect(buffer.vertexCount).toBe(12);
    expect(coveredArea(buffer.view())).toBe(100);
  });

  it('pairs each forward sample with the mirrored reverse sample', () => {
    const buffer = createTriangleBuffer();
    tessellateJoinedArea(
      buffer,
      [
        { x: 0, y: 0 },
        { x: 4, y: 0 },
      ],
      [
        { x: 4, y: 3 },
        { x: 0, y: 3 },
      ],
      RED
    );

    const view = buffer.view();
    const xy = (vertex: number) => Array.from(view.subarray(vertex * FLOATS_PER_VERTEX, vertex * FLOATS_PER_VERTEX + 2));
    expect([0, 1, 2, 3, 4, 5].map(xy)).toEqual([
      [0, 0],
      [4, 0],
      [4, 3],
      [0, 0],
      [4, 3],
      [0, 3],
    ]);
    expect(coveredArea(view)).toBe(12);
  });

  it('ear-clips the joined loop when the sample counts differ', () => {
    const buffer = createTriangleBuffer();
    tessellateJoinedArea(
      buffer,
      [
        { x: 0, y: 0 },
        { x: 5, y: 0 },
        { x: 10, y: 0 },
      ],
      [
        { x: 10, y: 10 },
        { x: 0, y: 10 },
      ],
      RED
    );

    expect(buffer.vertexCount).toBe(9);
    expect(coveredArea(buffer.view())).toBe(100);
  });
});

