import type { SegmentDrawable, Vertex } from '../drawables/types';

const COORDINATE_TOLERANCE = 1e-9;

/**
 * Assigns each endpoint a stable key: its name, or for unnamed vertices the key of the first
 * unnamed vertex seen within {@link COORDINATE_TOLERANCE} on both axes.
 */
function createVertexKeyer(): (v: Vertex) => string {
  const unnamed: { readonly key: string; readonly vertex: Vertex }[] = [];
  return (v) => {
    if (v.name.length > 0) return v.name;
    const match = unnamed.find(
      ({ vertex }) => Math.abs(vertex.x - v.x) <= COORDINATE_TOLERANCE && Math.abs(vertex.y - v.y) <= COORDINATE_TOLERANCE
    );
    if (match) return match.key;
    const key = `@${unnamed.length}`;
    unnamed.push({ key, vertex: v });
    return key;
  };
}

/**
 * Orders boundary segments into one closed vertex cycle.
 *
 * Segments may come in any order and orientation. The walk starts at `segments[0].p1`
 * heading towards `segments[0].p2`, so the output is deterministic for a given input.
 *
 * Returns null unless the segments form exactly one simple cycle covering every segment
 * (every vertex shared by exactly two segments).
 */
export function orderSegmentsIntoLoop(segments: readonly SegmentDrawable[]): Vertex[] | null {
  const n = segments.length;
  if (n < 3) return null;

  const vertexKey = createVertexKeyer();
  const vertices = new Map<string, Vertex>();
  const adjacency = new Map<string, string[]>();
  const link = (a: string, b: string): void => {
    const list = adjacency.get(a);
    if (list) list.push(b);
    else adjacency.set(a, [b]);
  };

  const endpoints = segments.map((segment) => [vertexKey(segment.p1), vertexKey(segment.p2)] as const);
  for (let i = 0; i < n; i++) {
    const [k1, k2] = endpoints[i];
    if (k1 === k2) return null;
    if (!vertices.has(k1)) vertices.set(k1, segments[i].p1);
    if (!vertices.has(k2)) vertices.set(k2, segments[i].p2);
    link(k1, k2);
    link(k2, k1);
  }

  if (vertices.size !== n) return null;
  for (const neighbours of adjacency.values()) {
    if (neighbours.length !== 2 || neighbours[0] === neighbours[1]) return null;
  }

  const [startKey, firstNext] = endpoints[0];
  const loop: Vertex[] = [];
  const visited = new Set<string>();
  let previous: string | null = null;
  let current: string = startKey;
  let next: string = firstNext;

  for (let i = 0; i < n; i++) {
    const vertex = vertices.get(current);
    if (!vertex || visited.has(current)) return null;
    visited.add(current);
    loop.push(vertex);

    previous = current;
    current = next;
    const neighbours = adjacency.get(current);
    if (!neighbours) return null;
    next = neighbours[0] === previous ? neighbours[1] : neighbours[0];
  }

  return current === startKey && visited.size === n ? loop : null;
}
