import {
  classifyPolygonVertices,
  classifyQuadrilateralVertices,
  classifyTriangleVertices,
  polygonSideLengths,
  type PolygonTypeFlags,
  type QuadrilateralTypeFlags,
  type TriangleTypeFlags,
} from '../geometry/classifyPolygon';
import { orderSegmentsIntoLoop } from '../geometry/polygonLoop';
import { InvalidShapeError } from './InvalidShapeError';
import type { PolygonDrawable, PolygonKind, SegmentDrawable, Vertex } from './types';

/** Exact side count per fixed-count kind; `generic` is a minimum. */
export const polygonSideCounts = {
  triangle: 3,
  quadrilateral: 4,
  pentagon: 5,
  hexagon: 6,
  heptagon: 7,
  octagon: 8,
  nonagon: 9,
  decagon: 10,
  generic: 11,
} as const satisfies Record<PolygonKind, number>;

// Kinds that have a dedicated outline renderer; the rest are math models drawn elsewhere.
const RENDERABLE_BY_DEFAULT: ReadonlySet<PolygonKind> = new Set(['triangle', 'quadrilateral']);

export interface PolygonOptions {
  readonly name?: string;
  readonly color?: string;
  readonly isRenderable?: boolean;
}

export interface PolygonClassification {
  readonly flags: PolygonTypeFlags;
  /** Set for the `triangle` kind. */
  readonly triangle?: TriangleTypeFlags;
  /** Set for the `quadrilateral` kind. */
  readonly quadrilateral?: QuadrilateralTypeFlags;
  readonly isRenderable: boolean;
}

const loopOrThrow = (fn: string, segments: readonly SegmentDrawable[]): Vertex[] => {
  const loop = orderSegmentsIntoLoop(segments);
  if (!loop) {
    throw new InvalidShapeError(`${fn}(segments): segments do not form a single closed loop.`);
  }
  return loop;
};

/**
 * Builds a polygon drawable after validating its boundary.
 *
 * @throws {InvalidShapeError} on a side count that does not match `kind`, on segments that
 * do not close into one loop, or on a zero-length side
 */
export function createPolygon(
  kind: PolygonKind,
  segments: readonly SegmentDrawable[],
  options?: PolygonOptions
): PolygonDrawable {
  const required = polygonSideCounts[kind];
  if (kind === 'generic') {
    if (segments.length < required) {
      throw new InvalidShapeError(
        `createPolygon(generic): expected at least ${required} sides, received ${segments.length}.`
      );
    }
  } else if (segments.length !== required) {
    throw new InvalidShapeError(
      `createPolygon(${kind}): expected exactly ${required} sides, received ${segments.length}.`
    );
  }

  const loop = loopOrThrow(`createPolygon(${kind})`, segments);
  if (polygonSideLengths(loop).some((length) => !(length > 0))) {
    throw new InvalidShapeError(`createPolygon(${kind}): polygon has a degenerate side.`);
  }

  return {
    type: 'polygon',
    kind,
    name: options?.name ?? loop.map((v) => v.name).join(''),
    color: options?.color,
    segments: [...segments],
    isRenderable: options?.isRenderable ?? RENDERABLE_BY_DEFAULT.has(kind),
  };
}

/** Ordered boundary vertices of a polygon. */
export const polygonVertices = (polygon: PolygonDrawable): Vertex[] =>
  loopOrThrow('polygonVertices', polygon.segments);

/**
 * Classifies a polygon from its current segments. Recomputed on every call.
 *
 * Triangles and quadrilaterals also carry their kind-specific flags.
 * @throws {InvalidShapeError} when the segments no longer form a valid loop
 */
export function classifyPolygon(polygon: PolygonDrawable): PolygonClassification {
  const loop = loopOrThrow('classifyPolygon', polygon.segments);
  const flags = classifyPolygonVertices(loop);
  switch (polygon.kind) {
    case 'triangle':
      return { flags, triangle: classifyTriangleVertices(loop), isRenderable: polygon.isRenderable };
    case 'quadrilateral':
      return { flags, quadrilateral: classifyQuadrilateralVertices(loop), isRenderable: polygon.isRenderable };
    default:
      return { flags, isRenderable: polygon.isRenderable };
  }
}
