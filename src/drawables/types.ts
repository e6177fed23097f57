import type { MathPoint } from '../geometry/types';

/** A named math-space position. Polygon loops are stitched together by vertex name. */
export interface Vertex extends MathPoint {
  readonly name: string;
}

interface DrawableBase {
  readonly name: string;
  /** CSS color; handlers fall back to the style table when absent. */
  readonly color?: string;
}

export interface PointDrawable extends DrawableBase, MathPoint {
  readonly type: 'point';
  /** Default: true. */
  readonly showLabel?: boolean;
}

export interface SegmentDrawable extends DrawableBase {
  readonly type: 'segment';
  readonly p1: Vertex;
  readonly p2: Vertex;
}

export interface VectorDrawable extends DrawableBase {
  readonly type: 'vector';
  readonly origin: Vertex;
  readonly tip: Vertex;
}

export interface CircleDrawable extends DrawableBase {
  readonly type: 'circle';
  readonly center: Vertex;
  readonly radius: number;
}

export interface EllipseDrawable extends DrawableBase {
  readonly type: 'ellipse';
  readonly center: Vertex;
  readonly radiusX: number;
  readonly radiusY: number;
  /** Degrees, counter-clockwise in math space. */
  readonly rotation: number;
}

/** The arc of a circle from `point1` to `point2`; only the endpoints' directions from `center` matter. */
export interface CircleArcDrawable extends DrawableBase {
  readonly type: 'circleArc';
  readonly center: Vertex;
  readonly radius: number;
  readonly point1: Vertex;
  readonly point2: Vertex;
  /** Take the long way round. Default: false. */
  readonly useMajorArc?: boolean;
}

export interface AngleDrawable extends DrawableBase {
  readonly type: 'angle';
  readonly vertex: Vertex;
  readonly arm1: Vertex;
  readonly arm2: Vertex;
  /** Draw the outer (> 180°) angle instead of the inner one. */
  readonly reflex: boolean;
}

/** Anything that can be sampled as y = f(x) over an optional declared domain. */
export interface FunctionLike {
  evaluate(x: number): number;
  readonly leftBound?: number;
  readonly rightBound?: number;
}

export interface FunctionDrawable extends DrawableBase, FunctionLike {
  readonly type: 'function';
  /** Source expression, kept for display. */
  readonly expression?: string;
}

/** A curve traced by (x(t), y(t)) for t in [tMin, tMax]. */
export interface ParametricFunctionDrawable extends DrawableBase {
  readonly type: 'parametricFunction';
  x(t: number): number;
  y(t: number): number;
  readonly tMin: number;
  readonly tMax: number;
  readonly samples: number;
}

export type PolygonKind =
  | 'triangle'
  | 'quadrilateral'
  | 'pentagon'
  | 'hexagon'
  | 'heptagon'
  | 'octagon'
  | 'nonagon'
  | 'decagon'
  | 'generic';

export interface PolygonDrawable extends DrawableBase {
  readonly type: 'polygon';
  readonly kind: PolygonKind;
  /** Boundary segments; consecutive segments share a vertex and the last closes back to the first. */
  readonly segments: readonly SegmentDrawable[];
  readonly isRenderable: boolean;
}

export interface LabelDrawable extends DrawableBase {
  readonly type: 'label';
  readonly text: string;
  /** `text` split and wrapped for display. */
  readonly lines: readonly string[];
  readonly position: MathPoint;
  readonly fontSize?: number;
  /** Degrees, clockwise on screen. */
  readonly rotation?: number;
  /** Scale at which `fontSize` is exact; smaller scales shrink the text. */
  readonly referenceScaleFactor?: number;
}

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
}

export interface GraphDrawable extends DrawableBase {
  readonly type: 'graph';
  readonly vertices: readonly Vertex[];
  readonly edges: readonly GraphEdge[];
  readonly directed: boolean;
}

/**
 * One side of a function-bounded area: a function, a horizontal line y = c,
 * or `null` for the x-axis.
 */
export type AreaBoundary = FunctionLike | number | null;

interface AreaBase extends DrawableBase {
  /** In [0, 1]; falls back to the style's `areaOpacity`. */
  readonly opacity?: number;
}

export interface FunctionsBoundedAreaDrawable extends AreaBase {
  readonly type: 'functionsBoundedArea';
  readonly func1: AreaBoundary;
  readonly func2: AreaBoundary;
  readonly leftBound?: number;
  readonly rightBound?: number;
  /** Samples per boundary. Default: 100. */
  readonly samples?: number;
}

export interface FunctionSegmentAreaDrawable extends AreaBase {
  readonly type: 'functionSegmentArea';
  readonly func: AreaBoundary;
  readonly segment: SegmentDrawable;
  readonly samples?: number;
}

export interface SegmentsBoundedAreaDrawable extends AreaBase {
  readonly type: 'segmentsBoundedArea';
  readonly segment1: SegmentDrawable;
  /** When absent, the area runs down (or up) to the x-axis. */
  readonly segment2?: SegmentDrawable;
}

export type ClosedShapeBoundary =
  | { readonly kind: 'polygon'; readonly segments: readonly SegmentDrawable[] }
  | { readonly kind: 'circle'; readonly circle: CircleDrawable }
  | { readonly kind: 'ellipse'; readonly ellipse: EllipseDrawable }
  | {
      readonly kind: 'circleSegment';
      readonly circle: CircleDrawable;
      readonly chord: SegmentDrawable;
      readonly clockwise?: boolean;
    }
  | {
      readonly kind: 'ellipseSegment';
      readonly ellipse: EllipseDrawable;
      readonly chord: SegmentDrawable;
      readonly clockwise?: boolean;
    };

export interface ClosedShapeAreaDrawable extends AreaBase {
  readonly type: 'closedShapeArea';
  readonly shape: ClosedShapeBoundary;
  /** Boundary samples for curved shapes. */
  readonly resolution?: number;
}

export type AreaDrawable =
  | FunctionsBoundedAreaDrawable
  | FunctionSegmentAreaDrawable
  | SegmentsBoundedAreaDrawable
  | ClosedShapeAreaDrawable;

export type Drawable =
  | PointDrawable
  | SegmentDrawable
  | VectorDrawable
  | CircleDrawable
  | EllipseDrawable
  | CircleArcDrawable
  | AngleDrawable
  | FunctionDrawable
  | ParametricFunctionDrawable
  | PolygonDrawable
  | LabelDrawable
  | GraphDrawable
  | AreaDrawable;

export type DrawableType = Drawable['type'];

export type DrawableOfType<T extends DrawableType> = Extract<Drawable, { readonly type: T }>;

export const isDrawableOfType = <T extends DrawableType>(drawable: Drawable, type: T): drawable is DrawableOfType<T> =>
  drawable.type === type;

export interface CartesianGrid {
  readonly type: 'cartesianGrid';
  readonly showAxes: boolean;
  readonly showGrid: boolean;
  readonly showTickLabels: boolean;
}

export interface PolarGrid {
  readonly type: 'polarGrid';
  /** Radial lines per full turn. */
  readonly angularDivisions: number;
  readonly showLabels: boolean;
}
