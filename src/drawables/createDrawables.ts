import { InvalidShapeError } from './InvalidShapeError';
import type {
  AngleDrawable,
  AreaBoundary,
  CartesianGrid,
  CircleArcDrawable,
  CircleDrawable,
  ClosedShapeAreaDrawable,
  ClosedShapeBoundary,
  EllipseDrawable,
  FunctionDrawable,
  FunctionSegmentAreaDrawable,
  FunctionsBoundedAreaDrawable,
  GraphDrawable,
  GraphEdge,
  LabelDrawable,
  ParametricFunctionDrawable,
  PointDrawable,
  PolarGrid,
  SegmentDrawable,
  SegmentsBoundedAreaDrawable,
  VectorDrawable,
  Vertex,
} from './types';
import type { MathPoint } from '../geometry/types';
import { renderDefaults } from '../config/defaults';

export const LABEL_TEXT_MAX_LENGTH = 160;
export const LABEL_LINE_WRAP_THRESHOLD = 40;

interface StyledOptions {
  readonly name?: string;
  readonly color?: string;
}

interface AreaOptions extends StyledOptions {
  readonly opacity?: number;
}

const assertFinite = (fn: string, label: string, ...values: number[]): void => {
  if (!values.every(Number.isFinite)) {
    throw new InvalidShapeError(`${fn}(${label}): coordinates must be finite numbers.`);
  }
};

const assertOpacity = (fn: string, opacity: number | undefined): void => {
  if (opacity !== undefined && !(Number.isFinite(opacity) && opacity >= 0 && opacity <= 1)) {
    throw new InvalidShapeError(`${fn}(opacity): opacity must be in [0, 1]. Received: ${String(opacity)}`);
  }
};

const assertInterval = (fn: string, left: number | undefined, right: number | undefined): void => {
  if (left !== undefined && !Number.isFinite(left)) {
    throw new InvalidShapeError(`${fn}(leftBound): bound must be finite. Received: ${String(left)}`);
  }
  if (right !== undefined && !Number.isFinite(right)) {
    throw new InvalidShapeError(`${fn}(rightBound): bound must be finite. Received: ${String(right)}`);
  }
  if (left !== undefined && right !== undefined && !(left < right)) {
    throw new InvalidShapeError(`${fn}(bounds): degenerate interval [${left}, ${right}].`);
  }
};

const assertSamples = (fn: string, samples: number | undefined): void => {
  if (samples !== undefined && !(Number.isInteger(samples) && samples >= 2)) {
    throw new InvalidShapeError(`${fn}(samples): expected an integer >= 2. Received: ${String(samples)}`);
  }
};

export function vertex(name: string, x: number, y: number): Vertex {
  assertFinite('vertex', name, x, y);
  return { name, x, y };
}

export function createPoint(name: string, x: number, y: number, options?: { color?: string; showLabel?: boolean }): PointDrawable {
  assertFinite('createPoint', name, x, y);
  return { type: 'point', name, x, y, color: options?.color, showLabel: options?.showLabel };
}

export function createSegment(p1: Vertex, p2: Vertex, options?: StyledOptions): SegmentDrawable {
  assertFinite('createSegment', 'endpoints', p1.x, p1.y, p2.x, p2.y);
  return { type: 'segment', name: options?.name ?? `${p1.name}${p2.name}`, color: options?.color, p1, p2 };
}

export function createVector(origin: Vertex, tip: Vertex, options?: StyledOptions): VectorDrawable {
  assertFinite('createVector', 'endpoints', origin.x, origin.y, tip.x, tip.y);
  return { type: 'vector', name: options?.name ?? `${origin.name}${tip.name}`, color: options?.color, origin, tip };
}

export function createCircle(center: Vertex, radius: number, options?: StyledOptions): CircleDrawable {
  assertFinite('createCircle', 'center', center.x, center.y);
  if (!(Number.isFinite(radius) && radius > 0)) {
    throw new InvalidShapeError(`createCircle(radius): radius must be a positive number. Received: ${String(radius)}`);
  }
  return { type: 'circle', name: options?.name ?? `(${center.name})`, color: options?.color, center, radius };
}

/**
 * Arc of the circle around `center` from `point1` to `point2`, the short way round unless
 * `useMajorArc` is set.
 * @throws {InvalidShapeError} on a non-positive radius or an endpoint at the center
 */
export function createCircleArc(
  center: Vertex,
  radius: number,
  point1: Vertex,
  point2: Vertex,
  options?: StyledOptions & { useMajorArc?: boolean }
): CircleArcDrawable {
  assertFinite('createCircleArc', 'points', center.x, center.y, point1.x, point1.y, point2.x, point2.y);
  if (!(Number.isFinite(radius) && radius > 0)) {
    throw new InvalidShapeError(`createCircleArc(radius): radius must be a positive number. Received: ${String(radius)}`);
  }
  for (const p of [point1, point2]) {
    if (p.x === center.x && p.y === center.y) {
      throw new InvalidShapeError(`createCircleArc(${p.name}): endpoint coincides with the center.`);
    }
  }
  return {
    type: 'circleArc',
    name: options?.name ?? `arc_${point1.name}${point2.name}`,
    color: options?.color,
    center,
    radius,
    point1,
    point2,
    useMajorArc: options?.useMajorArc ?? false,
  };
}

export function createEllipse(
  center: Vertex,
  radiusX: number,
  radiusY: number,
  options?: StyledOptions & { rotation?: number }
): EllipseDrawable {
  assertFinite('createEllipse', 'center', center.x, center.y);
  if (!(Number.isFinite(radiusX) && radiusX > 0 && Number.isFinite(radiusY) && radiusY > 0)) {
    throw new InvalidShapeError(
      `createEllipse(radii): radii must be positive numbers. Received: ${String(radiusX)}, ${String(radiusY)}`
    );
  }
  const rotation = options?.rotation ?? 0;
  assertFinite('createEllipse', 'rotation', rotation);
  return {
    type: 'ellipse',
    name: options?.name ?? `(${center.name})`,
    color: options?.color,
    center,
    radiusX,
    radiusY,
    rotation,
  };
}

export function createAngle(
  arm1: Vertex,
  vertexPoint: Vertex,
  arm2: Vertex,
  options?: StyledOptions & { reflex?: boolean }
): AngleDrawable {
  assertFinite('createAngle', 'points', arm1.x, arm1.y, vertexPoint.x, vertexPoint.y, arm2.x, arm2.y);
  const coincides = (p: Vertex): boolean => p.x === vertexPoint.x && p.y === vertexPoint.y;
  if (coincides(arm1) || coincides(arm2)) {
    throw new InvalidShapeError('createAngle(points): arm endpoints must differ from the vertex.');
  }
  return {
    type: 'angle',
    name: options?.name ?? `∠${arm1.name}${vertexPoint.name}${arm2.name}`,
    color: options?.color,
    vertex: vertexPoint,
    arm1,
    arm2,
    reflex: options?.reflex ?? false,
  };
}

export function createFunction(
  name: string,
  evaluate: (x: number) => number,
  options?: { color?: string; leftBound?: number; rightBound?: number; expression?: string }
): FunctionDrawable {
  assertInterval('createFunction', options?.leftBound, options?.rightBound);
  return {
    type: 'function',
    name,
    color: options?.color,
    evaluate,
    leftBound: options?.leftBound,
    rightBound: options?.rightBound,
    expression: options?.expression,
  };
}

export function createParametricFunction(
  name: string,
  x: (t: number) => number,
  y: (t: number) => number,
  options?: { color?: string; tMin?: number; tMax?: number; samples?: number }
): ParametricFunctionDrawable {
  const [defaultMin, defaultMax] = renderDefaults.parametricRange;
  const tMin = options?.tMin ?? defaultMin;
  const tMax = options?.tMax ?? defaultMax;
  if (!(Number.isFinite(tMin) && Number.isFinite(tMax) && tMin < tMax)) {
    throw new InvalidShapeError(`createParametricFunction(tRange): expected finite tMin < tMax. Received: [${tMin}, ${tMax}]`);
  }
  assertSamples('createParametricFunction', options?.samples);
  return {
    type: 'parametricFunction',
    name,
    color: options?.color,
    x,
    y,
    tMin,
    tMax,
    samples: options?.samples ?? renderDefaults.parametricSamples,
  };
}

const splitLongWord = (chunk: string): string[] => {
  if (chunk.length <= LABEL_LINE_WRAP_THRESHOLD) return [chunk];
  const parts: string[] = [];
  for (let start = 0; start < chunk.length; start += LABEL_LINE_WRAP_THRESHOLD) {
    parts.push(chunk.slice(start, start + LABEL_LINE_WRAP_THRESHOLD));
  }
  return parts;
};

const wrapLine = (line: string): string[] => {
  if (line.length <= LABEL_LINE_WRAP_THRESHOLD) return [line];
  const words = line.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) return [line];
  const lines: string[] = [];
  let current = words[0];
  for (const word of words.slice(1)) {
    const tentative = `${current} ${word}`;
    if (tentative.length <= LABEL_LINE_WRAP_THRESHOLD) {
      current = tentative;
    } else {
      lines.push(current);
      current = word;
    }
  }
  lines.push(current);
  return lines.flatMap(splitLongWord);
};

/** Splits on newlines, then word-wraps each line at {@link LABEL_LINE_WRAP_THRESHOLD} characters. */
export const wrapLabelText = (text: string): string[] => (text.length === 0 ? [''] : text.split('\n').flatMap(wrapLine));

export function createLabel(
  text: string,
  position: MathPoint,
  options?: StyledOptions & { fontSize?: number; rotation?: number; referenceScaleFactor?: number }
): LabelDrawable {
  const normalized = text.replace(/\r\n?/g, '\n').trim();
  if (normalized.length > LABEL_TEXT_MAX_LENGTH) {
    throw new InvalidShapeError(`createLabel(text): text exceeds ${LABEL_TEXT_MAX_LENGTH} characters.`);
  }
  assertFinite('createLabel', 'position', position.x, position.y);
  const fontSize = options?.fontSize;
  if (fontSize !== undefined && !(Number.isFinite(fontSize) && fontSize > 0)) {
    throw new InvalidShapeError(`createLabel(fontSize): font size must be positive. Received: ${String(fontSize)}`);
  }
  const reference = options?.referenceScaleFactor;
  return {
    type: 'label',
    name: options?.name ?? normalized,
    color: options?.color,
    text: normalized,
    lines: wrapLabelText(normalized),
    position: { x: position.x, y: position.y },
    fontSize,
    rotation: options?.rotation,
    referenceScaleFactor: reference !== undefined && Number.isFinite(reference) && reference > 0 ? reference : undefined,
  };
}

export function createGraph(
  name: string,
  vertices: readonly Vertex[],
  edges: readonly GraphEdge[],
  options?: { color?: string; directed?: boolean }
): GraphDrawable {
  const names = new Set<string>();
  for (const v of vertices) {
    assertFinite('createGraph', v.name, v.x, v.y);
    if (names.has(v.name)) throw new InvalidShapeError(`createGraph(vertices): duplicate vertex "${v.name}".`);
    names.add(v.name);
  }
  for (const edge of edges) {
    if (!names.has(edge.from) || !names.has(edge.to)) {
      throw new InvalidShapeError(`createGraph(edges): edge ${edge.from}->${edge.to} references an unknown vertex.`);
    }
  }
  return {
    type: 'graph',
    name,
    color: options?.color,
    vertices: [...vertices],
    edges: [...edges],
    directed: options?.directed ?? false,
  };
}

const boundaryName = (boundary: AreaBoundary): string => {
  if (boundary === null) return 'x_axis';
  if (typeof boundary === 'number') return `y_${boundary}`;
  return 'name' in boundary && typeof boundary.name === 'string' ? boundary.name : 'f';
};

export function createFunctionsBoundedArea(
  func1: AreaBoundary,
  func2: AreaBoundary,
  options?: AreaOptions & { leftBound?: number; rightBound?: number; samples?: number }
): FunctionsBoundedAreaDrawable {
  assertInterval('createFunctionsBoundedArea', options?.leftBound, options?.rightBound);
  assertOpacity('createFunctionsBoundedArea', options?.opacity);
  assertSamples('createFunctionsBoundedArea', options?.samples);
  if (typeof func1 === 'number') assertFinite('createFunctionsBoundedArea', 'func1', func1);
  if (typeof func2 === 'number') assertFinite('createFunctionsBoundedArea', 'func2', func2);
  return {
    type: 'functionsBoundedArea',
    name: options?.name ?? `area_between_${boundaryName(func1)}_and_${boundaryName(func2)}`,
    color: options?.color,
    opacity: options?.opacity,
    func1,
    func2,
    leftBound: options?.leftBound,
    rightBound: options?.rightBound,
    samples: options?.samples ?? renderDefaults.areaSamples,
  };
}

export function createFunctionSegmentArea(
  func: AreaBoundary,
  segment: SegmentDrawable,
  options?: AreaOptions & { samples?: number }
): FunctionSegmentAreaDrawable {
  assertOpacity('createFunctionSegmentArea', options?.opacity);
  assertSamples('createFunctionSegmentArea', options?.samples);
  if (typeof func === 'number') assertFinite('createFunctionSegmentArea', 'func', func);
  return {
    type: 'functionSegmentArea',
    name: options?.name ?? `area_between_${boundaryName(func)}_and_${segment.name}`,
    color: options?.color,
    opacity: options?.opacity,
    func,
    segment,
    samples: options?.samples ?? renderDefaults.areaSamples,
  };
}

export function createSegmentsBoundedArea(
  segment1: SegmentDrawable,
  segment2?: SegmentDrawable,
  options?: AreaOptions
): SegmentsBoundedAreaDrawable {
  assertOpacity('createSegmentsBoundedArea', options?.opacity);
  return {
    type: 'segmentsBoundedArea',
    name: options?.name ?? `area_between_${segment1.name}_and_${segment2 ? segment2.name : 'x_axis'}`,
    color: options?.color,
    opacity: options?.opacity,
    segment1,
    segment2,
  };
}

export function createClosedShapeArea(
  shape: ClosedShapeBoundary,
  options?: AreaOptions & { resolution?: number }
): ClosedShapeAreaDrawable {
  assertOpacity('createClosedShapeArea', options?.opacity);
  assertSamples('createClosedShapeArea', options?.resolution);
  if (shape.kind === 'polygon' && shape.segments.length < 3) {
    throw new InvalidShapeError(
      `createClosedShapeArea(shape): a polygon boundary needs at least 3 segments, received ${shape.segments.length}.`
    );
  }
  const baseName =
    shape.kind === 'polygon'
      ? shape.segments.map((s) => s.name).join('_')
      : shape.kind === 'circle' || shape.kind === 'circleSegment'
        ? shape.circle.name
        : shape.ellipse.name;
  return {
    type: 'closedShapeArea',
    name: options?.name ?? `${shape.kind}_area_${baseName}`,
    color: options?.color,
    opacity: options?.opacity,
    shape,
    resolution: options?.resolution,
  };
}

export function createCartesianGrid(options?: Partial<Omit<CartesianGrid, 'type'>>): CartesianGrid {
  return {
    type: 'cartesianGrid',
    showAxes: options?.showAxes ?? true,
    showGrid: options?.showGrid ?? true,
    showTickLabels: options?.showTickLabels ?? true,
  };
}

export function createPolarGrid(options?: Partial<Omit<PolarGrid, 'type'>>): PolarGrid {
  const divisions = options?.angularDivisions ?? renderDefaults.polarAngularDivisions;
  if (!(Number.isInteger(divisions) && divisions > 0)) {
    throw new InvalidShapeError(`createPolarGrid(angularDivisions): expected a positive integer. Received: ${String(divisions)}`);
  }
  return { type: 'polarGrid', angularDivisions: divisions, showLabels: options?.showLabels ?? true };
}
