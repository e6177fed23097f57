import { resolveStyle } from '../config/StyleResolver';
import type { RendererStyle } from '../config/types';
import type { CoordinateMapperLike } from '../core/coordinateMapper';
import { isDrawableOfType, type CartesianGrid, type Drawable, type DrawableType, type PolarGrid } from '../drawables/types';
import {
  createLabelOverlapResolver,
  type LabelOverlapResolver,
  type LabelOverlapResolverOptions,
} from '../labels/labelOverlapResolver';
import type { DrawContext, DrawHandler } from './drawContext';
import type { RendererPrimitives } from './primitives';
import { renderAngle } from './helpers/renderAngle';
import { renderCartesianGrid } from './helpers/renderCartesian';
import { renderColoredArea } from './helpers/renderColoredArea';
import { renderCircle, renderCircleArc, renderEllipse } from './helpers/renderConics';
import { renderFunction, renderParametricFunction } from './helpers/renderFunction';
import { renderGraph } from './helpers/renderGraph';
import { renderLabel } from './helpers/renderLabel';
import { renderPoint } from './helpers/renderPoint';
import { renderPolarGrid } from './helpers/renderPolar';
import { renderPolygon } from './helpers/renderPolygon';
import { renderSegment } from './helpers/renderSegment';
import { renderVector } from './helpers/renderVector';

export interface DrawableRendererOptions {
  /** Partial style overrides; validated by `resolveStyle`. */
  readonly style?: unknown;
  readonly labelResolver?: LabelOverlapResolverOptions;
  /** Default: true. */
  readonly registerDefaults?: boolean;
}

/** The renderer every backend hands out. */
export interface Renderer {
  readonly backend: string;
  readonly style: RendererStyle;
  /** Replaces any handler already registered for `type`. */
  register<T extends DrawableType>(type: T, handler: DrawHandler<T>): void;
  registerDefaultDrawables(): void;
  hasHandler(type: DrawableType): boolean;
  /**
   * Draws `drawable` through the handler registered for its type. Returns false when no
   * handler is registered, the handler reports failure, or the handler throws.
   */
  render(drawable: Drawable, mapper: CoordinateMapperLike): boolean;
  renderCartesian(grid: CartesianGrid, mapper: CoordinateMapperLike): boolean;
  renderPolar(grid: PolarGrid, mapper: CoordinateMapperLike): boolean;
  /** Clears the surface and opens a layout pass with a fresh label resolver. */
  beginFrame(): void;
  /** Flushes buffered output and discards the pass's label placements. */
  endFrame(): void;
  clear(): void;
  dispose(): void;
}

type ErasedHandler = (context: DrawContext, drawable: Drawable) => boolean;

export function createDrawableRenderer(primitives: RendererPrimitives, options?: DrawableRendererOptions): Renderer {
  const style = resolveStyle(options?.style);
  const handlers = new Map<DrawableType, ErasedHandler>();
  let frameLabels: LabelOverlapResolver | null = null;
  let disposed = false;

  const contextFor = (mapper: CoordinateMapperLike): DrawContext => ({
    primitives,
    mapper,
    style,
    labels: frameLabels ?? createLabelOverlapResolver(options?.labelResolver),
  });

  const guarded = (label: string, draw: () => boolean): boolean => {
    if (disposed) return false;
    try {
      return draw();
    } catch (error) {
      console.warn(`DrawableRenderer(${primitives.backend}): ${label} failed to draw.`, error);
      return false;
    }
  };

  const register = <T extends DrawableType>(type: T, handler: DrawHandler<T>): void => {
    handlers.set(type, (context, drawable) => isDrawableOfType(drawable, type) && handler(context, drawable));
  };

  const registerDefaultDrawables = (): void => {
    register('point', renderPoint);
    register('segment', renderSegment);
    register('vector', renderVector);
    register('circle', renderCircle);
    register('ellipse', renderEllipse);
    register('circleArc', renderCircleArc);
    register('angle', renderAngle);
    register('function', renderFunction);
    register('parametricFunction', renderParametricFunction);
    register('polygon', renderPolygon);
    register('label', renderLabel);
    register('graph', renderGraph);
    register('functionsBoundedArea', renderColoredArea);
    register('functionSegmentArea', renderColoredArea);
    register('segmentsBoundedArea', renderColoredArea);
    register('closedShapeArea', renderColoredArea);
  };

  if (options?.registerDefaults !== false) registerDefaultDrawables();

  return {
    get backend() {
      return primitives.backend;
    },
    style,
    register,
    registerDefaultDrawables,
    hasHandler: (type) => handlers.has(type),
    render(drawable, mapper) {
      const handler = handlers.get(drawable.type);
      if (!handler) return false;
      return guarded(`${drawable.type} '${drawable.name}'`, () => handler(contextFor(mapper), drawable));
    },
    renderCartesian(grid, mapper) {
      return guarded('cartesian grid', () => renderCartesianGrid(contextFor(mapper), grid));
    },
    renderPolar(grid, mapper) {
      return guarded('polar grid', () => renderPolarGrid(contextFor(mapper), grid));
    },
    beginFrame() {
      if (disposed) return;
      frameLabels = createLabelOverlapResolver(options?.labelResolver);
      primitives.beginFrame();
    },
    endFrame() {
      if (disposed) return;
      frameLabels = null;
      primitives.endFrame();
    },
    clear() {
      if (disposed) return;
      primitives.clearSurface();
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      frameLabels = null;
      handlers.clear();
      primitives.dispose();
    },
  };
}
