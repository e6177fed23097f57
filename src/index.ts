/**
 * geocanvas-render - rendering core for interactive math canvases (Canvas 2D, SVG and WebGPU)
 */

export const version = '1.0.0';

// Renderer factory
export {
  RENDERER_BACKEND_IDS,
  buildPreferenceChain,
  createRenderer,
  isRendererBackendId,
} from './createRenderer';
export type { CreateRendererOptions, RendererBackendId, RendererBackends, RendererConstructor } from './createRenderer';
export { createBrowserRenderer, createBrowserRendererBackends } from './createBrowserRenderer';
export type { BrowserRendererBackends, BrowserRendererEnvironment } from './createBrowserRenderer';

// Registry & dispatch
export { createDrawableRenderer } from './renderers/createDrawableRenderer';
export type { DrawableRendererOptions, Renderer } from './renderers/createDrawableRenderer';
export type { DrawContext, DrawHandler } from './renderers/drawContext';
export { defaultTextAlignment, toCssFont, withShape } from './renderers/primitives';
export type {
  FillStyle,
  FontStyle,
  HorizontalAlign,
  RendererPrimitives,
  StrokeStyle,
  TextAlignment,
  VerticalBaseline,
} from './renderers/primitives';

// Backends
export { createCanvas2DPrimitives } from './renderers/canvas2d/createCanvas2DPrimitives';
export type { Canvas2DPrimitivesOptions } from './renderers/canvas2d/createCanvas2DPrimitives';
export { createCanvas2DRenderer } from './renderers/canvas2d/createCanvas2DRenderer';
export type { Canvas2DRendererOptions } from './renderers/canvas2d/createCanvas2DRenderer';
export { SVG_NS, createSvgPrimitives } from './renderers/svg/createSvgPrimitives';
export type { SvgPrimitivesOptions } from './renderers/svg/createSvgPrimitives';
export { createSvgRenderer } from './renderers/svg/createSvgRenderer';
export type { SvgRendererOptions } from './renderers/svg/createSvgRenderer';
export { createWebGPUPrimitives } from './renderers/webgpu/createWebGPUPrimitives';
export type { WebGPUPrimitivesOptions } from './renderers/webgpu/createWebGPUPrimitives';
export { createWebGPURenderer } from './renderers/webgpu/createWebGPURenderer';
export type { WebGPURendererOptions } from './renderers/webgpu/createWebGPURenderer';
export { createLabelLayer } from './renderers/webgpu/createLabelLayer';
export type { LabelLayer } from './renderers/webgpu/createLabelLayer';

// GPU context
export {
  createGPUContext,
  createGPUContextAsync,
  destroyGPUContext,
  getCanvasTexture,
  initializeGPUContext,
} from './core/GPUContext';
export type { GPUContextOptions, GPUContextState } from './core/GPUContext';
export { checkWebGPUSupport, resetWebGPUSupportCheck } from './utils/checkWebGPU';
export type { WebGPUSupportResult } from './utils/checkWebGPU';
export { parseCssColorToRgba01 } from './utils/colors';
export type { Rgba01 } from './utils/colors';

// Coordinate mapping
export {
  createCoordinateMapper,
  effectiveScale,
  projectLength,
  projectPoint,
  tryVisibleBounds,
} from './core/coordinateMapper';
export type {
  CoordinateMapper,
  CoordinateMapperLike,
  CoordinateMapperOptions,
  CoordinateMapperState,
  VisibleBounds,
  ZoomDirection,
} from './core/coordinateMapper';

// Style dictionary
export { defaultStyle, renderDefaults } from './config/defaults';
export { fontFor, resolveStyle } from './config/StyleResolver';
export type { RendererStyle, RendererStyleOverrides, StyleKey } from './config/types';

// Drawables
export * from './drawables/createDrawables';
export { InvalidShapeError } from './drawables/InvalidShapeError';
export { classifyPolygon, createPolygon, polygonSideCounts, polygonVertices } from './drawables/polygon';
export type { PolygonClassification, PolygonOptions } from './drawables/polygon';
export { isDrawableOfType } from './drawables/types';
export type * from './drawables/types';

// Geometry
export type { MathPoint, ScreenPoint, Vec2 } from './geometry/types';
export {
  classifyPolygonVertices,
  classifyQuadrilateralVertices,
  classifyTriangleVertices,
  polygonInteriorAngles,
  polygonSideLengths,
  signedArea2,
} from './geometry/classifyPolygon';
export type { PolygonTypeFlags, QuadrilateralTypeFlags, TriangleTypeFlags } from './geometry/classifyPolygon';
export { orderSegmentsIntoLoop } from './geometry/polygonLoop';

// Area builders
export { buildFunctionsBoundedArea, resolveFunctionsAreaBounds } from './areas/buildFunctionsArea';
export type { AreaBuildOptions } from './areas/buildFunctionsArea';
export { buildFunctionSegmentArea } from './areas/buildFunctionSegmentArea';
export { buildSegmentsBoundedArea } from './areas/buildSegmentsArea';
export { buildClosedShapeArea } from './areas/buildClosedShapeArea';
export type { ClosedArea } from './areas/closedArea';

// Labels
export { createLabelOverlapResolver, rectsOverlap } from './labels/labelOverlapResolver';
export type { LabelOverlapResolver, LabelOverlapResolverOptions, LabelRect } from './labels/labelOverlapResolver';
export { computeZoomAdjustedFontSize, estimateTextRect } from './labels/fontSizing';
