import { resolveStyle } from '../../config/StyleResolver';
import type { GPUContextState } from '../../core/GPUContext';
import { createDrawableRenderer, type DrawableRendererOptions, type Renderer } from '../createDrawableRenderer';
import type { LabelLayer } from './createLabelLayer';
import { createWebGPUPrimitives, type WebGPUPrimitivesOptions } from './createWebGPUPrimitives';

export interface WebGPURendererOptions extends DrawableRendererOptions {
  readonly gpuContext: GPUContextState;
  readonly labelLayer?: LabelLayer;
  readonly ownsResources?: WebGPUPrimitivesOptions['ownsResources'];
}

/**
 * GPU-backed renderer. Output is presented at `endFrame()`, so draw inside
 * `beginFrame()` / `endFrame()`.
 */
export function createWebGPURenderer(options: WebGPURendererOptions): Renderer {
  const style = resolveStyle(options.style);
  const primitives = createWebGPUPrimitives({
    gpuContext: options.gpuContext,
    labelLayer: options.labelLayer,
    background: style.canvasBackground,
    ownsResources: options.ownsResources,
  });
  return createDrawableRenderer(primitives, {
    style,
    labelResolver: options.labelResolver,
    registerDefaults: options.registerDefaults,
  });
}
