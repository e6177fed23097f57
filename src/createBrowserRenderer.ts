import { createGPUContextAsync, destroyGPUContext, type GPUContextOptions, type GPUContextState } from './core/GPUContext';
import { createRenderer, type CreateRendererOptions, type RendererBackends } from './createRenderer';
import { createCanvas2DRenderer } from './renderers/canvas2d/createCanvas2DRenderer';
import type { DrawableRendererOptions, Renderer } from './renderers/createDrawableRenderer';
import { createSvgRenderer } from './renderers/svg/createSvgRenderer';
import { createLabelLayer } from './renderers/webgpu/createLabelLayer';
import { createWebGPURenderer } from './renderers/webgpu/createWebGPURenderer';
import { checkWebGPUSupport } from './utils/checkWebGPU';

/** Drawing surfaces the host page offers. Each backend is registered only for its surface. */
export interface BrowserRendererEnvironment extends DrawableRendererOptions {
  readonly canvas?: HTMLCanvasElement | null;
  readonly svg?: Element | null;
  /** WebGPU canvas; labels go to a DOM layer on its parent element. */
  readonly gpuCanvas?: HTMLCanvasElement | null;
  readonly gpuOptions?: GPUContextOptions;
}

export interface BrowserRendererBackends {
  readonly backends: RendererBackends;
  /** Destroys the GPU context when no WebGPU renderer was constructed from it. */
  releaseUnused(): void;
}

/**
 * Builds the backend map for {@link createRenderer}. WebGPU is registered only when
 * `checkWebGPUSupport()` succeeds and the GPU context initializes.
 */
export async function createBrowserRendererBackends(environment: BrowserRendererEnvironment): Promise<BrowserRendererBackends> {
  const rendererOptions: DrawableRendererOptions = {
    style: environment.style,
    labelResolver: environment.labelResolver,
    registerDefaults: environment.registerDefaults,
  };
  const backends: RendererBackends = {};

  const { canvas, svg, gpuCanvas } = environment;
  if (canvas) backends.canvas2d = () => createCanvas2DRenderer({ ...rendererOptions, canvas });
  if (svg) backends.svg = () => createSvgRenderer({ ...rendererOptions, svg });

  let unusedGpuContext: GPUContextState | null = null;
  if (gpuCanvas) {
    const support = await checkWebGPUSupport();
    if (!support.supported) {
      console.warn('createBrowserRendererBackends: WebGPU backend not registered.', support.reason);
    } else {
      try {
        const gpuContext = await createGPUContextAsync(gpuCanvas, environment.gpuOptions);
        unusedGpuContext = gpuContext;
        backends.webgpu = () => {
          const container = gpuCanvas.parentElement;
          const labelLayer = container ? createLabelLayer(container) : undefined;
          try {
            const renderer = createWebGPURenderer({ ...rendererOptions, gpuContext, labelLayer, ownsResources: true });
            unusedGpuContext = null;
            return renderer;
          } catch (error) {
            // The context stays with releaseUnused(); only the layer is ours to undo.
            labelLayer?.dispose();
            throw error;
          }
        };
      } catch (error) {
        console.warn('createBrowserRendererBackends: WebGPU backend not registered.', error);
      }
    }
  }

  return {
    backends,
    releaseUnused() {
      if (!unusedGpuContext) return;
      destroyGPUContext(unusedGpuContext);
      unusedGpuContext = null;
    },
  };
}

/** {@link createRenderer} over the surfaces in `environment`; unused GPU resources are released. */
export async function createBrowserRenderer(
  preferred: string | null | undefined,
  environment: BrowserRendererEnvironment,
  options?: CreateRendererOptions
): Promise<Renderer | null> {
  const { backends, releaseUnused } = await createBrowserRendererBackends(environment);
  const renderer = createRenderer(preferred, backends, options);
  releaseUnused();
  return renderer;
}
