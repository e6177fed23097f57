/**
 * GPUContext - WebGPU adapter, device and canvas setup for the GPU backend.
 *
 * Functional API: every operation returns a new immutable state object.
 */

/** Options for GPU context initialization. */
export interface GPUContextOptions {
  /** DPR for high-DPI displays. Auto-detects from `window.devicePixelRatio`, defaults to 1.0. */
  readonly devicePixelRatio?: number;
  /** Canvas alpha mode. Default: 'premultiplied', so the page shows through transparent backgrounds. */
  readonly alphaMode?: 'opaque' | 'premultiplied';
  /** GPU power preference for adapter selection. Default: 'low-power'. */
  readonly powerPreference?: 'low-power' | 'high-performance';
  /**
   * Shared adapter and device. Used only when both are given; the caller then owns the device
   * and `destroyGPUContext` will not destroy it.
   */
  readonly adapter?: GPUAdapter;
  readonly device?: GPUDevice;
}

export interface GPUContextState {
  readonly adapter: GPUAdapter | null;
  readonly device: GPUDevice | null;
  readonly initialized: boolean;
  readonly canvas: HTMLCanvasElement | null;
  readonly canvasContext: GPUCanvasContext | null;
  readonly preferredFormat: GPUTextureFormat | null;
  readonly devicePixelRatio: number;
  readonly alphaMode: 'opaque' | 'premultiplied';
  readonly powerPreference: 'low-power' | 'high-performance';
  /** False for injected devices. */
  readonly ownsDevice: boolean;
}

const sanitizeDpr = (dpr: number): number => (Number.isFinite(dpr) && dpr > 0 ? dpr : 1);

/** CSS size of the canvas, falling back to its backing size when it is not laid out. */
function getCanvasDimensions(canvas: HTMLCanvasElement): { width: number; height: number } {
  const width = canvas.clientWidth || canvas.width || 0;
  const height = canvas.clientHeight || canvas.height || 0;
  if (!Number.isFinite(width) || !Number.isFinite(height)) {
    throw new Error(`GPUContext: invalid canvas dimensions ${String(width)}x${String(height)}.`);
  }
  return { width, height };
}

const destroyOwnedDevice = (device: GPUDevice | null, ownsDevice: boolean, when: string): void => {
  if (!ownsDevice || !device) return;
  try {
    device.destroy();
  } catch (error) {
    console.warn(`GPUContext: error destroying device ${when}.`, error);
  }
};

export function createGPUContext(canvas?: HTMLCanvasElement, options?: GPUContextOptions): GPUContextState {
  const dpr = sanitizeDpr(options?.devicePixelRatio ?? (typeof window !== 'undefined' ? window.devicePixelRatio : 1));
  const adapter = options?.adapter ?? null;
  const device = options?.device ?? null;
  const injected = adapter !== null && device !== null;

  return {
    adapter: injected ? adapter : null,
    device: injected ? device : null,
    initialized: false,
    canvas: canvas ?? null,
    canvasContext: null,
    preferredFormat: null,
    devicePixelRatio: dpr,
    alphaMode: options?.alphaMode ?? 'premultiplied',
    powerPreference: options?.powerPreference ?? 'low-power',
    ownsDevice: !injected,
  };
}

/**
 * Requests an adapter and device (or adopts the injected pair), then sizes and configures the
 * canvas when one is attached.
 *
 * @throws {Error} When WebGPU is unavailable, no adapter or device is granted, the canvas has no
 * WebGPU context, or the context is already initialized.
 */
export async function initializeGPUContext(context: GPUContextState): Promise<GPUContextState> {
  if (context.initialized) {
    throw new Error('GPUContext: already initialized. Call destroyGPUContext() before reinitializing.');
  }
  if (typeof navigator === 'undefined' || !navigator.gpu) {
    throw new Error('GPUContext: WebGPU is not available in this environment.');
  }

  const dpr = sanitizeDpr(context.devicePixelRatio);
  let adapter: GPUAdapter | null = null;
  let device: GPUDevice | null = null;
  let ownsDevice = true;

  try {
    if (context.adapter && context.device) {
      adapter = context.adapter;
      device = context.device;
      ownsDevice = false;
    } else {
      adapter = await navigator.gpu.requestAdapter({ powerPreference: context.powerPreference });
      if (!adapter) {
        throw new Error('GPUContext: failed to request a WebGPU adapter. No compatible adapter found.');
      }
      device = await adapter.requestDevice();
      if (!device) {
        throw new Error('GPUContext: failed to request a WebGPU device from the adapter.');
      }
      device.addEventListener('uncapturederror', (event: GPUUncapturedErrorEvent) => {
        console.error('WebGPU uncaptured error:', event.error);
      });
    }

    let canvasContext: GPUCanvasContext | null = null;
    let preferredFormat: GPUTextureFormat | null = null;

    if (context.canvas) {
      const webgpuContext = context.canvas.getContext('webgpu');
      if (!webgpuContext) {
        throw new Error('GPUContext: failed to get a WebGPU context from the canvas.');
      }

      const { width, height } = getCanvasDimensions(context.canvas);
      const maxDim = device.limits.maxTextureDimension2D;
      context.canvas.width = Math.max(1, Math.min(Math.floor(width * dpr), maxDim));
      context.canvas.height = Math.max(1, Math.min(Math.floor(height * dpr), maxDim));

      preferredFormat = navigator.gpu.getPreferredCanvasFormat?.() || 'bgra8unorm';
      webgpuContext.configure({ device, format: preferredFormat, alphaMode: context.alphaMode });
      canvasContext = webgpuContext;
    }

    return {
      adapter,
      device,
      initialized: true,
      canvas: context.canvas,
      canvasContext,
      preferredFormat,
      devicePixelRatio: dpr,
      alphaMode: context.alphaMode,
      powerPreference: context.powerPreference,
      ownsDevice,
    };
  } catch (error) {
    destroyOwnedDevice(device, ownsDevice, 'during initialization failure');
    if (error instanceof Error) throw error;
    throw new Error(`GPUContext: initialization failed: ${String(error)}`);
  }
}

/**
 * @throws {Error} If no canvas is attached or the context is not initialized.
 */
export function getCanvasTexture(context: GPUContextState): GPUTexture {
  if (!context.canvas) {
    throw new Error('GPUContext: no canvas is attached. Provide a canvas when creating the context.');
  }
  if (!context.initialized || !context.canvasContext) {
    throw new Error('GPUContext: not initialized. Call initializeGPUContext() first.');
  }
  return context.canvasContext.getCurrentTexture();
}

/**
 * Unconfigures the canvas context and destroys the device when this context created it.
 * The returned state must be reinitialized before use.
 */
export function destroyGPUContext(context: GPUContextState): GPUContextState {
  if (context.canvasContext) {
    try {
      context.canvasContext.unconfigure();
    } catch (error) {
      console.warn('GPUContext: error unconfiguring the canvas context.', error);
    }
  }
  destroyOwnedDevice(context.device, context.ownsDevice, 'on destroy');

  return {
    adapter: null,
    device: null,
    initialized: false,
    canvas: context.canvas,
    canvasContext: null,
    preferredFormat: null,
    devicePixelRatio: context.devicePixelRatio,
    alphaMode: context.alphaMode,
    powerPreference: context.powerPreference,
    ownsDevice: true,
  };
}

/** Creates and initializes a GPU context in one step. */
export async function createGPUContextAsync(canvas?: HTMLCanvasElement, options?: GPUContextOptions): Promise<GPUContextState> {
  return initializeGPUContext(createGPUContext(canvas, options));
}
