/**
 * WebGPU boilerplate shared by the GPU backend.
 *
 * All helpers take `device: GPUDevice` first and create resources without mutating external state.
 */

export type ShaderStageSource = {
  readonly code: string;
  readonly label?: string;
  /** Defaults: `vsMain` for the vertex stage, `fsMain` for the fragment stage. */
  readonly entryPoint?: string;
};

export type VertexStageConfig = ShaderStageSource & {
  readonly buffers?: readonly GPUVertexBufferLayout[];
};

export type FragmentStageConfig = ShaderStageSource & {
  readonly format: GPUTextureFormat;
  readonly blend?: GPUBlendState;
};

export interface RenderPipelineConfig {
  readonly label?: string;
  readonly bindGroupLayouts: readonly GPUBindGroupLayout[];
  readonly vertex: VertexStageConfig;
  readonly fragment: FragmentStageConfig;
  readonly primitive?: GPUPrimitiveState;
  readonly multisample?: GPUMultisampleState;
}

const DEFAULT_VERTEX_ENTRY = 'vsMain';
const DEFAULT_FRAGMENT_ENTRY = 'fsMain';

/** Straight-alpha "over" blending. */
export const ALPHA_BLEND: GPUBlendState = {
  color: { operation: 'add', srcFactor: 'src-alpha', dstFactor: 'one-minus-src-alpha' },
  alpha: { operation: 'add', srcFactor: 'one', dstFactor: 'one-minus-src-alpha' },
};

const isPowerOfTwo = (n: number): boolean => Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;

export const alignTo = (value: number, alignment: number): number => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`alignTo(value): value must be a finite non-negative number. Received: ${String(value)}`);
  }
  if (!isPowerOfTwo(alignment)) {
    throw new Error(`alignTo(alignment): alignment must be a positive power of two. Received: ${String(alignment)}`);
  }
  const v = Math.floor(value);
  return (v + alignment - 1) & ~(alignment - 1);
};

export function createShaderModule(device: GPUDevice, code: string, label?: string): GPUShaderModule {
  if (code.length === 0) {
    throw new Error('createShaderModule(code): WGSL code must be a non-empty string.');
  }
  return device.createShaderModule({ code, label });
}

/**
 * Creates a render pipeline with an explicit layout. The vertex and fragment stages share one
 * module when they share source.
 *
 * Defaults: `triangle-list` topology, no culling, `multisample.count: 1`.
 */
export function createRenderPipeline(device: GPUDevice, config: RenderPipelineConfig): GPURenderPipeline {
  const vertexModule = createShaderModule(device, config.vertex.code, config.vertex.label);
  const fragmentModule =
    config.fragment.code === config.vertex.code
      ? vertexModule
      : createShaderModule(device, config.fragment.code, config.fragment.label);

  return device.createRenderPipeline({
    label: config.label,
    layout: device.createPipelineLayout({ bindGroupLayouts: [...config.bindGroupLayouts] }),
    vertex: {
      module: vertexModule,
      entryPoint: config.vertex.entryPoint ?? DEFAULT_VERTEX_ENTRY,
      buffers: config.vertex.buffers ? [...config.vertex.buffers] : [],
    },
    fragment: {
      module: fragmentModule,
      entryPoint: config.fragment.entryPoint ?? DEFAULT_FRAGMENT_ENTRY,
      targets: [{ format: config.fragment.format, blend: config.fragment.blend }],
    },
    primitive: config.primitive ?? { topology: 'triangle-list', cullMode: 'none' },
    multisample: config.multisample ?? { count: 1 },
  });
}

/**
 * Creates a uniform buffer. Sizes are rounded up to 16 bytes, the WGSL uniform alignment.
 */
export function createUniformBuffer(device: GPUDevice, size: number, label?: string): GPUBuffer {
  if (!Number.isFinite(size) || size <= 0) {
    throw new Error(`createUniformBuffer(size): size must be a positive number. Received: ${String(size)}`);
  }
  const alignedSize = alignTo(size, 16);
  const maxSize = device.limits.maxUniformBufferBindingSize;
  if (alignedSize > maxSize) {
    throw new Error(
      `createUniformBuffer(size): requested size ${alignedSize} exceeds device.limits.maxUniformBufferBindingSize (${maxSize}).`
    );
  }
  return device.createBuffer({ label, size: alignedSize, usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST });
}

/**
 * Writes a typed array at offset 0. `queue.writeBuffer()` needs 4-byte-aligned offsets and sizes.
 */
export function writeBuffer(device: GPUDevice, buffer: GPUBuffer, data: Float32Array): void {
  if (data.byteLength === 0) return;
  if (data.byteLength > buffer.size) {
    throw new Error(`writeBuffer(data): data byteLength (${data.byteLength}) exceeds buffer.size (${buffer.size}).`);
  }
  device.queue.writeBuffer(buffer, 0, data.buffer, data.byteOffset, data.byteLength);
}

export function destroyBuffer(buffer: GPUBuffer | null, owner: string): void {
  if (!buffer) return;
  try {
    buffer.destroy();
  } catch (error) {
    console.warn(`${owner}: error destroying GPU buffer.`, error);
  }
}

/**
 * Returns `current` when it holds at least `byteLength` bytes, otherwise destroys it and
 * allocates a vertex buffer of the next power of two.
 */
export function ensureVertexBuffer(device: GPUDevice, current: GPUBuffer | null, byteLength: number, label: string): GPUBuffer {
  const required = Math.max(4, alignTo(byteLength, 4));
  if (current && current.size >= required) return current;
  destroyBuffer(current, label);
  let size = 256;
  while (size < required) size *= 2;
  return device.createBuffer({ label, size, usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST });
}
