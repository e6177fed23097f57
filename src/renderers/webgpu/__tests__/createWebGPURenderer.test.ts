/// <reference types="@webgpu/types" />

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createCoordinateMapper } from '../../../core/coordinateMapper';
import { createGPUContext, type GPUContextState } from '../../../core/GPUContext';
import { createPoint } from '../../../drawables/createDrawables';
import type { LabelLayer } from '../createLabelLayer';
import { createWebGPUPrimitives } from '../createWebGPUPrimitives';
import { createWebGPURenderer } from '../createWebGPURenderer';

const BUFFER_USAGE = { VERTEX: 0x20, COPY_DST: 0x08, UNIFORM: 0x40 };

function createMockDevice() {
  const pass = {
    setPipeline: vi.fn(),
    setBindGroup: vi.fn(),
    setVertexBuffer: vi.fn(),
    draw: vi.fn(),
    end: vi.fn(),
  };
  const buffers: { size: number; destroy: ReturnType<typeof vi.fn> }[] = [];
  const device = {
    limits: { maxUniformBufferBindingSize: 65536, maxTextureDimension2D: 8192 },
    createShaderModule: vi.fn(() => ({})),
    createBindGroupLayout: vi.fn(() => ({})),
    createPipelineLayout: vi.fn(() => ({})),
    createRenderPipeline: vi.fn(() => ({})),
    createBindGroup: vi.fn(() => ({})),
    createBuffer: vi.fn((descriptor: { size: number }) => {
      const buffer = { size: descriptor.size, destroy: vi.fn() };
      buffers.push(buffer);
      return buffer;
    }),
    createCommandEncoder: vi.fn(() => ({
      beginRenderPass: vi.fn((_descriptor: { colorAttachments: unknown[] }) => pass),
      finish: vi.fn(() => ({})),
    })),
    queue: { writeBuffer: vi.fn(), submit: vi.fn() },
    destroy: vi.fn(),
  };
  return { device, pass, buffers };
}

function createMockGpuContext(device: ReturnType<typeof createMockDevice>['device']) {
  const canvasContext = {
    getCurrentTexture: vi.fn(() => ({ createView: vi.fn(() => ({})) })),
    unconfigure: vi.fn(),
  };
  const state: GPUContextState = {
    adapter: {} as unknown as GPUAdapter,
    device: device as unknown as GPUDevice,
    initialized: true,
    canvas: { width: 400, height: 200 } as unknown as HTMLCanvasElement,
    canvasContext: canvasContext as unknown as GPUCanvasContext,
    preferredFormat: 'bgra8unorm',
    devicePixelRatio: 2,
    alphaMode: 'premultiplied',
    powerPreference: 'low-power',
    ownsDevice: true,
  };
  return { state, canvasContext };
}

function createMockLabelLayer() {
  const layer = {
    drawText: vi.fn<Parameters<LabelLayer['drawText']>, void>(),
    clear: vi.fn(),
    dispose: vi.fn(),
  };
  return { layer, labelLayer: layer satisfies LabelLayer };
}

/** Floats of the `index`-th vertex passed to the `call`-th `queue.writeBuffer`. */
function writtenVertex(device: ReturnType<typeof createMockDevice>['device'], call: number, index: number): number[] {
  const [, , data, byteOffset] = device.queue.writeBuffer.mock.calls[call];
  return Array.from(new Float32Array(data, byteOffset + index * 24, 6));
}

beforeEach(() => {
  vi.stubGlobal('GPUBufferUsage', BUFFER_USAGE);
  vi.stubGlobal('GPUShaderStage', { VERTEX: 1, FRAGMENT: 2, COMPUTE: 4 });
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('createWebGPUPrimitives', () => {
  it('requires an initialized context with a canvas', () => {
    expect(() => createWebGPUPrimitives({ gpuContext: createGPUContext() })).toThrow(/must be initialized with a canvas/);
  });

  it('builds the shape pipeline and a 16-byte uniform buffer', () => {
    const { device } = createMockDevice();
    createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state });

    expect(device.createShaderModule).toHaveBeenCalledTimes(1);
    expect(device.createRenderPipeline).toHaveBeenCalledWith(
      expect.objectContaining({
        label: 'shape/pipeline',
        primitive: { topology: 'triangle-list', cullMode: 'none' },
      })
    );
    expect(device.createBuffer).toHaveBeenCalledWith({ label: 'shape/uniforms', size: 16, usage: 0x48 });
  });

  it('uploads tessellated geometry and draws it at endFrame', () => {
    const { device, pass } = createMockDevice();
    const primitives = createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state, background: '#ffffff' });

    primitives.beginFrame();
    primitives.strokeLine({ x: 0, y: 0 }, { x: 10, y: 0 }, { color: 'red', width: 2 });
    expect(pass.draw).not.toHaveBeenCalled();
    primitives.endFrame();

    expect(Array.from(new Float32Array(device.queue.writeBuffer.mock.calls[0][2], 0, 4))).toEqual([200, 100, 0, 0]);
    expect(device.createBuffer).toHaveBeenLastCalledWith({ label: 'shape/vertices', size: 256, usage: 0x28 });
    expect(writtenVertex(device, 1, 0)).toEqual([0, 1, 1, 0, 0, 1]);
    expect(pass.draw).toHaveBeenCalledWith(6);
    expect(device.queue.submit).toHaveBeenCalledTimes(1);

    const encoder = device.createCommandEncoder.mock.results[0].value;
    const [descriptor] = encoder.beginRenderPass.mock.calls[0];
    expect(descriptor.colorAttachments[0]).toMatchObject({
      clearValue: { r: 1, g: 1, b: 1, a: 1 },
      loadOp: 'clear',
      storeOp: 'store',
    });
  });

  it('scales fill alpha by opacity', () => {
    const { device, pass } = createMockDevice();
    const primitives = createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state });

    primitives.fillCircle({ x: 50, y: 50 }, 5, { color: 'blue', opacity: 0.5 });
    primitives.endFrame();

    expect(pass.draw).toHaveBeenCalledWith(36);
    expect(writtenVertex(device, 1, 0)).toEqual([50, 50, 0, 0, 1, 0.5]);
  });

  it('drops pending geometry at beginFrame', () => {
    const { device, pass } = createMockDevice();
    const primitives = createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state });

    primitives.strokeLine({ x: 0, y: 0 }, { x: 10, y: 0 }, { color: 'red', width: 2 });
    primitives.beginFrame();
    primitives.endFrame();

    expect(pass.draw).not.toHaveBeenCalled();
    expect(device.queue.submit).toHaveBeenCalledTimes(1);
  });

  it('submits a bare clear pass from clearSurface', () => {
    const { device, pass } = createMockDevice();
    const { layer, labelLayer } = createMockLabelLayer();
    const primitives = createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state, labelLayer });

    primitives.strokeLine({ x: 0, y: 0 }, { x: 10, y: 0 }, { color: 'red', width: 2 });
    primitives.clearSurface();

    expect(pass.draw).not.toHaveBeenCalled();
    expect(pass.end).toHaveBeenCalledTimes(1);
    expect(device.queue.submit).toHaveBeenCalledTimes(1);
    expect(layer.clear).toHaveBeenCalledTimes(1);
  });

  it('hands text to the label layer unchanged', () => {
    const { device } = createMockDevice();
    const { layer, labelLayer } = createMockLabelLayer();
    const primitives = createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state, labelLayer });

    primitives.drawText('A', { x: 10, y: 20 }, { family: 'serif', size: 10, weight: 'bold' }, 'red', {
      horizontal: 'center',
      vertical: 'top',
    }, 45);

    expect(layer.drawText).toHaveBeenCalledWith(
      'A',
      { x: 10, y: 20 },
      { family: 'serif', size: 10, weight: 'bold' },
      'red',
      { horizontal: 'center', vertical: 'top' },
      45
    );
  });

  it('warns once when text has nowhere to go', () => {
    const { device } = createMockDevice();
    const primitives = createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state });
    const font = { family: 'serif', size: 10 };
    const align = { horizontal: 'left', vertical: 'alphabetic' } as const;

    primitives.drawText('A', { x: 0, y: 0 }, font, 'red', align);
    primitives.drawText('B', { x: 0, y: 0 }, font, 'red', align);

    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('draws unsupported colors black and warns once per color', () => {
    const { device } = createMockDevice();
    const primitives = createWebGPUPrimitives({ gpuContext: createMockGpuContext(device).state });

    primitives.strokeLine({ x: 0, y: 0 }, { x: 10, y: 0 }, { color: 'hsl(0 0% 50%)', width: 2 });
    primitives.strokeLine({ x: 0, y: 0 }, { x: 10, y: 0 }, { color: 'hsl(0 0% 50%)', width: 2 });
    primitives.endFrame();

    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(writtenVertex(device, 1, 0).slice(2)).toEqual([0, 0, 0, 1]);
  });

  it('releases buffers on dispose and leaves shared resources alone', () => {
    const { device, buffers } = createMockDevice();
    const { state, canvasContext } = createMockGpuContext(device);
    const { layer, labelLayer } = createMockLabelLayer();
    const primitives = createWebGPUPrimitives({ gpuContext: state, labelLayer });

    primitives.strokeLine({ x: 0, y: 0 }, { x: 10, y: 0 }, { color: 'red', width: 2 });
    primitives.endFrame();
    primitives.dispose();
    primitives.dispose();
    primitives.endFrame();

    expect(buffers).toHaveLength(2);
    for (const buffer of buffers) expect(buffer.destroy).toHaveBeenCalledTimes(1);
    expect(device.queue.submit).toHaveBeenCalledTimes(1);
    expect(layer.dispose).not.toHaveBeenCalled();
    expect(canvasContext.unconfigure).not.toHaveBeenCalled();
    expect(device.destroy).not.toHaveBeenCalled();
  });

  it('tears down the context and label layer it owns', () => {
    const { device } = createMockDevice();
    const { state, canvasContext } = createMockGpuContext(device);
    const { layer, labelLayer } = createMockLabelLayer();
    const primitives = createWebGPUPrimitives({ gpuContext: state, labelLayer, ownsResources: true });

    primitives.dispose();

    expect(layer.dispose).toHaveBeenCalledTimes(1);
    expect(canvasContext.unconfigure).toHaveBeenCalledTimes(1);
    expect(device.destroy).toHaveBeenCalledTimes(1);
  });
});

describe('createWebGPURenderer', () => {
  it('renders a point into the vertex stream and its label into the label layer', () => {
    const { device, pass } = createMockDevice();
    const { layer, labelLayer } = createMockLabelLayer();
    const renderer = createWebGPURenderer({ gpuContext: createMockGpuContext(device).state, labelLayer });
    const mapper = createCoordinateMapper({ width: 200, height: 200, scaleFactor: 10 });

    renderer.beginFrame();
    expect(renderer.render(createPoint('A', 1, 2), mapper)).toBe(true);
    renderer.endFrame();

    expect(renderer.backend).toBe('webgpu');
    expect(pass.draw).toHaveBeenCalledWith(36);
    expect(writtenVertex(device, 1, 0)).toEqual([110, 80, 0, 0, 0, 1]);
    const [text, position, font, , alignment] = layer.drawText.mock.calls[0];
    expect(text).toBe('A(1, 2)');
    expect(position.x).toBe(112);
    expect(position.y).toBeCloseTo(78);
    expect(font.size).toBe(10);
    expect(alignment).toEqual({ horizontal: 'left', vertical: 'alphabetic' });
  });
});
