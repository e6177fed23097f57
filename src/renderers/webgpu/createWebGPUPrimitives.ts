import shapeWgsl from '../../shaders/shape.wgsl?raw';
import type { ScreenPoint } from '../../geometry/types';
import { destroyGPUContext, getCanvasTexture, type GPUContextState } from '../../core/GPUContext';
import { parseCssColorToRgba01, type Rgba01 } from '../../utils/colors';
import type { FillStyle, RendererPrimitives, StrokeStyle } from '../primitives';
import type { LabelLayer } from './createLabelLayer';
import {
  ALPHA_BLEND,
  createRenderPipeline,
  createUniformBuffer,
  destroyBuffer,
  ensureVertexBuffer,
  writeBuffer,
} from './gpuUtils';
import {
  FLOATS_PER_VERTEX,
  arcPoints,
  createTriangleBuffer,
  ellipseOutline,
  tessellateFan,
  tessellateJoinedArea,
  tessellateLine,
  tessellatePolygon,
  tessellatePolyline,
} from './tessellate';

export interface WebGPUPrimitivesOptions {
  /** An initialized context with a configured canvas. */
  readonly gpuContext: GPUContextState;
  /** Receives `drawText` calls; text is dropped without one. */
  readonly labelLayer?: LabelLayer;
  /** Clear color of every frame; transparent when absent. */
  readonly background?: string;
  /**
   * When true, `dispose()` also destroys the GPU context and disposes the label layer.
   * Default: false.
   */
  readonly ownsResources?: boolean;
}

const BYTES_PER_VERTEX = FLOATS_PER_VERTEX * 4;
const BLACK: Rgba01 = [0, 0, 0, 1];

/**
 * Retained-mode surface: draw calls tessellate into a CPU triangle list that `endFrame()` uploads
 * and draws in a single pass. Nothing reaches the canvas before `endFrame()`.
 *
 * @throws {Error} when the context is not initialized with a canvas
 */
export function createWebGPUPrimitives(options: WebGPUPrimitivesOptions): RendererPrimitives {
  const gpuContext = options.gpuContext;
  const { device, canvas, preferredFormat } = gpuContext;
  if (!gpuContext.initialized || !device || !canvas || !gpuContext.canvasContext || !preferredFormat) {
    throw new Error(
      'createWebGPUPrimitives(options): gpuContext must be initialized with a canvas. Call initializeGPUContext() first.'
    );
  }

  const colorCache = new Map<string, Rgba01>();
  const toRgba = (color: string, opacity = 1): Rgba01 => {
    let rgba = colorCache.get(color);
    if (!rgba) {
      const parsed = parseCssColorToRgba01(color);
      if (!parsed) console.warn(`createWebGPUPrimitives: unsupported color "${color}"; drawing black.`);
      rgba = parsed ?? BLACK;
      colorCache.set(color, rgba);
    }
    const alpha = Math.min(1, Math.max(0, Number.isFinite(opacity) ? opacity : 1));
    return alpha === 1 ? rgba : [rgba[0], rgba[1], rgba[2], rgba[3] * alpha];
  };

  const [bgR, bgG, bgB, bgA] = parseCssColorToRgba01(options.background ?? 'transparent') ?? [0, 0, 0, 0];
  // The canvas is configured premultiplied.
  const clearValue: GPUColor = { r: bgR * bgA, g: bgG * bgA, b: bgB * bgA, a: bgA };

  const bindGroupLayout = device.createBindGroupLayout({
    label: 'shape/bindGroupLayout',
    entries: [{ binding: 0, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } }],
  });
  const pipeline = createRenderPipeline(device, {
    label: 'shape/pipeline',
    bindGroupLayouts: [bindGroupLayout],
    vertex: {
      code: shapeWgsl,
      label: 'shape.wgsl',
      buffers: [
        {
          arrayStride: BYTES_PER_VERTEX,
          stepMode: 'vertex',
          attributes: [
            { shaderLocation: 0, offset: 0, format: 'float32x2' },
            { shaderLocation: 1, offset: 8, format: 'float32x4' },
          ],
        },
      ],
    },
    fragment: { code: shapeWgsl, label: 'shape.wgsl', format: preferredFormat, blend: ALPHA_BLEND },
  });
  const uniformBuffer = createUniformBuffer(device, 16, 'shape/uniforms');
  const bindGroup = device.createBindGroup({
    label: 'shape/bindGroup',
    layout: bindGroupLayout,
    entries: [{ binding: 0, resource: { buffer: uniformBuffer } }],
  });

  const triangles = createTriangleBuffer();
  let vertexBuffer: GPUBuffer | null = null;
  let disposed = false;
  let warnedNoLayer = false;

  const submit = (draw: boolean): void => {
    const dpr = gpuContext.devicePixelRatio;
    writeBuffer(device, uniformBuffer, new Float32Array([canvas.width / dpr, canvas.height / dpr, 0, 0]));

    const encoder = device.createCommandEncoder({ label: 'shape/encoder' });
    const pass = encoder.beginRenderPass({
      colorAttachments: [
        { view: getCanvasTexture(gpuContext).createView(), clearValue, loadOp: 'clear', storeOp: 'store' },
      ],
    });
    if (draw && triangles.vertexCount > 0) {
      const data = triangles.view();
      vertexBuffer = ensureVertexBuffer(device, vertexBuffer, data.byteLength, 'shape/vertices');
      writeBuffer(device, vertexBuffer, data);
      pass.setPipeline(pipeline);
      pass.setBindGroup(0, bindGroup);
      pass.setVertexBuffer(0, vertexBuffer);
      pass.draw(triangles.vertexCount);
    }
    pass.end();
    device.queue.submit([encoder.finish()]);
  };

  const resetFrame = (): void => {
    triangles.reset();
    options.labelLayer?.clear();
  };

  const stroke = (points: readonly ScreenPoint[], style: StrokeStyle, closed: boolean): void =>
    tessellatePolyline(triangles, points, style.width, toRgba(style.color), closed);

  const fillColor = (fill: FillStyle): Rgba01 => toRgba(fill.color, fill.opacity);

  return {
    backend: 'webgpu',
    beginFrame() {
      if (disposed) return;
      resetFrame();
    },
    endFrame() {
      if (disposed) return;
      submit(true);
    },
    clearSurface() {
      if (disposed) return;
      resetFrame();
      submit(false);
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      triangles.reset();
      destroyBuffer(vertexBuffer, 'createWebGPUPrimitives');
      destroyBuffer(uniformBuffer, 'createWebGPUPrimitives');
      vertexBuffer = null;
      if (options.ownsResources) {
        options.labelLayer?.dispose();
        destroyGPUContext(gpuContext);
      }
    },
    beginShape() {
      // Shapes share one vertex stream; there is no per-shape state.
    },
    endShape() {},
    strokeLine(from, to, style) {
      tessellateLine(triangles, from, to, style.width, toRgba(style.color));
    },
    strokePolyline(points, style) {
      stroke(points, style, false);
    },
    strokeCircle(center, radius, style) {
      if (!(radius > 0)) return;
      stroke(ellipseOutline(center, radius, radius, 0), style, true);
    },
    fillCircle(center, radius, fill) {
      if (!(radius > 0)) return;
      tessellateFan(triangles, center, ellipseOutline(center, radius, radius, 0), fillColor(fill));
    },
    strokeEllipse(center, radiusX, radiusY, rotation, style) {
      if (!(radiusX > 0) || !(radiusY > 0)) return;
      stroke(ellipseOutline(center, radiusX, radiusY, rotation), style, true);
    },
    fillPolygon(points, fill, style) {
      if (points.length < 3) return;
      tessellatePolygon(triangles, points, fillColor(fill));
      if (style) stroke(points, style, true);
    },
    fillJoinedArea(forward, reverse, fill) {
      tessellateJoinedArea(triangles, forward, reverse, fillColor(fill));
    },
    strokeArc(center, radius, startAngle, endAngle, anticlockwise, style) {
      if (!(radius > 0)) return;
      stroke(arcPoints(center, radius, startAngle, endAngle, anticlockwise), style, false);
    },
    drawText(text, position, font, color, alignment, rotation) {
      const layer = options.labelLayer;
      if (!layer) {
        if (!warnedNoLayer) {
          warnedNoLayer = true;
          console.warn('createWebGPUPrimitives: no label layer was supplied; labels are not drawn.');
        }
        return;
      }
      layer.drawText(text, position, font, color, alignment, rotation);
    },
  };
}
