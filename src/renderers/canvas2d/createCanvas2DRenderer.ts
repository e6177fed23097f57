import { resolveStyle } from '../../config/StyleResolver';
import { createDrawableRenderer, type DrawableRendererOptions, type Renderer } from '../createDrawableRenderer';
import { createCanvas2DPrimitives } from './createCanvas2DPrimitives';

export interface Canvas2DRendererOptions extends DrawableRendererOptions {
  readonly canvas: HTMLCanvasElement;
}

export function createCanvas2DRenderer(options: Canvas2DRendererOptions): Renderer {
  const style = resolveStyle(options.style);
  const primitives = createCanvas2DPrimitives(options.canvas, { background: style.canvasBackground });
  return createDrawableRenderer(primitives, {
    style,
    labelResolver: options.labelResolver,
    registerDefaults: options.registerDefaults,
  });
}
