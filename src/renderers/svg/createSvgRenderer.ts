import { resolveStyle } from '../../config/StyleResolver';
import { createDrawableRenderer, type DrawableRendererOptions, type Renderer } from '../createDrawableRenderer';
import { createSvgPrimitives } from './createSvgPrimitives';

export interface SvgRendererOptions extends DrawableRendererOptions {
  readonly svg: Element;
}

export function createSvgRenderer(options: SvgRendererOptions): Renderer {
  const style = resolveStyle(options.style);
  const primitives = createSvgPrimitives(options.svg, { background: style.canvasBackground });
  return createDrawableRenderer(primitives, {
    style,
    labelResolver: options.labelResolver,
    registerDefaults: options.registerDefaults,
  });
}
