import type { RendererPrimitives, HorizontalAlign, VerticalBaseline } from '../primitives';

/** DOM text for the WebGPU backend, which has no glyph pipeline of its own. */
export interface LabelLayer {
  drawText: RendererPrimitives['drawText'];
  /** Removes every label drawn since the last clear. */
  clear(): void;
  /** Detaches the layer and restores the container's inline `position`. */
  dispose(): void;
}

// Horizontal translate (percent of the label's width) and matching transform origin.
const ANCHOR_SHIFT: Readonly<Record<HorizontalAlign, number>> = { left: 0, center: -50, right: -100 };

// Labels are centred on their y; shift by this many font sizes to sit on the requested baseline.
const BASELINE_SHIFT: Readonly<Record<VerticalBaseline, number>> = {
  top: 0.5,
  middle: 0,
  alphabetic: -0.35,
  bottom: -0.5,
};

/**
 * Mounts a pointer-transparent layer of absolutely positioned spans over `container`.
 * A statically positioned container is made `relative` until `dispose()`.
 */
export function createLabelLayer(container: HTMLElement): LabelLayer {
  const restorePosition = getComputedStyle(container).position === 'static' ? container.style.position : null;
  if (restorePosition !== null) container.style.position = 'relative';

  const layer = document.createElement('div');
  Object.assign(layer.style, { position: 'absolute', inset: '0', pointerEvents: 'none', overflow: 'visible', zIndex: '10' });
  container.appendChild(layer);

  let disposed = false;

  return {
    drawText(text, position, font, color, alignment, rotation = 0) {
      if (disposed) return;
      const shift = ANCHOR_SHIFT[alignment.horizontal];
      const span = document.createElement('span');
      span.textContent = text;
      Object.assign(span.style, {
        position: 'absolute',
        left: `${position.x}px`,
        top: `${position.y + BASELINE_SHIFT[alignment.vertical] * font.size}px`,
        whiteSpace: 'nowrap',
        lineHeight: '1',
        userSelect: 'none',
        fontSize: `${font.size}px`,
        fontFamily: font.family,
        fontWeight: font.weight ?? 'normal',
        color,
        transformOrigin: `${-shift}% 50%`,
        transform: `translateX(${shift}%) translateY(-50%) rotate(${rotation}deg)`,
      });
      layer.appendChild(span);
    },
    clear() {
      if (!disposed) layer.replaceChildren();
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      layer.remove();
      if (restorePosition !== null) container.style.position = restorePosition;
    },
  };
}
