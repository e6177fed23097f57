import type { ScreenPoint } from '../../geometry/types';
import type { FillStyle, RendererPrimitives, StrokeStyle, TextAlignment } from '../primitives';

export const SVG_NS = 'http://www.w3.org/2000/svg';

export interface SvgPrimitivesOptions {
  /** Applied as the root's CSS background. */
  readonly background?: string;
}

const isSvgRoot = (element: Element): element is SVGSVGElement =>
  element.namespaceURI === SVG_NS && element.localName === 'svg';

/** Three decimals keeps the markup short without visible drift. */
const num = (value: number): string => {
  const rounded = Math.round(value * 1000) / 1000;
  return String(Object.is(rounded, -0) ? 0 : rounded);
};

const pointList = (points: readonly ScreenPoint[]): string => points.map((p) => `${num(p.x)},${num(p.y)}`).join(' ');

const textAnchor = { left: 'start', center: 'middle', right: 'end' } as const;
const dominantBaseline = {
  alphabetic: 'alphabetic',
  top: 'text-before-edge',
  middle: 'middle',
  bottom: 'text-after-edge',
} as const satisfies Record<TextAlignment['vertical'], string>;

/**
 * Retained-mode surface: every primitive becomes one SVG element, grouped per shape in a `<g>`.
 *
 * @throws {Error} when `root` is not an `<svg>` element
 */
export function createSvgPrimitives(root: Element, options?: SvgPrimitivesOptions): RendererPrimitives {
  if (!isSvgRoot(root)) {
    throw new Error(`createSvgPrimitives(root): expected an <svg> element. Received: <${root.localName}>`);
  }
  const svg: SVGSVGElement = root;
  if (options?.background) svg.style.background = options.background;

  const doc = svg.ownerDocument;
  let group: SVGGElement | null = null;
  let disposed = false;

  const append = <K extends keyof SVGElementTagNameMap>(
    tag: K,
    attributes: Readonly<Record<string, string>>
  ): SVGElementTagNameMap[K] => {
    const el = doc.createElementNS(SVG_NS, tag);
    for (const [name, value] of Object.entries(attributes)) el.setAttribute(name, value);
    (group ?? svg).appendChild(el);
    return el;
  };

  const strokeAttrs = (stroke: StrokeStyle): Record<string, string> => ({
    fill: 'none',
    stroke: stroke.color,
    'stroke-width': num(stroke.width),
  });

  const fillAttrs = (fill: FillStyle): Record<string, string> => ({
    fill: fill.color,
    'fill-opacity': num(fill.opacity ?? 1),
    stroke: 'none',
  });

  const clearSurface = (): void => {
    if (disposed) return;
    group = null;
    svg.replaceChildren();
  };

  return {
    backend: 'svg',
    beginFrame: clearSurface,
    endFrame() {
      group = null;
    },
    clearSurface,
    dispose() {
      clearSurface();
      disposed = true;
    },
    beginShape() {
      if (disposed) return;
      const g = doc.createElementNS(SVG_NS, 'g');
      svg.appendChild(g);
      group = g;
    },
    endShape() {
      group = null;
    },
    strokeLine(from, to, stroke) {
      append('line', { x1: num(from.x), y1: num(from.y), x2: num(to.x), y2: num(to.y), ...strokeAttrs(stroke) });
    },
    strokePolyline(points, stroke) {
      if (points.length < 2) return;
      append('polyline', { points: pointList(points), ...strokeAttrs(stroke) });
    },
    strokeCircle(center, radius, stroke) {
      append('circle', { cx: num(center.x), cy: num(center.y), r: num(radius), ...strokeAttrs(stroke) });
    },
    fillCircle(center, radius, fill) {
      append('circle', { cx: num(center.x), cy: num(center.y), r: num(radius), ...fillAttrs(fill) });
    },
    strokeEllipse(center, radiusX, radiusY, rotation, stroke) {
      const attrs: Record<string, string> = {
        cx: num(center.x),
        cy: num(center.y),
        rx: num(radiusX),
        ry: num(radiusY),
        ...strokeAttrs(stroke),
      };
      if (rotation !== 0) {
        attrs.transform = `rotate(${num((rotation * 180) / Math.PI)} ${num(center.x)} ${num(center.y)})`;
      }
      append('ellipse', attrs);
    },
    fillPolygon(points, fill, stroke) {
      if (points.length < 3) return;
      append('polygon', {
        points: pointList(points),
        ...fillAttrs(fill),
        ...(stroke ? { stroke: stroke.color, 'stroke-width': num(stroke.width) } : {}),
      });
    },
    fillJoinedArea(forward, reverse, fill) {
      const all = [...forward, ...reverse];
      if (all.length < 3) return;
      const d = all.map((p, i) => `${i === 0 ? 'M' : 'L'} ${num(p.x)} ${num(p.y)}`).join(' ');
      append('path', { d: `${d} Z`, ...fillAttrs(fill) });
    },
    strokeArc(center, radius, startAngle, endAngle, anticlockwise, stroke) {
      const sweep = endAngle - startAngle;
      if (Math.abs(sweep) >= Math.PI * 2) {
        append('circle', { cx: num(center.x), cy: num(center.y), r: num(radius), ...strokeAttrs(stroke) });
        return;
      }
      const x0 = center.x + radius * Math.cos(startAngle);
      const y0 = center.y + radius * Math.sin(startAngle);
      const x1 = center.x + radius * Math.cos(endAngle);
      const y1 = center.y + radius * Math.sin(endAngle);
      const largeArc = Math.abs(sweep) > Math.PI ? 1 : 0;
      const sweepFlag = anticlockwise ? 0 : 1;
      append('path', {
        d: `M ${num(x0)} ${num(y0)} A ${num(radius)} ${num(radius)} 0 ${largeArc} ${sweepFlag} ${num(x1)} ${num(y1)}`,
        ...strokeAttrs(stroke),
      });
    },
    drawText(text, position, font, color, alignment, rotation) {
      const attrs: Record<string, string> = {
        x: num(position.x),
        y: num(position.y),
        fill: color,
        'font-family': font.family,
        'font-size': num(font.size),
        'text-anchor': textAnchor[alignment.horizontal],
        'dominant-baseline': dominantBaseline[alignment.vertical],
      };
      if (font.weight === 'bold') attrs['font-weight'] = 'bold';
      if (rotation) attrs.transform = `rotate(${num(rotation)} ${num(position.x)} ${num(position.y)})`;
      append('text', attrs).textContent = text;
    },
  };
}
