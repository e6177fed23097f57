// @vitest-environment jsdom
import { describe, it, expect, beforeEach } from 'vitest';
import { createCoordinateMapper } from '../../../core/coordinateMapper';
import { createPoint, createSegment, vertex } from '../../../drawables/createDrawables';
import { createSvgPrimitives, SVG_NS } from '../createSvgPrimitives';
import { createSvgRenderer } from '../createSvgRenderer';

let svg: SVGSVGElement;

beforeEach(() => {
  svg = document.createElementNS(SVG_NS, 'svg');
  document.body.replaceChildren(svg);
});

const mapper = () => createCoordinateMapper({ width: 200, height: 200, scaleFactor: 10 });

describe('createSvgPrimitives', () => {
  it('rejects a root that is not <svg>', () => {
    expect(() => createSvgPrimitives(document.createElement('div'))).toThrow(/expected an <svg> element/);
  });

  it('draws arcs as path elements in the requested direction', () => {
    const primitives = createSvgPrimitives(svg);
    primitives.strokeArc({ x: 0, y: 0 }, 10, 0, Math.PI / 2, false, { color: 'blue', width: 1 });
    primitives.strokeArc({ x: 0, y: 0 }, 10, 0, -Math.PI / 2, true, { color: 'blue', width: 1 });
    const paths = svg.querySelectorAll('path');
    expect(paths[0].getAttribute('d')).toBe('M 10 0 A 10 10 0 0 1 0 10');
    expect(paths[1].getAttribute('d')).toBe('M 10 0 A 10 10 0 0 0 0 -10');
  });

  it('closes joined areas into one path', () => {
    const primitives = createSvgPrimitives(svg);
    primitives.fillJoinedArea(
      [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
      ],
      [{ x: 10, y: 10 }],
      { color: 'lightblue', opacity: 0.3 }
    );
    const path = svg.querySelector('path');
    expect(path?.getAttribute('d')).toBe('M 0 0 L 10 0 L 10 10 Z');
    expect(path?.getAttribute('fill-opacity')).toBe('0.3');
  });

  it('rotates ellipses about their centre', () => {
    createSvgPrimitives(svg).strokeEllipse({ x: 5, y: 5 }, 4, 2, -Math.PI / 6, { color: 'black', width: 1 });
    expect(svg.querySelector('ellipse')?.getAttribute('transform')).toBe('rotate(-30 5 5)');
  });
});

describe('createSvgRenderer', () => {
  it('groups each drawable in its own <g>', () => {
    const renderer = createSvgRenderer({ svg });
    const m = mapper();
    renderer.beginFrame();
    expect(renderer.render(createSegment(vertex('P', 0, 0), vertex('Q', 1, 1)), m)).toBe(true);
    expect(renderer.render(createPoint('A', 1, 2), m)).toBe(true);
    renderer.endFrame();

    const groups = Array.from(svg.children).filter((child) => child.localName === 'g');
    expect(groups).toHaveLength(2);

    const line = groups[0].querySelector('line');
    expect(['x1', 'y1', 'x2', 'y2'].map((a) => line?.getAttribute(a))).toEqual(['100', '100', '110', '90']);
    expect(line?.getAttribute('stroke')).toBe('black');

    const circle = groups[1].querySelector('circle');
    expect([circle?.getAttribute('cx'), circle?.getAttribute('cy'), circle?.getAttribute('r')]).toEqual(['110', '80', '2']);
    const text = groups[1].querySelector('text');
    expect(text?.textContent).toBe('A(1, 2)');
    expect([text?.getAttribute('x'), text?.getAttribute('y'), text?.getAttribute('font-size')]).toEqual(['112', '78', '10']);
  });

  it('clears all children', () => {
    const renderer = createSvgRenderer({ svg });
    renderer.render(createPoint('A', 0, 0), mapper());
    expect(svg.childElementCount).toBe(1);
    renderer.clear();
    expect(svg.childElementCount).toBe(0);
  });
});
