import { describe, it, expect, vi } from 'vitest';
import { createCoordinateMapper } from '../../../core/coordinateMapper';
import { createPoint } from '../../../drawables/createDrawables';
import { createCanvas2DPrimitives } from '../createCanvas2DPrimitives';
import { createCanvas2DRenderer } from '../createCanvas2DRenderer';

function createMockContext() {
  return {
    save: vi.fn(),
    restore: vi.fn(),
    setTransform: vi.fn(),
    clearRect: vi.fn(),
    fillRect: vi.fn(),
    beginPath: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    closePath: vi.fn(),
    stroke: vi.fn(),
    fill: vi.fn(),
    arc: vi.fn(),
    ellipse: vi.fn(),
    fillText: vi.fn(),
    translate: vi.fn(),
    rotate: vi.fn(),
    strokeStyle: '',
    fillStyle: '',
    lineWidth: 1,
    globalAlpha: 1,
    font: '',
    textAlign: 'start',
    textBaseline: 'alphabetic',
  };
}

function createMockCanvas(ctx: ReturnType<typeof createMockContext> | null): HTMLCanvasElement {
  return { width: 200, height: 100, getContext: vi.fn(() => ctx) } as unknown as HTMLCanvasElement;
}

describe('createCanvas2DPrimitives', () => {
  it('throws when the canvas has no 2d context', () => {
    expect(() => createCanvas2DPrimitives(createMockCanvas(null))).toThrow(/getContext\("2d"\) returned null/);
  });

  it('brackets each shape with save/restore', () => {
    const ctx = createMockContext();
    const primitives = createCanvas2DPrimitives(createMockCanvas(ctx));
    primitives.beginShape();
    primitives.endShape();
    expect(ctx.save).toHaveBeenCalledTimes(1);
    expect(ctx.restore).toHaveBeenCalledTimes(1);
  });

  it('clears the full canvas and paints the background', () => {
    const ctx = createMockContext();
    const primitives = createCanvas2DPrimitives(createMockCanvas(ctx), { background: '#ffffff' });
    primitives.beginFrame();
    expect(ctx.clearRect).toHaveBeenCalledWith(0, 0, 200, 100);
    expect(ctx.fillRect).toHaveBeenCalledWith(0, 0, 200, 100);
    expect(ctx.fillStyle).toBe('#ffffff');
  });

  it('does not touch the canvas once disposed', () => {
    const ctx = createMockContext();
    const primitives = createCanvas2DPrimitives(createMockCanvas(ctx));
    primitives.dispose();
    primitives.clearSurface();
    expect(ctx.clearRect).not.toHaveBeenCalled();
  });

  it('fills then strokes a polygon outline at full opacity', () => {
    const ctx = createMockContext();
    const primitives = createCanvas2DPrimitives(createMockCanvas(ctx));
    primitives.fillPolygon(
      [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 0, y: 10 },
      ],
      { color: 'red', opacity: 0.4 },
      { color: 'blue', width: 2 }
    );
    expect(ctx.moveTo).toHaveBeenCalledWith(0, 0);
    expect(ctx.lineTo).toHaveBeenCalledTimes(2);
    expect(ctx.fill).toHaveBeenCalledTimes(1);
    expect(ctx.stroke).toHaveBeenCalledTimes(1);
    expect(ctx.globalAlpha).toBe(1);
    expect(ctx.strokeStyle).toBe('blue');
    expect(ctx.lineWidth).toBe(2);
  });

  it('skips polygons with fewer than three points', () => {
    const ctx = createMockContext();
    createCanvas2DPrimitives(createMockCanvas(ctx)).fillPolygon([{ x: 0, y: 0 }], { color: 'red' });
    expect(ctx.fill).not.toHaveBeenCalled();
  });

  it('passes arc direction through', () => {
    const ctx = createMockContext();
    createCanvas2DPrimitives(createMockCanvas(ctx)).strokeArc({ x: 5, y: 6 }, 7, 0, 1, true, { color: 'black', width: 1 });
    expect(ctx.arc).toHaveBeenCalledWith(5, 6, 7, 0, 1, true);
  });

  it('rotates text about its anchor', () => {
    const ctx = createMockContext();
    createCanvas2DPrimitives(createMockCanvas(ctx)).drawText(
      'hi',
      { x: 10, y: 20 },
      { family: 'serif', size: 12, weight: 'bold' },
      'green',
      { horizontal: 'center', vertical: 'middle' },
      90
    );
    expect(ctx.font).toBe('bold 12px serif');
    expect(ctx.textAlign).toBe('center');
    expect(ctx.textBaseline).toBe('middle');
    expect(ctx.translate).toHaveBeenCalledWith(10, 20);
    expect(ctx.rotate).toHaveBeenCalledWith(Math.PI / 2);
    expect(ctx.fillText).toHaveBeenCalledWith('hi', 0, 0);
  });
});

describe('createCanvas2DRenderer', () => {
  it('draws a point through the shared dispatch', () => {
    const ctx = createMockContext();
    const renderer = createCanvas2DRenderer({ canvas: createMockCanvas(ctx) });
    const mapper = createCoordinateMapper({ width: 200, height: 200, scaleFactor: 10 });
    expect(renderer.backend).toBe('canvas2d');
    expect(renderer.render(createPoint('A', 1, 2), mapper)).toBe(true);
    expect(ctx.arc).toHaveBeenCalledWith(110, 80, 2, 0, Math.PI * 2);
    expect(ctx.fillText).toHaveBeenCalledWith('A(1, 2)', 112, 78);
    expect(ctx.save).toHaveBeenCalledTimes(ctx.restore.mock.calls.length);
  });
});
