import type { RendererPrimitives } from '../primitives';

export interface RecordedCall {
  readonly op: keyof RendererPrimitives;
  readonly args: readonly unknown[];
}

export interface RecordingPrimitives extends RendererPrimitives {
  readonly calls: RecordedCall[];
  /** Open `beginShape()` calls not yet matched by `endShape()`. */
  readonly depth: number;
  ops(): string[];
  argsOf(op: keyof RendererPrimitives): (readonly unknown[])[];
}

/** In-memory surface that records every primitive call in order. */
export function createRecordingPrimitives(backend = 'recording'): RecordingPrimitives {
  const calls: RecordedCall[] = [];
  let depth = 0;
  const record =
    (op: keyof RendererPrimitives) =>
    (...args: unknown[]): void => {
      calls.push({ op, args });
    };

  return {
    backend,
    calls,
    get depth() {
      return depth;
    },
    ops: () => calls.map((c) => c.op),
    argsOf: (op) => calls.filter((c) => c.op === op).map((c) => c.args),
    beginFrame: record('beginFrame'),
    endFrame: record('endFrame'),
    clearSurface: record('clearSurface'),
    dispose: record('dispose'),
    beginShape: (...args: unknown[]) => {
      depth++;
      calls.push({ op: 'beginShape', args });
    },
    endShape: (...args: unknown[]) => {
      depth--;
      calls.push({ op: 'endShape', args });
    },
    strokeLine: record('strokeLine'),
    strokePolyline: record('strokePolyline'),
    strokeCircle: record('strokeCircle'),
    fillCircle: record('fillCircle'),
    strokeEllipse: record('strokeEllipse'),
    fillPolygon: record('fillPolygon'),
    fillJoinedArea: record('fillJoinedArea'),
    strokeArc: record('strokeArc'),
    drawText: record('drawText'),
  };
}
