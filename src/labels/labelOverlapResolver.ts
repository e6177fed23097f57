import { renderDefaults } from '../config/defaults';

/** Axis-aligned screen-space box. */
export interface LabelRect {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
}

export interface LabelOverlapResolverOptions {
  /** Outward steps tried in each direction before giving up. Default: 10. */
  readonly maxSteps?: number;
  /** Padding added on every side of a box before testing overlap. Default: 2. */
  readonly paddingPx?: number;
}

/**
 * Vertical nudging for labels that would collide on screen.
 *
 * Placements live as long as the resolver; create one per layout pass (frame) and drop it afterwards.
 */
export interface LabelOverlapResolver {
  /**
   * Returns the vertical offset for label `id`. The first call searches 0, +step, -step, +2·step, ...
   * for a position clear of every earlier placement; later calls for the same id return the stored
   * offset without searching again. When every candidate collides, the last one tried is kept.
   */
  getOrPlaceDy(id: string, rect: LabelRect, step: number): number;
  has(id: string): boolean;
  readonly placedCount: number;
  reset(): void;
}

interface Placement {
  readonly dy: number;
  readonly rect: LabelRect;
}

const inflate = (rect: LabelRect, pad: number): LabelRect => ({
  minX: rect.minX - pad,
  maxX: rect.maxX + pad,
  minY: rect.minY - pad,
  maxY: rect.maxY + pad,
});

const shiftY = (rect: LabelRect, dy: number): LabelRect => ({
  minX: rect.minX,
  maxX: rect.maxX,
  minY: rect.minY + dy,
  maxY: rect.maxY + dy,
});

/** Touching edges do not count as overlap. */
export const rectsOverlap = (a: LabelRect, b: LabelRect): boolean =>
  !(a.maxX <= b.minX || a.minX >= b.maxX || a.maxY <= b.minY || a.minY >= b.maxY);

export function createLabelOverlapResolver(options?: LabelOverlapResolverOptions): LabelOverlapResolver {
  const maxStepsRaw = options?.maxSteps ?? renderDefaults.labelMaxSteps;
  const maxSteps = Number.isFinite(maxStepsRaw) ? Math.max(0, Math.floor(maxStepsRaw)) : renderDefaults.labelMaxSteps;
  const paddingRaw = options?.paddingPx ?? renderDefaults.labelPaddingPx;
  const padding = Number.isFinite(paddingRaw) && paddingRaw >= 0 ? paddingRaw : renderDefaults.labelPaddingPx;

  const placements = new Map<string, Placement>();

  const collides = (candidate: LabelRect): boolean => {
    for (const placed of placements.values()) {
      if (rectsOverlap(candidate, placed.rect)) return true;
    }
    return false;
  };

  const getOrPlaceDy: LabelOverlapResolver['getOrPlaceDy'] = (id, rect, step) => {
    const existing = placements.get(id);
    if (existing) return existing.dy;

    const stepPx = Number.isFinite(step) && step > 0 ? step : 1;
    let dy = 0;
    let placedRect = inflate(rect, padding);

    for (let k = 0; k <= maxSteps; k++) {
      const candidates = k === 0 ? [0] : [k * stepPx, -k * stepPx];
      let clear = false;
      for (const candidateDy of candidates) {
        dy = candidateDy;
        placedRect = inflate(shiftY(rect, candidateDy), padding);
        if (!collides(placedRect)) {
          clear = true;
          break;
        }
      }
      if (clear) break;
    }

    placements.set(id, { dy, rect: placedRect });
    return dy;
  };

  return {
    getOrPlaceDy,
    has: (id) => placements.has(id),
    get placedCount() {
      return placements.size;
    },
    reset() {
      placements.clear();
    },
  };
}
