import type { RendererStyle } from '../config/types';
import type { CoordinateMapperLike } from '../core/coordinateMapper';
import type { DrawableOfType, DrawableType } from '../drawables/types';
import type { LabelOverlapResolver } from '../labels/labelOverlapResolver';
import type { RendererPrimitives } from './primitives';

/** Everything a draw handler may touch for one element. */
export interface DrawContext {
  readonly primitives: RendererPrimitives;
  readonly mapper: CoordinateMapperLike;
  readonly style: RendererStyle;
  /** Label placements for the current layout pass. */
  readonly labels: LabelOverlapResolver;
}

/**
 * Draws one drawable. Returns false, without emitting partial geometry, when the geometry
 * cannot be projected or a required value is not finite.
 */
export type DrawHandler<T extends DrawableType> = (context: DrawContext, drawable: DrawableOfType<T>) => boolean;
