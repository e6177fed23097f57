export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/** Position in math space (arbitrary units, y up). */
export type MathPoint = Vec2;

/** Position in device pixels (y down). */
export type ScreenPoint = Vec2;

export const isFiniteVec2 = (p: Vec2): boolean => Number.isFinite(p.x) && Number.isFinite(p.y);
