/**
 * Style dictionary consumed by every per-element draw handler.
 *
 * Keys are grouped by element kind. Colors are CSS color strings; sizes are CSS pixels.
 */
export interface RendererStyle {
  readonly canvasBackground: string;
  readonly defaultColor: string;
  /** Transparent fill used where a shape has no fill of its own. */
  readonly fillStyle: string;
  readonly fontFamily: string;

  // Points
  readonly pointColor: string;
  readonly pointRadius: number;
  readonly pointLabelColor: string;
  readonly pointLabelFontSize: number;

  // Segments / vectors
  readonly segmentColor: string;
  readonly segmentStrokeWidth: number;
  readonly vectorColor: string;
  readonly vectorStrokeWidth: number;
  /** Side length of the arrow head triangle. */
  readonly vectorTipSize: number;

  // Conics
  readonly circleColor: string;
  readonly circleStrokeWidth: number;
  readonly ellipseColor: string;
  readonly ellipseStrokeWidth: number;
  readonly circleArcColor: string;
  readonly circleArcStrokeWidth: number;

  // Angles
  readonly angleColor: string;
  readonly angleStrokeWidth: number;
  readonly angleArcRadius: number;
  readonly angleLabelFontSize: number;
  /** Label distance from the vertex, as a multiple of `angleArcRadius`. */
  readonly angleTextArcRadiusFactor: number;

  // Functions
  readonly functionColor: string;
  readonly functionStrokeWidth: number;
  readonly functionLabelFontSize: number;

  // Polygons
  readonly polygonColor: string;
  readonly polygonStrokeWidth: number;

  // Colored areas
  readonly areaFillColor: string;
  /** In [0, 1]. */
  readonly areaOpacity: number;

  // Free labels
  readonly labelColor: string;
  readonly labelFontSize: number;
  /** Zoomed-out labels never shrink below this size (0 disables the floor). */
  readonly labelMinScreenFontPx: number;
  /** Zoomed-out labels at or below this size are hidden. */
  readonly labelVanishThresholdPx: number;

  // Cartesian grid
  readonly cartesianAxisColor: string;
  readonly cartesianGridColor: string;
  readonly cartesianLabelColor: string;
  readonly cartesianTickSize: number;
  readonly cartesianTickFontSize: number;
  readonly cartesianAxisStrokeWidth: number;
  readonly cartesianGridStrokeWidth: number;

  // Polar grid
  readonly polarCircleColor: string;
  readonly polarRadialColor: string;
  readonly polarLabelColor: string;
  readonly polarLabelFontSize: number;
  readonly polarStrokeWidth: number;
}

export type StyleKey = keyof RendererStyle;

/** Partial overrides accepted by renderer constructors. */
export type RendererStyleOverrides = Partial<RendererStyle>;
