import type { RendererStyle } from './types';

const DEFAULT_FONT_SIZE = 16;

export const defaultStyle = {
  canvasBackground: '#ffffff',
  defaultColor: 'black',
  fillStyle: 'rgba(0, 0, 0, 0)',
  fontFamily: 'Inter, sans-serif',

  pointColor: 'black',
  pointRadius: 2,
  pointLabelColor: 'black',
  pointLabelFontSize: (DEFAULT_FONT_SIZE * 5) / 8,

  segmentColor: 'black',
  segmentStrokeWidth: 1,
  vectorColor: 'black',
  vectorStrokeWidth: 1,
  vectorTipSize: 8,

  circleColor: 'black',
  circleStrokeWidth: 1,
  ellipseColor: 'black',
  ellipseStrokeWidth: 1,
  circleArcColor: 'black',
  circleArcStrokeWidth: 1,

  angleColor: 'blue',
  angleStrokeWidth: 1,
  angleArcRadius: 15,
  angleLabelFontSize: 14,
  angleTextArcRadiusFactor: 1.8,

  functionColor: 'black',
  functionStrokeWidth: 1,
  functionLabelFontSize: 14,

  polygonColor: 'black',
  polygonStrokeWidth: 1,

  areaFillColor: 'lightblue',
  areaOpacity: 0.3,

  labelColor: 'black',
  labelFontSize: 14,
  labelMinScreenFontPx: 0,
  labelVanishThresholdPx: 2,

  cartesianAxisColor: 'black',
  cartesianGridColor: 'lightgrey',
  cartesianLabelColor: 'grey',
  cartesianTickSize: 3,
  cartesianTickFontSize: 8,
  cartesianAxisStrokeWidth: 1,
  cartesianGridStrokeWidth: 0.5,

  polarCircleColor: 'lightgrey',
  polarRadialColor: 'lightgrey',
  polarLabelColor: 'grey',
  polarLabelFontSize: 8,
  polarStrokeWidth: 0.5,
} as const satisfies RendererStyle;

/** Sampling and layout constants shared by the area builders and draw handlers. */
export const renderDefaults = {
  /** Samples per function boundary in a function-bounded area. */
  areaSamples: 100,
  /** Boundary samples for full circles and ellipses. */
  closedShapeResolution: 96,
  /** Boundary samples for circle/ellipse chord segments. */
  chordSegmentResolution: 64,
  /** Samples per visible function curve. */
  functionSamples: 400,
  /** Samples across a parametric curve's t-range. */
  parametricSamples: 400,
  /** Default t-range of a parametric curve. */
  parametricRange: [0, Math.PI * 2],
  /** Fallback x-range when nothing else bounds a function area. */
  fallbackDomain: [-10, 10],
  zoomStep: 0.1,
  minScaleFactor: 0.01,
  labelMaxSteps: 10,
  labelPaddingPx: 2,
  /** Minimum on-screen spacing between grid lines. */
  gridMinSpacingPx: 40,
  polarAngularDivisions: 12,
} as const;
