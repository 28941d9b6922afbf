/**
 * entry-charts - Canvas 2D charts for labeled entries
 */

export const version = '0.1.0';

export { createChart, drawChart } from './Chart';
export type { ChartInstance } from './Chart';

export type {
  AnimationConfig,
  BarChartOptions,
  BaseChartOptions,
  ChartEntry,
  ChartOptions,
  ChartType,
  DonutChartOptions,
  LabelMode,
  LabelOrientation,
  LineChartOptions,
  LineMode,
  MarkerStyleOptions,
  PieChartOptions,
  PointChartOptions,
  PointMode,
  PointStyleOptions,
  RadarChartOptions,
  RadialGaugeChartOptions,
} from './config/types';

// Options defaults + resolution
export {
  barDefaults,
  defaultBaseOptions,
  defaultPalette,
  donutDefaults,
  lineDefaults,
  pieDefaults,
  pointDefaults,
  radarDefaults,
  radialGaugeDefaults,
} from './config/defaults';
export { resolveOptions, getDrawProgress } from './config/OptionResolver';
export type {
  ResolvedBarChartOptions,
  ResolvedBaseOptions,
  ResolvedChartEntry,
  ResolvedChartOptions,
  ResolvedDonutChartOptions,
  ResolvedLineChartOptions,
  ResolvedPieChartOptions,
  ResolvedPointChartOptions,
  ResolvedRadarChartOptions,
  ResolvedRadialGaugeChartOptions,
} from './config/OptionResolver';

// Surface contract
export { withSurfaceState } from './core/ChartSurface';
export type {
  ChartSurface,
  SurfaceGradient,
  SurfacePaint,
  SurfacePattern,
  SurfaceTextMetrics,
} from './core/ChartSurface';

// Layout (for custom renderers)
export {
  calculateFooterHeaderHeight,
  calculateItemSize,
  calculatePoints,
  calculateYOrigin,
  computeCartesianLayout,
  measureLabels,
} from './core/layout';
export type { CartesianLayout, CartesianLayoutInput, LabelStyle, Point, Size } from './core/layout';
export { computeValueBounds, normalizeValue } from './core/valueBounds';
export type { ValueBounds } from './core/valueBounds';

// Renderers
export { createBarRenderer } from './renderers/createBarRenderer';
export { createDonutRenderer, createPieRenderer } from './renderers/createDonutRenderer';
export { createLineRenderer, selectAreaFillMode } from './renderers/createLineRenderer';
export type { AreaFillMode } from './renderers/createLineRenderer';
export { createPointRenderer } from './renderers/createPointRenderer';
export { createRadarRenderer } from './renderers/createRadarRenderer';
export { createRadialGaugeRenderer } from './renderers/createRadialGaugeRenderer';
export type { ChartFrame, ChartRenderer } from './renderers/rendererUtils';

// Utilities
export { easeBounceOut, easeCubicInOut, easeCubicOut, easeLinear, getEasing, isEasingName } from './utils/easing';
export type { EasingFunction, EasingName } from './utils/easing';
export { parseCssColorToRgba, scaleAlpha, withAlpha } from './utils/colors';
export type { Rgba } from './utils/colors';

// Logging
export { configureLogging, getChartLogger, LOG_CATEGORY } from './logging';
export type { LoggingOptions } from './logging';
