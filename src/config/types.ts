/**
 * Chart configuration types.
 */

export type ChartType = 'bar' | 'point' | 'line' | 'donut' | 'pie' | 'radar' | 'radialGauge';

/**
 * A single labeled value.
 *
 * Colors are CSS color strings (`#rgb`, `#rrggbb`, `#rrggbbaa`, `rgb()`/`rgba()`).
 * When `color` is omitted the chart palette color at the entry index is used.
 */
export interface ChartEntry {
  readonly value: number;
  readonly label?: string | null;
  readonly valueLabel?: string | null;
  readonly color?: string;
  /** Footer label color. Defaults to the chart `labelColor`. */
  readonly textColor?: string;
  /** Header value-label color. Defaults to the entry color. */
  readonly valueLabelColor?: string;
}

export type LineMode = 'none' | 'straight' | 'spline';
export type PointMode = 'none' | 'circle' | 'square';
export type LabelOrientation = 'horizontal' | 'vertical';
export type LabelMode = 'none' | 'leftAndRight' | 'rightOnly';

export interface AnimationConfig {
  /**
   * Easing applied to `animationProgress` before it scales sizes and alphas.
   * The chart never advances progress itself.
   */
  readonly easing?: 'linear' | 'cubicOut' | 'cubicInOut' | 'bounceOut';
}

export interface BaseChartOptions {
  readonly entries?: ReadonlyArray<ChartEntry> | null;
  /** Lower value bound. Widened to include every entry value. */
  readonly minValue?: number | null;
  /** Upper value bound. Widened to include every entry value. */
  readonly maxValue?: number | null;
  /** Spacing around the plot and between item slots, in pixels. */
  readonly margin?: number;
  readonly labelTextSize?: number;
  readonly labelColor?: string;
  /** Font family used for every label. */
  readonly typeface?: string;
  readonly backgroundColor?: string;
  /** Host-driven progress in [0, 1]; out-of-range values are clamped. */
  readonly animationProgress?: number;
  readonly animation?: AnimationConfig;
  /** Colors assigned to entries that carry no `color`. */
  readonly palette?: ReadonlyArray<string>;
}

/** Markers and label orientation shared by the cartesian charts. */
export interface MarkerStyleOptions {
  readonly pointMode?: PointMode;
  readonly pointSize?: number;
  readonly labelOrientation?: LabelOrientation;
  readonly valueLabelOrientation?: LabelOrientation;
}

export interface PointStyleOptions extends MarkerStyleOptions {
  /** 0..255. Alpha of the column drawn between the origin and each point. */
  readonly pointAreaAlpha?: number;
}

export interface PointChartOptions extends BaseChartOptions, PointStyleOptions {
  readonly type: 'point';
}

export interface LineChartOptions extends BaseChartOptions, MarkerStyleOptions {
  readonly type: 'line';
  readonly lineMode?: LineMode;
  readonly lineSize?: number;
  /** 0..255. `0` disables the area fill. */
  readonly lineAreaAlpha?: number;
  readonly enableYFadeOutGradient?: boolean;
  /** Takes precedence over `enableYFadeOutGradient`. */
  readonly enableYSolidGradient?: boolean;
  readonly gradientYColorStart?: string;
  readonly gradientYColorEnd?: string;
}

export interface BarChartOptions extends BaseChartOptions, MarkerStyleOptions {
  readonly type: 'bar';
  /** 0..255. Alpha of the full-height column behind each bar. */
  readonly barAreaAlpha?: number;
  /** Smallest bar length in pixels once progress is positive. */
  readonly minBarHeight?: number;
}

export interface DonutChartOptions extends BaseChartOptions {
  readonly type: 'donut';
  /** Inner radius as a fraction of the outer radius, in [0, 1). */
  readonly holeRadius?: number;
  readonly labelMode?: LabelMode;
}

export interface PieChartOptions extends BaseChartOptions {
  readonly type: 'pie';
  readonly labelMode?: LabelMode;
}

export interface RadarChartOptions extends BaseChartOptions {
  readonly type: 'radar';
  readonly lineSize?: number;
  readonly borderLineColor?: string;
  readonly borderLineSize?: number;
  /** 0..255. Alpha of the triangles between the center and the value points. */
  readonly areaAlpha?: number;
  readonly pointMode?: PointMode;
  readonly pointSize?: number;
}

export interface RadialGaugeChartOptions extends BaseChartOptions {
  readonly type: 'radialGauge';
  /** Ring thickness; derived from the available radius when omitted. */
  readonly lineSize?: number | null;
  /** 0..255. Alpha of the full background ring behind each value arc. */
  readonly lineAreaAlpha?: number;
  /** Angle in degrees where value arcs start; -90 is the top. */
  readonly startAngle?: number;
  readonly labelMode?: LabelMode;
}

export type ChartOptions =
  | BarChartOptions
  | PointChartOptions
  | LineChartOptions
  | DonutChartOptions
  | PieChartOptions
  | RadarChartOptions
  | RadialGaugeChartOptions;
