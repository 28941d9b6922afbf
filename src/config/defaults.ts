import type {
  BarChartOptions,
  BaseChartOptions,
  DonutChartOptions,
  LineChartOptions,
  MarkerStyleOptions,
  PieChartOptions,
  PointStyleOptions,
  RadarChartOptions,
  RadialGaugeChartOptions,
} from './types';

export const defaultPalette = [
  '#5470C6',
  '#91CC75',
  '#FAC858',
  '#EE6666',
  '#73C0DE',
  '#3BA272',
  '#FC8452',
  '#9A60B4',
  '#EA7CCC',
] as const;

export const defaultBaseOptions = {
  margin: 20,
  labelTextSize: 16,
  labelColor: '#808080',
  typeface: 'sans-serif',
  backgroundColor: '#FFFFFF',
  animationProgress: 1,
  animation: { easing: 'linear' },
} as const satisfies Required<
  Pick<
    BaseChartOptions,
    'margin' | 'labelTextSize' | 'labelColor' | 'typeface' | 'backgroundColor' | 'animationProgress' | 'animation'
  >
>;

const markerDefaults = {
  pointMode: 'circle',
  pointSize: 14,
  labelOrientation: 'horizontal',
  valueLabelOrientation: 'horizontal',
} as const satisfies Required<MarkerStyleOptions>;

export const pointDefaults = {
  ...markerDefaults,
  pointAreaAlpha: 100,
} as const satisfies Required<PointStyleOptions>;

export const lineDefaults = {
  ...markerDefaults,
  pointSize: 10,
  lineMode: 'spline',
  lineSize: 3,
  lineAreaAlpha: 32,
  enableYFadeOutGradient: false,
  enableYSolidGradient: false,
  // Start is the top row, end the origin. As a fade-out mask this clears the
  // area fill progressively toward the top of the plot.
  gradientYColorStart: 'rgba(255, 255, 255, 1)',
  gradientYColorEnd: 'rgba(255, 255, 255, 0)',
} as const satisfies Required<Omit<LineChartOptions, 'type' | keyof BaseChartOptions>>;

export const barDefaults = {
  ...markerDefaults,
  pointMode: 'none',
  pointSize: 0,
  barAreaAlpha: 32,
  minBarHeight: 0,
} as const satisfies Required<Omit<BarChartOptions, 'type' | keyof BaseChartOptions>>;

export const donutDefaults = {
  holeRadius: 0.5,
  labelMode: 'leftAndRight',
} as const satisfies Required<Omit<DonutChartOptions, 'type' | keyof BaseChartOptions>>;

export const pieDefaults = {
  labelMode: 'leftAndRight',
} as const satisfies Required<Omit<PieChartOptions, 'type' | keyof BaseChartOptions>>;

export const radarDefaults = {
  lineSize: 3,
  borderLineColor: 'rgba(128, 128, 128, 0.43)',
  borderLineSize: 2,
  areaAlpha: 32,
  pointMode: 'circle',
  pointSize: 14,
} as const satisfies Required<Omit<RadarChartOptions, 'type' | keyof BaseChartOptions>>;

export const radialGaugeDefaults = {
  lineSize: null,
  lineAreaAlpha: 52,
  startAngle: -90,
  labelMode: 'leftAndRight',
} as const satisfies Required<Omit<RadialGaugeChartOptions, 'type' | keyof BaseChartOptions>>;
