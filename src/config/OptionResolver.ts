import type {
  BarChartOptions,
  BaseChartOptions,
  ChartEntry,
  ChartOptions,
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
} from './types';
import {
  barDefaults,
  defaultBaseOptions,
  defaultPalette,
  donutDefaults,
  lineDefaults,
  pieDefaults,
  pointDefaults,
  radarDefaults,
  radialGaugeDefaults,
} from './defaults';
import { clamp01, easeProgress, isEasingName, type EasingName } from '../utils/easing';

export interface ResolvedChartEntry {
  readonly value: number;
  readonly label: string | null;
  readonly valueLabel: string | null;
  readonly color: string;
  readonly textColor: string;
  readonly valueLabelColor: string;
}

export interface ResolvedBaseOptions {
  /** `null` when the host cleared the entries; renderers draw nothing. */
  readonly entries: ReadonlyArray<ResolvedChartEntry> | null;
  readonly minValue: number | null;
  readonly maxValue: number | null;
  readonly margin: number;
  readonly labelTextSize: number;
  readonly labelColor: string;
  readonly typeface: string;
  readonly backgroundColor: string;
  /** Raw host progress, clamped to [0, 1]. */
  readonly animationProgress: number;
  readonly easing: EasingName;
  readonly palette: ReadonlyArray<string>;
}

export type ResolvedMarkerStyle = Readonly<Required<MarkerStyleOptions>>;

export type ResolvedPointChartOptions = ResolvedBaseOptions &
  Readonly<Required<PointStyleOptions>> & { readonly type: 'point' };

export type ResolvedLineChartOptions = ResolvedBaseOptions &
  Readonly<Required<Omit<LineChartOptions, keyof BaseChartOptions>>>;

export type ResolvedBarChartOptions = ResolvedBaseOptions &
  Readonly<Required<Omit<BarChartOptions, keyof BaseChartOptions>>>;

export type ResolvedDonutChartOptions = ResolvedBaseOptions &
  Readonly<Required<Omit<DonutChartOptions, keyof BaseChartOptions>>>;

export type ResolvedPieChartOptions = ResolvedBaseOptions &
  Readonly<Required<Omit<PieChartOptions, keyof BaseChartOptions>>>;

export type ResolvedRadarChartOptions = ResolvedBaseOptions &
  Readonly<Required<Omit<RadarChartOptions, keyof BaseChartOptions>>>;

export type ResolvedRadialGaugeChartOptions = ResolvedBaseOptions &
  Readonly<Required<Omit<RadialGaugeChartOptions, keyof BaseChartOptions>>>;

export type ResolvedChartOptions =
  | ResolvedBarChartOptions
  | ResolvedPointChartOptions
  | ResolvedLineChartOptions
  | ResolvedDonutChartOptions
  | ResolvedPieChartOptions
  | ResolvedRadarChartOptions
  | ResolvedRadialGaugeChartOptions;

const LINE_MODES: ReadonlyArray<LineMode> = ['none', 'straight', 'spline'];
const POINT_MODES: ReadonlyArray<PointMode> = ['none', 'circle', 'square'];
const ORIENTATIONS: ReadonlyArray<LabelOrientation> = ['horizontal', 'vertical'];
const LABEL_MODES: ReadonlyArray<LabelMode> = ['none', 'leftAndRight', 'rightOnly'];

const finiteOr = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

const nonNegativeOr = (value: unknown, fallback: number): number => Math.max(0, finiteOr(value, fallback));

const finiteOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

/** Alphas use the 0..255 byte scale. */
const alphaOr = (value: unknown, fallback: number): number => Math.round(Math.min(255, nonNegativeOr(value, fallback)));

const oneOf = <T extends string>(allowed: ReadonlyArray<T>, value: unknown, fallback: T): T =>
  allowed.find((candidate) => candidate === value) ?? fallback;

const booleanOr = (value: unknown, fallback: boolean): boolean => (typeof value === 'boolean' ? value : fallback);

const normalizeOptionalString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const normalizeOptionalText = (text: unknown): string | null => {
  if (typeof text !== 'string') return null;
  return text.length > 0 ? text : null;
};

const sanitizePalette = (palette: unknown): string[] => {
  if (!Array.isArray(palette)) return [];
  return palette
    .filter((c): c is string => typeof c === 'string')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
};

export function resolveEntries(
  entries: ReadonlyArray<ChartEntry> | null | undefined,
  palette: ReadonlyArray<string>,
  labelColor: string
): ReadonlyArray<ResolvedChartEntry> | null {
  if (entries == null) return null;

  return entries.map((entry, i) => {
    const color = normalizeOptionalString(entry.color) ?? palette[i % palette.length] ?? defaultPalette[0];
    return {
      value: finiteOr(entry.value, 0),
      label: normalizeOptionalText(entry.label),
      valueLabel: normalizeOptionalText(entry.valueLabel),
      color,
      textColor: normalizeOptionalString(entry.textColor) ?? labelColor,
      valueLabelColor: normalizeOptionalString(entry.valueLabelColor) ?? color,
    };
  });
}

const resolveBase = (options: BaseChartOptions): ResolvedBaseOptions => {
  const userPalette = sanitizePalette(options.palette);
  const palette = userPalette.length > 0 ? userPalette : Array.from(defaultPalette);
  const labelColor = normalizeOptionalString(options.labelColor) ?? defaultBaseOptions.labelColor;
  const easing = options.animation?.easing;

  return {
    entries: resolveEntries(options.entries, palette, labelColor),
    minValue: finiteOrNull(options.minValue),
    maxValue: finiteOrNull(options.maxValue),
    margin: nonNegativeOr(options.margin, defaultBaseOptions.margin),
    labelTextSize: nonNegativeOr(options.labelTextSize, defaultBaseOptions.labelTextSize),
    labelColor,
    typeface: normalizeOptionalString(options.typeface) ?? defaultBaseOptions.typeface,
    backgroundColor: normalizeOptionalString(options.backgroundColor) ?? defaultBaseOptions.backgroundColor,
    animationProgress: clamp01(finiteOr(options.animationProgress, defaultBaseOptions.animationProgress)),
    easing: isEasingName(easing) ? easing : defaultBaseOptions.animation.easing,
    palette,
  };
};

const resolveMarkerStyle = (options: MarkerStyleOptions, defaults: ResolvedMarkerStyle): ResolvedMarkerStyle => ({
  pointMode: oneOf(POINT_MODES, options.pointMode, defaults.pointMode),
  pointSize: nonNegativeOr(options.pointSize, defaults.pointSize),
  labelOrientation: oneOf(ORIENTATIONS, options.labelOrientation, defaults.labelOrientation),
  valueLabelOrientation: oneOf(ORIENTATIONS, options.valueLabelOrientation, defaults.valueLabelOrientation),
});

const resolvePoint = (options: PointChartOptions): ResolvedPointChartOptions => ({
  ...resolveBase(options),
  ...resolveMarkerStyle(options, pointDefaults),
  type: 'point',
  pointAreaAlpha: alphaOr(options.pointAreaAlpha, pointDefaults.pointAreaAlpha),
});

const resolveLine = (options: LineChartOptions): ResolvedLineChartOptions => ({
  ...resolveBase(options),
  ...resolveMarkerStyle(options, lineDefaults),
  type: 'line',
  lineMode: oneOf(LINE_MODES, options.lineMode, lineDefaults.lineMode),
  lineSize: nonNegativeOr(options.lineSize, lineDefaults.lineSize),
  lineAreaAlpha: alphaOr(options.lineAreaAlpha, lineDefaults.lineAreaAlpha),
  enableYFadeOutGradient: booleanOr(options.enableYFadeOutGradient, lineDefaults.enableYFadeOutGradient),
  enableYSolidGradient: booleanOr(options.enableYSolidGradient, lineDefaults.enableYSolidGradient),
  gradientYColorStart: normalizeOptionalString(options.gradientYColorStart) ?? lineDefaults.gradientYColorStart,
  gradientYColorEnd: normalizeOptionalString(options.gradientYColorEnd) ?? lineDefaults.gradientYColorEnd,
});

const resolveBar = (options: BarChartOptions): ResolvedBarChartOptions => ({
  ...resolveBase(options),
  ...resolveMarkerStyle(options, barDefaults),
  type: 'bar',
  barAreaAlpha: alphaOr(options.barAreaAlpha, barDefaults.barAreaAlpha),
  minBarHeight: nonNegativeOr(options.minBarHeight, barDefaults.minBarHeight),
});

const resolveDonut = (options: DonutChartOptions): ResolvedDonutChartOptions => {
  const holeRadius = finiteOr(options.holeRadius, donutDefaults.holeRadius);
  return {
    ...resolveBase(options),
    type: 'donut',
    holeRadius: Math.min(0.99, Math.max(0, holeRadius)),
    labelMode: oneOf(LABEL_MODES, options.labelMode, donutDefaults.labelMode),
  };
};

const resolvePie = (options: PieChartOptions): ResolvedPieChartOptions => ({
  ...resolveBase(options),
  type: 'pie',
  labelMode: oneOf(LABEL_MODES, options.labelMode, pieDefaults.labelMode),
});

const resolveRadar = (options: RadarChartOptions): ResolvedRadarChartOptions => ({
  ...resolveBase(options),
  type: 'radar',
  lineSize: nonNegativeOr(options.lineSize, radarDefaults.lineSize),
  borderLineColor: normalizeOptionalString(options.borderLineColor) ?? radarDefaults.borderLineColor,
  borderLineSize: nonNegativeOr(options.borderLineSize, radarDefaults.borderLineSize),
  areaAlpha: alphaOr(options.areaAlpha, radarDefaults.areaAlpha),
  pointMode: oneOf(POINT_MODES, options.pointMode, radarDefaults.pointMode),
  pointSize: nonNegativeOr(options.pointSize, radarDefaults.pointSize),
});

const resolveRadialGauge = (options: RadialGaugeChartOptions): ResolvedRadialGaugeChartOptions => {
  const lineSize = finiteOrNull(options.lineSize);
  return {
    ...resolveBase(options),
    type: 'radialGauge',
    lineSize: lineSize === null ? radialGaugeDefaults.lineSize : Math.max(0, lineSize),
    lineAreaAlpha: alphaOr(options.lineAreaAlpha, radialGaugeDefaults.lineAreaAlpha),
    startAngle: finiteOr(options.startAngle, radialGaugeDefaults.startAngle),
    labelMode: oneOf(LABEL_MODES, options.labelMode, radialGaugeDefaults.labelMode),
  };
};

const assertUnreachable = (value: never): never => {
  // Reachable only from untyped callers passing an unknown `type`.
  throw new Error(
    `Unhandled chart type: ${String((value as unknown as { readonly type?: unknown } | null)?.type ?? 'unknown')}`
  );
};

export function resolveOptions(options: ChartOptions): ResolvedChartOptions {
  switch (options.type) {
    case 'bar':
      return resolveBar(options);
    case 'point':
      return resolvePoint(options);
    case 'line':
      return resolveLine(options);
    case 'donut':
      return resolveDonut(options);
    case 'pie':
      return resolvePie(options);
    case 'radar':
      return resolveRadar(options);
    case 'radialGauge':
      return resolveRadialGauge(options);
    default:
      return assertUnreachable(options);
  }
}

/**
 * Progress used for drawing: the host progress after easing.
 */
export function getDrawProgress(options: ResolvedBaseOptions): number {
  return easeProgress(options.animationProgress, options.easing);
}
