/**
 * Cartesian layout shared by the point, line and bar charts.
 *
 * Vertical bands, top to bottom:
 *
 *   margin | header (value labels) | plot (itemHeight) | footer (labels) | margin
 *
 * Header and footer bands are `0` when they hold no text; otherwise they include
 * one margin separating the text from the plot. Horizontally the plot is split
 * into one slot per entry with a margin before, between and after the slots.
 *
 * Every function here is pure: results are recomputed on each draw and returned
 * in a {@link CartesianLayout} value instead of being stored on the chart.
 */

import type { LabelOrientation } from '../config/types';
import type { ResolvedChartEntry } from '../config/OptionResolver';
import { toCssFont, withSurfaceState, type ChartSurface } from './ChartSurface';
import { computeValueBounds, normalizeValue, type ValueBounds } from './valueBounds';

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface LabelStyle {
  readonly textSize: number;
  readonly typeface: string;
}

export interface CartesianLayoutInput {
  readonly entries: ReadonlyArray<ResolvedChartEntry>;
  readonly minValue: number | null;
  readonly maxValue: number | null;
  readonly margin: number;
  readonly labelStyle: LabelStyle;
  readonly labelOrientation: LabelOrientation;
  readonly valueLabelOrientation: LabelOrientation;
}

export interface CartesianLayout {
  readonly width: number;
  readonly height: number;
  readonly margin: number;
  readonly bounds: ValueBounds;
  readonly labels: ReadonlyArray<string | null>;
  readonly labelSizes: ReadonlyArray<Size>;
  readonly footerHeight: number;
  readonly valueLabels: ReadonlyArray<string | null>;
  readonly valueLabelSizes: ReadonlyArray<Size>;
  readonly headerHeight: number;
  /** Top row of the plot area. */
  readonly plotTop: number;
  /** Slot width per entry and plot height. */
  readonly itemSize: Size;
  /** Row of the baseline value; see {@link calculateYOrigin}. */
  readonly origin: number;
  /** One point per entry, in entry order. */
  readonly points: ReadonlyArray<Point>;
}

const ZERO_SIZE: Size = { width: 0, height: 0 };

/**
 * Measures each label with the chart font. Absent or empty labels measure `0 x 0`.
 */
export function measureLabels(
  surface: ChartSurface,
  labels: ReadonlyArray<string | null | undefined>,
  style: LabelStyle
): Size[] {
  return withSurfaceState(surface, (s) => {
    s.font = toCssFont(style.textSize, style.typeface);
    return labels.map((label) => {
      if (label == null || label.length === 0) return ZERO_SIZE;

      const metrics = s.measureText(label);
      const ascent = metrics.actualBoundingBoxAscent;
      const descent = metrics.actualBoundingBoxDescent;
      const boxHeight =
        typeof ascent === 'number' && typeof descent === 'number' && Number.isFinite(ascent + descent)
          ? ascent + descent
          : 0;

      return {
        width: Number.isFinite(metrics.width) ? Math.max(0, metrics.width) : 0,
        height: boxHeight > 0 ? boxHeight : style.textSize,
      };
    });
  });
}

/**
 * Vertical space taken by a row of labels: the tallest label extent (its width
 * when drawn vertically) plus one margin, or `0` when every label is empty.
 */
export function calculateFooterHeaderHeight(
  sizes: ReadonlyArray<Size>,
  orientation: LabelOrientation,
  labels: ReadonlyArray<string | null | undefined>,
  margin: number
): number {
  const hasText = labels.some((label) => label != null && label.length > 0);
  if (!hasText) return 0;

  let extent = 0;
  for (const size of sizes) {
    extent = Math.max(extent, orientation === 'vertical' ? size.width : size.height);
  }
  return extent + margin;
}

export function calculateItemSize(
  entryCount: number,
  margin: number,
  width: number,
  height: number,
  footerHeight: number,
  headerHeight: number
): Size {
  const itemWidth = entryCount > 0 ? (width - (entryCount + 1) * margin) / entryCount : 0;
  const itemHeight = height - 2 * margin - footerHeight - headerHeight;
  return {
    width: Math.max(0, itemWidth),
    height: Math.max(0, itemHeight),
  };
}

/**
 * Row of the value `0`, clamped into `[min, max]`: the plot bottom when every
 * value is positive, the plot top when every value is negative.
 */
export function calculateYOrigin(bounds: ValueBounds, itemHeight: number, plotTop: number): number {
  const baseline = Math.min(bounds.max, Math.max(bounds.min, 0));
  return valueToRow(baseline, bounds, itemHeight, plotTop);
}

function valueToRow(value: number, bounds: ValueBounds, itemHeight: number, plotTop: number): number {
  return plotTop + (1 - normalizeValue(value, bounds)) * itemHeight;
}

export function calculatePoints(
  entries: ReadonlyArray<ResolvedChartEntry>,
  bounds: ValueBounds,
  itemSize: Size,
  margin: number,
  plotTop: number
): Point[] {
  return entries.map((entry, i) => ({
    x: margin + itemSize.width / 2 + i * (itemSize.width + margin),
    y: valueToRow(entry.value, bounds, itemSize.height, plotTop),
  }));
}

export function computeCartesianLayout(
  surface: ChartSurface,
  input: CartesianLayoutInput,
  width: number,
  height: number
): CartesianLayout {
  const { entries, margin, labelStyle } = input;

  const labels = entries.map((e) => e.label);
  const labelSizes = measureLabels(surface, labels, labelStyle);
  const footerHeight = calculateFooterHeaderHeight(labelSizes, input.labelOrientation, labels, margin);

  const valueLabels = entries.map((e) => e.valueLabel);
  const valueLabelSizes = measureLabels(surface, valueLabels, labelStyle);
  const headerHeight = calculateFooterHeaderHeight(valueLabelSizes, input.valueLabelOrientation, valueLabels, margin);

  const bounds = computeValueBounds(
    entries.map((e) => e.value),
    input.minValue,
    input.maxValue
  );
  const itemSize = calculateItemSize(entries.length, margin, width, height, footerHeight, headerHeight);
  const plotTop = margin + headerHeight;
  const origin = calculateYOrigin(bounds, itemSize.height, plotTop);
  const points = calculatePoints(entries, bounds, itemSize, margin, plotTop);

  return {
    width,
    height,
    margin,
    bounds,
    labels,
    labelSizes,
    footerHeight,
    valueLabels,
    valueLabelSizes,
    headerHeight,
    plotTop,
    itemSize,
    origin,
    points,
  };
}
