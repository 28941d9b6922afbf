/**
 * Shared renderer utilities.
 *
 * - the renderer contract every chart type implements
 * - path commands (built as plain data, then traced onto a surface)
 * - entry-color gradients, point markers and header/footer labels
 *
 * Every helper that touches paint state scopes it with `withSurfaceState`.
 */

import type { ChartType, LabelOrientation, PointMode } from '../config/types';
import type {
  ResolvedBaseOptions,
  ResolvedChartEntry,
  ResolvedChartOptions,
  ResolvedMarkerStyle,
} from '../config/OptionResolver';
import { toCssFont, withSurfaceState, type ChartSurface, type SurfaceGradient } from '../core/ChartSurface';
import { computeCartesianLayout, type CartesianLayout, type Point } from '../core/layout';

export interface ChartFrame<TOptions> {
  readonly options: TOptions;
  /** Entries to draw; never empty. */
  readonly entries: ReadonlyArray<ResolvedChartEntry>;
  readonly width: number;
  readonly height: number;
  /** Eased animation progress in [0, 1]. */
  readonly progress: number;
}

export interface ChartRenderer<TOptions extends ResolvedChartOptions> {
  readonly type: ChartType;
  drawContent(surface: ChartSurface, frame: ChartFrame<TOptions>): void;
}

export type PathCommand =
  | Readonly<{ kind: 'moveTo'; x: number; y: number }>
  | Readonly<{ kind: 'lineTo'; x: number; y: number }>
  | Readonly<{ kind: 'cubicTo'; control: Point; nextControl: Point; to: Point }>
  | Readonly<{ kind: 'close' }>;

export function tracePath(surface: ChartSurface, commands: ReadonlyArray<PathCommand>): void {
  surface.beginPath();
  for (const cmd of commands) {
    switch (cmd.kind) {
      case 'moveTo':
        surface.moveTo(cmd.x, cmd.y);
        break;
      case 'lineTo':
        surface.lineTo(cmd.x, cmd.y);
        break;
      case 'cubicTo':
        surface.bezierCurveTo(cmd.control.x, cmd.control.y, cmd.nextControl.x, cmd.nextControl.y, cmd.to.x, cmd.to.y);
        break;
      case 'close':
        surface.closePath();
        break;
    }
  }
}

const TAU = Math.PI * 2;

/**
 * Horizontal gradient from `x = 0` to the last point, placing each color at the
 * X of the point with the same index.
 */
export function createEntryXGradient(
  surface: ChartSurface,
  points: ReadonlyArray<Point>,
  colors: ReadonlyArray<string>
): SurfaceGradient {
  const endX = points[points.length - 1]?.x ?? 0;
  const gradient = surface.createLinearGradient(0, 0, endX, 0);
  const count = Math.min(points.length, colors.length);

  for (let i = 0; i < count; i++) {
    const x = points[i]?.x ?? 0;
    const offset = endX > 0 ? x / endX : count > 1 ? i / (count - 1) : 0;
    gradient.addColorStop(Math.min(1, Math.max(0, offset)), colors[i] ?? 'transparent');
  }
  return gradient;
}

export function drawPointMarkers(
  surface: ChartSurface,
  points: ReadonlyArray<Point>,
  entries: ReadonlyArray<ResolvedChartEntry>,
  mode: PointMode,
  pointSize: number,
  progress: number
): void {
  const size = pointSize * progress;
  if (points.length === 0 || mode === 'none' || !(size > 0)) return;

  withSurfaceState(surface, (s) => {
    points.forEach((point, i) => {
      const entry = entries[i];
      if (!entry) return;

      s.fillStyle = entry.color;
      if (mode === 'circle') {
        s.beginPath();
        s.arc(point.x, point.y, size / 2, 0, TAU);
        s.fill();
      } else {
        s.fillRect(point.x - size / 2, point.y - size / 2, size, size);
      }
    });
  });
}

interface LabelRowStyle {
  readonly textSize: number;
  readonly typeface: string;
  readonly orientation: LabelOrientation;
}

/**
 * Draws one label per slot.
 *
 * `edge` is the row the text is attached to: the bottom of the text for the
 * header (`placement: 'above'`) and its top for the footer (`'below'`).
 * Vertical labels are rotated by -90 degrees and grow away from the plot.
 */
function drawLabelRow(
  surface: ChartSurface,
  labels: ReadonlyArray<string | null>,
  colors: ReadonlyArray<string>,
  points: ReadonlyArray<Point>,
  edge: number,
  placement: 'above' | 'below',
  style: LabelRowStyle
): void {
  labels.forEach((label, i) => {
    const point = points[i];
    if (label == null || label.length === 0 || !point) return;

    withSurfaceState(surface, (s) => {
      s.font = toCssFont(style.textSize, style.typeface);
      s.fillStyle = colors[i] ?? 'transparent';

      if (style.orientation === 'vertical') {
        s.translate(point.x, edge);
        s.rotate(-Math.PI / 2);
        s.textAlign = placement === 'above' ? 'left' : 'right';
        s.textBaseline = 'middle';
        s.fillText(label, 0, 0);
      } else {
        s.textAlign = 'center';
        s.textBaseline = placement === 'above' ? 'bottom' : 'top';
        s.fillText(label, point.x, edge);
      }
    });
  });
}

export function drawHeader(
  surface: ChartSurface,
  layout: CartesianLayout,
  entries: ReadonlyArray<ResolvedChartEntry>,
  style: LabelRowStyle
): void {
  if (layout.headerHeight <= 0) return;
  drawLabelRow(
    surface,
    layout.valueLabels,
    entries.map((e) => e.valueLabelColor),
    layout.points,
    layout.plotTop - layout.margin,
    'above',
    style
  );
}

export function drawFooter(
  surface: ChartSurface,
  layout: CartesianLayout,
  entries: ReadonlyArray<ResolvedChartEntry>,
  style: LabelRowStyle
): void {
  if (layout.footerHeight <= 0) return;
  drawLabelRow(
    surface,
    layout.labels,
    entries.map((e) => e.textColor),
    layout.points,
    layout.plotTop + layout.itemSize.height + layout.margin,
    'below',
    style
  );
}

export type CartesianChartOptions = ResolvedBaseOptions & ResolvedMarkerStyle;

export function layoutCartesianFrame(
  surface: ChartSurface,
  frame: ChartFrame<CartesianChartOptions>
): CartesianLayout {
  const { options } = frame;
  return computeCartesianLayout(
    surface,
    {
      entries: frame.entries,
      minValue: options.minValue,
      maxValue: options.maxValue,
      margin: options.margin,
      labelStyle: { textSize: options.labelTextSize, typeface: options.typeface },
      labelOrientation: options.labelOrientation,
      valueLabelOrientation: options.valueLabelOrientation,
    },
    frame.width,
    frame.height
  );
}

/** Value labels in the header, labels in the footer. */
export function drawHeaderAndFooter(
  surface: ChartSurface,
  layout: CartesianLayout,
  frame: ChartFrame<CartesianChartOptions>
): void {
  const { options, entries } = frame;
  const text = { textSize: options.labelTextSize, typeface: options.typeface };
  drawHeader(surface, layout, entries, { ...text, orientation: options.valueLabelOrientation });
  drawFooter(surface, layout, entries, { ...text, orientation: options.labelOrientation });
}
