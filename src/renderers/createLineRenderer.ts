import type { LineMode } from '../config/types';
import type { ResolvedLineChartOptions } from '../config/OptionResolver';
import { withSurfaceState, type ChartSurface, type SurfaceGradient } from '../core/ChartSurface';
import type { CartesianLayout, Point, Size } from '../core/layout';
import { scaleAlpha, withAlpha } from '../utils/colors';
import {
  createEntryXGradient,
  drawHeaderAndFooter,
  drawPointMarkers,
  layoutCartesianFrame,
  tracePath,
  type ChartFrame,
  type ChartRenderer,
  type PathCommand,
} from './rendererUtils';

/** Horizontal distance of spline control points, as a fraction of the slot width. */
const SPLINE_CONTROL_OFFSET = 0.8;

/**
 * Area fill modes, in precedence order:
 * - `solidY`: vertical gradient between the two configured colors
 * - `fadeOutY`: entry-color gradient masked by the vertical gradient
 * - `entryX`: entry-color gradient
 */
export type AreaFillMode = 'solidY' | 'fadeOutY' | 'entryX';

export interface CubicInfo {
  readonly point: Point;
  readonly control: Point;
  readonly nextPoint: Point;
  readonly nextControl: Point;
}

/**
 * Control points for the segment `points[i] -> points[i + 1]`: both tangents are
 * horizontal, offset by 80% of the slot width.
 */
export function calculateCubicInfo(points: ReadonlyArray<Point>, i: number, itemSize: Size): CubicInfo | null {
  const point = points[i];
  const nextPoint = points[i + 1];
  if (!point || !nextPoint) return null;

  const dx = itemSize.width * SPLINE_CONTROL_OFFSET;
  return {
    point,
    control: { x: point.x + dx, y: point.y },
    nextPoint,
    nextControl: { x: nextPoint.x - dx, y: nextPoint.y },
  };
}

/**
 * Segments leading from `points[0]` through the remaining points.
 * Mode `none` contributes no segment.
 */
function buildSegments(points: ReadonlyArray<Point>, itemSize: Size, mode: LineMode): PathCommand[] {
  const segments: PathCommand[] = [];

  switch (mode) {
    case 'spline':
      for (let i = 0; i < points.length - 1; i++) {
        const cubic = calculateCubicInfo(points, i, itemSize);
        if (!cubic) continue;
        segments.push({ kind: 'cubicTo', control: cubic.control, nextControl: cubic.nextControl, to: cubic.nextPoint });
      }
      break;
    case 'straight':
      for (const point of points.slice(1)) {
        segments.push({ kind: 'lineTo', x: point.x, y: point.y });
      }
      break;
    case 'none':
      break;
  }

  return segments;
}

export function buildLinePath(points: ReadonlyArray<Point>, itemSize: Size, mode: LineMode): PathCommand[] {
  const first = points[0];
  if (!first) return [];
  return [{ kind: 'moveTo', x: first.x, y: first.y }, ...buildSegments(points, itemSize, mode)];
}

/**
 * Closed outline of the area under the line, dropping to `origin` at both ends.
 */
export function buildAreaPath(
  points: ReadonlyArray<Point>,
  itemSize: Size,
  origin: number,
  mode: LineMode
): PathCommand[] {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) return [];

  return [
    { kind: 'moveTo', x: first.x, y: origin },
    { kind: 'lineTo', x: first.x, y: first.y },
    ...buildSegments(points, itemSize, mode),
    { kind: 'lineTo', x: last.x, y: origin },
    { kind: 'close' },
  ];
}

export function selectAreaFillMode(
  options: Pick<ResolvedLineChartOptions, 'enableYSolidGradient' | 'enableYFadeOutGradient'>
): AreaFillMode {
  if (options.enableYSolidGradient) return 'solidY';
  if (options.enableYFadeOutGradient) return 'fadeOutY';
  return 'entryX';
}

/** Keeps a vertical gradient from collapsing to a single row (which paints nothing). */
const distinctRow = (from: number, to: number): number => (Math.abs(to - from) < 1e-6 ? from - 1 : to);

function createYGradient(
  surface: ChartSurface,
  fromY: number,
  toY: number,
  startColor: string,
  endColor: string
): SurfaceGradient {
  const gradient = surface.createLinearGradient(0, fromY, 0, distinctRow(fromY, toY));
  gradient.addColorStop(0, startColor);
  gradient.addColorStop(1, endColor);
  return gradient;
}

export function drawLine(
  surface: ChartSurface,
  layout: CartesianLayout,
  frame: ChartFrame<ResolvedLineChartOptions>
): void {
  const { points, itemSize } = layout;
  const { options, entries } = frame;
  if (points.length < 2 || options.lineMode === 'none') return;

  withSurfaceState(surface, (s) => {
    s.strokeStyle = createEntryXGradient(
      s,
      points,
      entries.map((e) => e.color)
    );
    s.lineWidth = options.lineSize;
    s.lineJoin = 'round';
    s.lineCap = 'round';
    tracePath(s, buildLinePath(points, itemSize, options.lineMode));
    s.stroke();
  });
}

export function drawArea(
  surface: ChartSurface,
  layout: CartesianLayout,
  frame: ChartFrame<ResolvedLineChartOptions>
): void {
  const { points, itemSize, origin } = layout;
  const { options, entries, progress } = frame;
  if (options.lineAreaAlpha <= 0 || points.length < 2) return;

  const alpha = options.lineAreaAlpha * progress;
  const path = buildAreaPath(points, itemSize, origin, options.lineMode);
  const entryColors = entries.map((e) => withAlpha(e.color, alpha));

  withSurfaceState(surface, (s) => {
    switch (selectAreaFillMode(options)) {
      case 'solidY': {
        const topY = points.reduce((top, p) => Math.min(top, p.y), Number.POSITIVE_INFINITY);
        s.fillStyle = createYGradient(
          s,
          origin,
          topY,
          scaleAlpha(options.gradientYColorStart, progress),
          scaleAlpha(options.gradientYColorEnd, progress)
        );
        tracePath(s, path);
        s.fill();
        break;
      }
      case 'fadeOutY': {
        s.fillStyle = createEntryXGradient(s, points, entryColors);
        tracePath(s, path);
        s.fill();
        // The chart region is cleared before content is drawn, so erasing by the
        // mask's alpha only attenuates this fill. Start sits on row 0, end on the origin.
        s.globalCompositeOperation = 'destination-out';
        s.fillStyle = createYGradient(s, 0, origin, options.gradientYColorStart, options.gradientYColorEnd);
        tracePath(s, path);
        s.fill();
        break;
      }
      case 'entryX': {
        s.fillStyle = createEntryXGradient(s, points, entryColors);
        tracePath(s, path);
        s.fill();
        break;
      }
    }
  });
}

export function createLineRenderer(): ChartRenderer<ResolvedLineChartOptions> {
  const drawContent: ChartRenderer<ResolvedLineChartOptions>['drawContent'] = (surface, frame) => {
    const layout = layoutCartesianFrame(surface, frame);
    const { options } = frame;

    drawArea(surface, layout, frame);
    drawLine(surface, layout, frame);
    drawPointMarkers(surface, layout.points, frame.entries, options.pointMode, options.pointSize, frame.progress);
    drawHeaderAndFooter(surface, layout, frame);
  };

  return { type: 'line', drawContent };
}
