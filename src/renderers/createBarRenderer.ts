import type { ResolvedBarChartOptions } from '../config/OptionResolver';
import { withSurfaceState, type ChartSurface } from '../core/ChartSurface';
import type { CartesianLayout } from '../core/layout';
import { withAlpha } from '../utils/colors';
import {
  drawHeaderAndFooter,
  drawPointMarkers,
  layoutCartesianFrame,
  type ChartFrame,
  type ChartRenderer,
} from './rendererUtils';

export interface BarRect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Bar rectangles growing from the origin toward each point as progress advances.
 * Bars below the origin (negative values) extend downward.
 */
export function computeBarRects(
  layout: CartesianLayout,
  progress: number,
  minBarHeight: number
): BarRect[] {
  const { points, itemSize, origin } = layout;

  return points.map((point) => {
    const full = Math.abs(point.y - origin) * progress;
    const length = progress > 0 ? Math.max(minBarHeight, full) : 0;
    const y = point.y <= origin ? origin - length : origin;
    return { x: point.x - itemSize.width / 2, y, width: itemSize.width, height: length };
  });
}

export function drawBarAreas(
  surface: ChartSurface,
  layout: CartesianLayout,
  frame: ChartFrame<ResolvedBarChartOptions>
): void {
  const { options, entries, progress } = frame;
  if (options.barAreaAlpha <= 0 || layout.points.length === 0) return;

  const alpha = options.barAreaAlpha * progress;
  withSurfaceState(surface, (s) => {
    layout.points.forEach((point, i) => {
      const entry = entries[i];
      if (!entry) return;
      s.fillStyle = withAlpha(entry.color, alpha);
      s.fillRect(point.x - layout.itemSize.width / 2, layout.plotTop, layout.itemSize.width, layout.itemSize.height);
    });
  });
}

export function drawBars(
  surface: ChartSurface,
  layout: CartesianLayout,
  frame: ChartFrame<ResolvedBarChartOptions>
): void {
  const rects = computeBarRects(layout, frame.progress, frame.options.minBarHeight);
  if (rects.length === 0) return;

  withSurfaceState(surface, (s) => {
    rects.forEach((rect, i) => {
      const entry = frame.entries[i];
      if (!entry || rect.height <= 0 || rect.width <= 0) return;
      s.fillStyle = entry.color;
      s.fillRect(rect.x, rect.y, rect.width, rect.height);
    });
  });
}

export function createBarRenderer(): ChartRenderer<ResolvedBarChartOptions> {
  const drawContent: ChartRenderer<ResolvedBarChartOptions>['drawContent'] = (surface, frame) => {
    const layout = layoutCartesianFrame(surface, frame);
    const { options } = frame;

    drawBarAreas(surface, layout, frame);
    drawBars(surface, layout, frame);
    drawPointMarkers(surface, layout.points, frame.entries, options.pointMode, options.pointSize, frame.progress);
    drawHeaderAndFooter(surface, layout, frame);
  };

  return { type: 'bar', drawContent };
}
