import type { ResolvedPointChartOptions } from '../config/OptionResolver';
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

/**
 * Columns between the origin and each point, `pointSize` wide, fading from
 * `pointAreaAlpha` at the point to a third of it at the origin.
 */
export function drawPointAreas(
  surface: ChartSurface,
  layout: CartesianLayout,
  frame: ChartFrame<ResolvedPointChartOptions>
): void {
  const { points, origin } = layout;
  const { options, entries, progress } = frame;
  if (points.length === 0 || options.pointAreaAlpha <= 0 || options.pointSize <= 0) return;

  const alpha = options.pointAreaAlpha * progress;

  withSurfaceState(surface, (s) => {
    points.forEach((point, i) => {
      const entry = entries[i];
      const height = Math.abs(origin - point.y);
      if (!entry || height === 0) return;

      const gradient = s.createLinearGradient(0, point.y, 0, origin);
      gradient.addColorStop(0, withAlpha(entry.color, alpha));
      gradient.addColorStop(1, withAlpha(entry.color, alpha / 3));
      s.fillStyle = gradient;
      s.fillRect(point.x - options.pointSize / 2, Math.min(origin, point.y), options.pointSize, height);
    });
  });
}

export function createPointRenderer(): ChartRenderer<ResolvedPointChartOptions> {
  const drawContent: ChartRenderer<ResolvedPointChartOptions>['drawContent'] = (surface, frame) => {
    const layout = layoutCartesianFrame(surface, frame);
    const { options } = frame;

    drawPointAreas(surface, layout, frame);
    drawPointMarkers(surface, layout.points, frame.entries, options.pointMode, options.pointSize, frame.progress);
    drawHeaderAndFooter(surface, layout, frame);
  };

  return { type: 'point', drawContent };
}
