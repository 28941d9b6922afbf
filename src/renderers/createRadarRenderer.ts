import type { ResolvedChartEntry, ResolvedRadarChartOptions } from '../config/OptionResolver';
import { toCssFont, withSurfaceState, type ChartSurface } from '../core/ChartSurface';
import type { Point } from '../core/layout';
import { computeValueBounds, normalizeValue } from '../core/valueBounds';
import { clamp01 } from '../utils/easing';
import { withAlpha } from '../utils/colors';
import { drawPointMarkers, type ChartFrame, type ChartRenderer } from './rendererUtils';

const TAU = Math.PI * 2;
const LINE_HEIGHT = 1.2;
/** Below this magnitude a direction component counts as zero when aligning labels. */
const ALIGN_EPSILON = 1e-3;

export interface RadarGeometry {
  readonly center: Point;
  /** Radius of the border circle (the max value). */
  readonly radius: number;
  /** Axis angle per entry; the first axis points up. */
  readonly angles: ReadonlyArray<number>;
  /** Value point per entry, pulled toward the center by progress. */
  readonly points: ReadonlyArray<Point>;
}

const textLines = (entry: ResolvedChartEntry): string[] =>
  [entry.label, entry.valueLabel].filter((t): t is string => t != null && t.length > 0);

/** Room kept between the border circle and the edge for the outer labels. */
export function computeCaptionHeight(entries: ReadonlyArray<ResolvedChartEntry>, textSize: number, margin: number): number {
  const maxLines = entries.reduce((max, e) => Math.max(max, textLines(e).length), 0);
  return maxLines > 0 ? maxLines * textSize * LINE_HEIGHT + margin : 0;
}

export function computeRadarGeometry(
  entries: ReadonlyArray<ResolvedChartEntry>,
  options: Pick<ResolvedRadarChartOptions, 'minValue' | 'maxValue' | 'margin' | 'labelTextSize'>,
  width: number,
  height: number,
  progress: number
): RadarGeometry {
  const center = { x: width / 2, y: height / 2 };
  const captionHeight = computeCaptionHeight(entries, options.labelTextSize, options.margin);
  const radius = Math.max(0, (Math.min(width, height) - 2 * options.margin) / 2 - captionHeight);
  const bounds = computeValueBounds(
    entries.map((e) => e.value),
    options.minValue,
    options.maxValue
  );

  const step = entries.length > 0 ? TAU / entries.length : 0;
  const angles = entries.map((_, i) => -Math.PI / 2 + i * step);
  const points = entries.map((entry, i) => {
    const angle = angles[i] ?? 0;
    const r = radius * clamp01(normalizeValue(entry.value, bounds)) * progress;
    return { x: center.x + Math.cos(angle) * r, y: center.y + Math.sin(angle) * r };
  });

  return { center, radius, angles, points };
}

function drawBorder(surface: ChartSurface, geometry: RadarGeometry, options: ResolvedRadarChartOptions): void {
  if (options.borderLineSize <= 0 || geometry.radius <= 0) return;
  const { center, radius } = geometry;

  withSurfaceState(surface, (s) => {
    s.strokeStyle = options.borderLineColor;
    s.lineWidth = options.borderLineSize;

    s.beginPath();
    s.arc(center.x, center.y, radius, 0, TAU);
    s.stroke();

    for (const angle of geometry.angles) {
      s.beginPath();
      s.moveTo(center.x, center.y);
      s.lineTo(center.x + Math.cos(angle) * radius, center.y + Math.sin(angle) * radius);
      s.stroke();
    }
  });
}

/** Triangle from the center to each value point and the next one, in that entry's color. */
function drawAreas(
  surface: ChartSurface,
  geometry: RadarGeometry,
  frame: ChartFrame<ResolvedRadarChartOptions>
): void {
  const { points, center } = geometry;
  const { options, entries, progress } = frame;
  if (points.length < 2 || options.areaAlpha <= 0) return;

  withSurfaceState(surface, (s) => {
    points.forEach((point, i) => {
      const next = points[(i + 1) % points.length];
      const entry = entries[i];
      if (!next || !entry) return;

      s.fillStyle = withAlpha(entry.color, options.areaAlpha * progress);
      s.beginPath();
      s.moveTo(center.x, center.y);
      s.lineTo(point.x, point.y);
      s.lineTo(next.x, next.y);
      s.closePath();
      s.fill();
    });
  });
}

function drawValueLines(
  surface: ChartSurface,
  geometry: RadarGeometry,
  frame: ChartFrame<ResolvedRadarChartOptions>
): void {
  const { points } = geometry;
  const { options, entries } = frame;
  if (points.length < 2 || options.lineSize <= 0) return;

  withSurfaceState(surface, (s) => {
    s.lineWidth = options.lineSize;
    s.lineCap = 'round';

    points.forEach((point, i) => {
      const nextIndex = (i + 1) % points.length;
      const next = points[nextIndex];
      const entry = entries[i];
      const nextEntry = entries[nextIndex];
      if (!next || !entry || !nextEntry) return;

      const gradient = s.createLinearGradient(point.x, point.y, next.x, next.y);
      gradient.addColorStop(0, entry.color);
      gradient.addColorStop(1, nextEntry.color);
      s.strokeStyle = gradient;

      s.beginPath();
      s.moveTo(point.x, point.y);
      s.lineTo(next.x, next.y);
      s.stroke();
    });
  });
}

const alignFor = (cos: number): string => (cos > ALIGN_EPSILON ? 'left' : cos < -ALIGN_EPSILON ? 'right' : 'center');
const baselineFor = (sin: number): string =>
  sin > ALIGN_EPSILON ? 'top' : sin < -ALIGN_EPSILON ? 'bottom' : 'middle';

function drawLabels(
  surface: ChartSurface,
  geometry: RadarGeometry,
  frame: ChartFrame<ResolvedRadarChartOptions>
): void {
  const { options, entries } = frame;
  const { center } = geometry;
  const anchorRadius = geometry.radius + options.margin / 2;
  const lineGap = options.labelTextSize * LINE_HEIGHT;

  withSurfaceState(surface, (s) => {
    s.font = toCssFont(options.labelTextSize, options.typeface);

    entries.forEach((entry, i) => {
      const angle = geometry.angles[i];
      if (angle === undefined) return;

      const cos = Math.cos(angle);
      const sin = Math.sin(angle);
      const x = center.x + cos * anchorRadius;
      const y = center.y + sin * anchorRadius;
      // Labels above the chart stack upward so they stay outside the border.
      const direction = sin < -ALIGN_EPSILON ? -1 : 1;

      s.textAlign = alignFor(cos);
      s.textBaseline = baselineFor(sin);

      const lines = [
        { text: entry.label, color: entry.textColor },
        { text: entry.valueLabel, color: entry.valueLabelColor },
      ].filter((line): line is { text: string; color: string } => line.text != null && line.text.length > 0);
      const ordered = direction < 0 ? lines.reverse() : lines;

      ordered.forEach((line, j) => {
        s.fillStyle = line.color;
        s.fillText(line.text, x, y + direction * j * lineGap);
      });
    });
  });
}

export function createRadarRenderer(): ChartRenderer<ResolvedRadarChartOptions> {
  const drawContent: ChartRenderer<ResolvedRadarChartOptions>['drawContent'] = (surface, frame) => {
    const { options, entries, width, height, progress } = frame;
    const geometry = computeRadarGeometry(entries, options, width, height, progress);

    drawBorder(surface, geometry, options);
    drawAreas(surface, geometry, frame);
    drawValueLines(surface, geometry, frame);
    drawPointMarkers(surface, geometry.points, entries, options.pointMode, options.pointSize, progress);
    drawLabels(surface, geometry, frame);
  };

  return { type: 'radar', drawContent };
}
