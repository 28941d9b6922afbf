import type { ResolvedChartEntry, ResolvedRadialGaugeChartOptions } from '../config/OptionResolver';
import { withSurfaceState } from '../core/ChartSurface';
import { computeValueBounds, normalizeValue } from '../core/valueBounds';
import { clamp01 } from '../utils/easing';
import { withAlpha } from '../utils/colors';
import { drawCaptions } from './drawCaptions';
import type { ChartRenderer } from './rendererUtils';

const TAU = Math.PI * 2;

export interface GaugeRing {
  readonly entryIndex: number;
  /** Radius of the ring's center line. */
  readonly radius: number;
  readonly lineWidth: number;
  readonly startAngle: number;
  readonly endAngle: number;
}

/**
 * One ring per entry, outermost first. Value arcs cover `ratio * 360deg * progress`
 * where the ratio uses bounds computed over absolute values.
 */
export function computeGaugeRings(
  entries: ReadonlyArray<ResolvedChartEntry>,
  options: Pick<ResolvedRadialGaugeChartOptions, 'minValue' | 'maxValue' | 'margin' | 'lineSize' | 'startAngle'>,
  width: number,
  height: number,
  progress: number
): GaugeRing[] {
  const outer = (Math.min(width, height) - 2 * options.margin) / 2;
  if (!(outer > 0) || entries.length === 0) return [];

  const step = outer / entries.length;
  const lineWidth = options.lineSize ?? Math.max(step / 2, step - options.margin / 2);
  const bounds = computeValueBounds(
    entries.map((e) => Math.abs(e.value)),
    options.minValue,
    options.maxValue
  );
  const startAngle = (options.startAngle * Math.PI) / 180;

  return entries.map((entry, entryIndex) => {
    const ratio = clamp01(normalizeValue(Math.abs(entry.value), bounds));
    return {
      entryIndex,
      radius: outer - step * entryIndex - step / 2,
      lineWidth,
      startAngle,
      endAngle: startAngle + ratio * TAU * progress,
    };
  });
}

export function createRadialGaugeRenderer(): ChartRenderer<ResolvedRadialGaugeChartOptions> {
  const drawContent: ChartRenderer<ResolvedRadialGaugeChartOptions>['drawContent'] = (surface, frame) => {
    const { options, entries, width, height, progress } = frame;

    drawCaptions(surface, entries, options.labelMode, width, height, {
      margin: options.margin,
      textSize: options.labelTextSize,
      typeface: options.typeface,
    });

    const rings = computeGaugeRings(entries, options, width, height, progress);
    const cx = width / 2;
    const cy = height / 2;

    withSurfaceState(surface, (s) => {
      s.lineCap = 'round';

      for (const ring of rings) {
        const entry = entries[ring.entryIndex];
        if (!entry || ring.radius <= 0 || ring.lineWidth <= 0) continue;
        s.lineWidth = ring.lineWidth;

        if (options.lineAreaAlpha > 0) {
          s.strokeStyle = withAlpha(entry.color, options.lineAreaAlpha);
          s.beginPath();
          s.arc(cx, cy, ring.radius, 0, TAU);
          s.stroke();
        }

        if (ring.endAngle > ring.startAngle) {
          s.strokeStyle = entry.color;
          s.beginPath();
          s.arc(cx, cy, ring.radius, ring.startAngle, ring.endAngle, false);
          s.stroke();
        }
      }
    });
  };

  return { type: 'radialGauge', drawContent };
}
