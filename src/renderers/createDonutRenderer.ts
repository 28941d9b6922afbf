import type { LabelMode } from '../config/types';
import type {
  ResolvedChartEntry,
  ResolvedDonutChartOptions,
  ResolvedPieChartOptions,
} from '../config/OptionResolver';
import { withSurfaceState, type ChartSurface } from '../core/ChartSurface';
import { drawCaptions } from './drawCaptions';
import type { ChartFrame, ChartRenderer } from './rendererUtils';

const TAU = Math.PI * 2;
/** Sectors start at the top and run clockwise (+y is down). */
const START_ANGLE = -Math.PI / 2;

export interface Sector {
  readonly entryIndex: number;
  readonly startAngle: number;
  readonly endAngle: number;
}

/**
 * One sector per entry with a non-zero value, sized by `|value| / sum(|value|)`.
 * The whole ring sweeps in with progress: at `0.5` the sectors cover half a turn.
 */
export function computeSectors(entries: ReadonlyArray<ResolvedChartEntry>, progress: number): Sector[] {
  const total = entries.reduce((sum, e) => sum + Math.abs(e.value), 0);
  if (!(total > 0)) return [];

  const sweep = TAU * progress;
  const sectors: Sector[] = [];
  let accumulated = 0;

  entries.forEach((entry, entryIndex) => {
    const fraction = Math.abs(entry.value) / total;
    if (fraction <= 0) return;

    const start = accumulated;
    accumulated += fraction;
    sectors.push({
      entryIndex,
      startAngle: START_ANGLE + start * sweep,
      endAngle: START_ANGLE + accumulated * sweep,
    });
  });

  return sectors;
}

export function traceSector(
  surface: ChartSurface,
  cx: number,
  cy: number,
  sector: Sector,
  outerRadius: number,
  innerRadius: number
): void {
  surface.beginPath();
  if (innerRadius > 0) {
    surface.arc(cx, cy, outerRadius, sector.startAngle, sector.endAngle, false);
    surface.arc(cx, cy, innerRadius, sector.endAngle, sector.startAngle, true);
  } else {
    surface.moveTo(cx, cy);
    surface.arc(cx, cy, outerRadius, sector.startAngle, sector.endAngle, false);
  }
  surface.closePath();
}

interface RingStyle {
  readonly holeRadius: number;
  readonly labelMode: LabelMode;
}

function drawRing(
  surface: ChartSurface,
  frame: ChartFrame<ResolvedDonutChartOptions | ResolvedPieChartOptions>,
  ring: RingStyle
): void {
  const { options, entries, width, height, progress } = frame;

  drawCaptions(surface, entries, ring.labelMode, width, height, {
    margin: options.margin,
    textSize: options.labelTextSize,
    typeface: options.typeface,
  });

  const radius = (Math.min(width, height) - 2 * options.margin) / 2;
  if (!(radius > 0)) return;

  const cx = width / 2;
  const cy = height / 2;
  const sectors = computeSectors(entries, progress);

  withSurfaceState(surface, (s) => {
    for (const sector of sectors) {
      const entry = entries[sector.entryIndex];
      if (!entry || sector.endAngle <= sector.startAngle) continue;
      s.fillStyle = entry.color;
      traceSector(s, cx, cy, sector, radius, radius * ring.holeRadius);
      s.fill();
    }
  });
}

export function createDonutRenderer(): ChartRenderer<ResolvedDonutChartOptions> {
  return {
    type: 'donut',
    drawContent: (surface, frame) =>
      drawRing(surface, frame, { holeRadius: frame.options.holeRadius, labelMode: frame.options.labelMode }),
  };
}

/** A donut without a hole. */
export function createPieRenderer(): ChartRenderer<ResolvedPieChartOptions> {
  return {
    type: 'pie',
    drawContent: (surface, frame) => drawRing(surface, frame, { holeRadius: 0, labelMode: frame.options.labelMode }),
  };
}
