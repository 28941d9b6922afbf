import { getDrawProgress, resolveOptions } from './config/OptionResolver';
import type { ResolvedChartOptions } from './config/OptionResolver';
import type { ChartEntry, ChartOptions, ChartType } from './config/types';
import { withSurfaceState, type ChartSurface } from './core/ChartSurface';
import { getChartLogger } from './logging';
import { createBarRenderer } from './renderers/createBarRenderer';
import { createDonutRenderer, createPieRenderer } from './renderers/createDonutRenderer';
import { createLineRenderer } from './renderers/createLineRenderer';
import { createPointRenderer } from './renderers/createPointRenderer';
import { createRadarRenderer } from './renderers/createRadarRenderer';
import { createRadialGaugeRenderer } from './renderers/createRadialGaugeRenderer';
import type { ChartFrame, ChartRenderer } from './renderers/rendererUtils';

const logger = getChartLogger('chart');

export interface ChartInstance {
  readonly type: ChartType;
  readonly options: Readonly<ChartOptions>;
  /** Replaces every option, including the chart type. */
  setOption(options: ChartOptions): void;
  /** Replaces the entry list wholesale; `null` clears it. */
  setEntries(entries: ReadonlyArray<ChartEntry> | null): void;
  setAnimationProgress(progress: number): void;
  getResolvedOptions(): ResolvedChartOptions;
  /**
   * Draws into the `width x height` region at the surface origin.
   *
   * The region is cleared, the chart content drawn, then the background painted
   * behind it. The surface is not retained after the call returns.
   */
  draw(surface: ChartSurface, width: number, height: number): void;
}

type RendererRegistry = {
  readonly [K in ChartType]: ChartRenderer<Extract<ResolvedChartOptions, { readonly type: K }>>;
};

const renderers: RendererRegistry = {
  bar: createBarRenderer(),
  point: createPointRenderer(),
  line: createLineRenderer(),
  donut: createDonutRenderer(),
  pie: createPieRenderer(),
  radar: createRadarRenderer(),
  radialGauge: createRadialGaugeRenderer(),
};

function drawWith<T extends ResolvedChartOptions>(
  renderer: ChartRenderer<T>,
  surface: ChartSurface,
  frame: ChartFrame<T>
): void {
  renderer.drawContent(surface, frame);
}

/**
 * Draws resolved options onto a surface. Each chart type maps to exactly one renderer.
 */
export function drawChart(
  surface: ChartSurface,
  options: ResolvedChartOptions,
  width: number,
  height: number
): void {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    logger.debug('Skipped draw of {width}x{height} region', { width, height });
    return;
  }

  const entries = options.entries ?? [];
  const progress = getDrawProgress(options);

  surface.clearRect(0, 0, width, height);

  if (entries.length === 0) {
    logger.debug('No entries to draw for {type} chart', { type: options.type });
  } else {
    const base = { entries, width, height, progress };
    switch (options.type) {
      case 'bar':
        drawWith(renderers.bar, surface, { ...base, options });
        break;
      case 'point':
        drawWith(renderers.point, surface, { ...base, options });
        break;
      case 'line':
        drawWith(renderers.line, surface, { ...base, options });
        break;
      case 'donut':
        drawWith(renderers.donut, surface, { ...base, options });
        break;
      case 'pie':
        drawWith(renderers.pie, surface, { ...base, options });
        break;
      case 'radar':
        drawWith(renderers.radar, surface, { ...base, options });
        break;
      case 'radialGauge':
        drawWith(renderers.radialGauge, surface, { ...base, options });
        break;
    }
  }

  withSurfaceState(surface, (s) => {
    s.globalCompositeOperation = 'destination-over';
    s.fillStyle = options.backgroundColor;
    s.fillRect(0, 0, width, height);
  });
}

export function createChart(options: ChartOptions): ChartInstance {
  let currentOptions: ChartOptions = options;
  let resolved: ResolvedChartOptions = resolveOptions(options);

  const setOption: ChartInstance['setOption'] = (next) => {
    currentOptions = next;
    resolved = resolveOptions(next);
  };

  return {
    get type() {
      return resolved.type;
    },
    get options() {
      return currentOptions;
    },
    setOption,
    setEntries: (entries) => setOption({ ...currentOptions, entries }),
    setAnimationProgress: (animationProgress) => setOption({ ...currentOptions, animationProgress }),
    getResolvedOptions: () => resolved,
    draw: (surface, width, height) => drawChart(surface, resolved, width, height),
  };
}
