import { configureLogging, createChart } from '../../src/index';
import type { ChartEntry, ChartInstance, ChartOptions, ChartType } from '../../src/index';

const showError = (message: string): void => {
  const el = document.getElementById('error');
  if (!el) return;
  el.textContent = message;
  el.style.display = 'block';
};

const setStatus = (message: string): void => {
  const el = document.getElementById('status');
  if (!el) return;
  el.textContent = message;
};

/**
 * Small deterministic RNG (LCG) so every reload shows the same "random" data.
 */
const createRng = (seed: number): (() => number) => {
  let s = seed >>> 0 || 1;
  return () => {
    s = (1664525 * s + 1013904223) >>> 0;
    return s / 0xffffffff;
  };
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;
const CHART_TYPES: ReadonlyArray<ChartType> = ['bar', 'point', 'line', 'donut', 'pie', 'radar', 'radialGauge'];
const TYPEFACES: ReadonlyArray<string> = ['sans-serif', 'Georgia, serif', 'ui-monospace, monospace'];
const ANIMATION_MS = 900;
const VALUE_MIN = 1000;
const VALUE_MAX = 17000;

const makeEntries = (rng: () => number, count: number): ChartEntry[] =>
  MONTHS.slice(0, count).map((label) => {
    const value = Math.round(VALUE_MIN + rng() * (VALUE_MAX - VALUE_MIN));
    return { value, label, valueLabel: value.toString() };
  });

const createOptions = (type: ChartType, entries: ReadonlyArray<ChartEntry>, typeface: string): ChartOptions => {
  const base = {
    entries,
    typeface,
    minValue: VALUE_MIN,
    maxValue: VALUE_MAX,
    labelTextSize: 13,
    margin: 12,
    animation: { easing: 'cubicOut' },
  } as const;
  switch (type) {
    case 'line':
      return { ...base, type, enableYFadeOutGradient: true };
    case 'bar':
      return { ...base, type };
    case 'point':
      return { ...base, type };
    case 'donut':
      return { ...base, type, holeRadius: 0.55 };
    case 'pie':
      return { ...base, type };
    case 'radar':
      return { ...base, type, entries: entries.slice(0, 6) };
    case 'radialGauge':
      return { ...base, type, entries: entries.slice(0, 4) };
  }
};

/** Redraws at the canvas's CSS size times the device pixel ratio. */
const createPainter = (canvas: HTMLCanvasElement, chart: ChartInstance): (() => void) => {
  const ctx = canvas.getContext('2d');
  if (!ctx) throw new Error('Canvas 2D context unavailable');

  return () => {
    const dpr = window.devicePixelRatio || 1;
    const width = canvas.clientWidth;
    const height = canvas.clientHeight;
    canvas.width = Math.round(width * dpr);
    canvas.height = Math.round(height * dpr);
    ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
    chart.draw(ctx, width, height);
  };
};

async function main(): Promise<void> {
  await configureLogging({ level: 'debug' });

  const canvas = document.getElementById('chart');
  const typeButton = document.getElementById('next-type');
  const fontButton = document.getElementById('next-font');
  const dataButton = document.getElementById('new-data');
  if (
    !(canvas instanceof HTMLCanvasElement) ||
    !(typeButton instanceof HTMLButtonElement) ||
    !(fontButton instanceof HTMLButtonElement) ||
    !(dataButton instanceof HTMLButtonElement)
  ) {
    throw new Error('Gallery elements not found');
  }

  const rng = createRng(2024);
  let typeIndex = 0;
  let fontIndex = 0;
  let entries = makeEntries(rng, MONTHS.length);

  const currentType = (): ChartType => CHART_TYPES[typeIndex % CHART_TYPES.length] ?? 'bar';
  const currentFont = (): string => TYPEFACES[fontIndex % TYPEFACES.length] ?? 'sans-serif';

  const chart = createChart(createOptions(currentType(), entries, currentFont()));
  const paint = createPainter(canvas, chart);

  // The chart never animates itself: progress is pushed on every frame.
  let rafId: number | null = null;
  const animate = (): void => {
    if (rafId !== null) cancelAnimationFrame(rafId);
    const start = performance.now();
    const step = (now: number): void => {
      const progress = Math.min(1, (now - start) / ANIMATION_MS);
      chart.setAnimationProgress(progress);
      paint();
      rafId = progress < 1 ? requestAnimationFrame(step) : null;
    };
    rafId = requestAnimationFrame(step);
  };

  const apply = (): void => {
    chart.setOption({ ...createOptions(currentType(), entries, currentFont()), animationProgress: 0 });
    setStatus(`${currentType()} · ${currentFont()}`);
    animate();
  };

  typeButton.addEventListener('click', () => {
    typeIndex++;
    apply();
  });
  fontButton.addEventListener('click', () => {
    fontIndex++;
    apply();
  });
  dataButton.addEventListener('click', () => {
    entries = makeEntries(rng, MONTHS.length);
    apply();
  });

  const ro = new ResizeObserver(() => paint());
  ro.observe(canvas);
  apply();

  let cleanedUp = false;
  const cleanup = (): void => {
    if (cleanedUp) return;
    cleanedUp = true;
    ro.disconnect();
    if (rafId !== null) cancelAnimationFrame(rafId);
  };

  window.addEventListener('beforeunload', cleanup);
  import.meta.hot?.dispose(cleanup);
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', () => {
    main().catch((err) => {
      console.error(err);
      showError(err instanceof Error ? err.message : String(err));
    });
  });
} else {
  main().catch((err) => {
    console.error(err);
    showError(err instanceof Error ? err.message : String(err));
  });
}
