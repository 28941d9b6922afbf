import { describe, it, expect } from 'vitest';
import type { BarChartOptions } from '../../config/types';
import { createBarRenderer } from '../createBarRenderer';
import { createRecordingSurface } from '../../__tests__/helpers/createRecordingSurface';
import { frameOf, resolveAs } from '../../__tests__/helpers/chartFrames';

const base: BarChartOptions = {
  type: 'bar',
  margin: 0,
  barAreaAlpha: 0,
  entries: [{ value: 0 }, { value: 5000 }],
};

function drawBars(options: BarChartOptions, progress = 1) {
  const surface = createRecordingSurface();
  createBarRenderer().drawContent(surface, frameOf(resolveAs('bar', options), 200, 100, progress));
  return surface;
}

const rects = (surface: ReturnType<typeof drawBars>) => surface.callsOf('fillRect').map((c) => c.args);

describe('createBarRenderer', () => {
  it('grows each bar from the origin to its point', () => {
    const surface = drawBars(base);

    // The zero entry has no length.
    expect(rects(surface)).toEqual([[100, 0, 100, 100]]);
    expect(surface.callsOf('fillRect')[0]?.style.fillStyle).toBe('#91CC75');
  });

  it('scales bar length with progress', () => {
    expect(rects(drawBars(base, 0.5))).toEqual([[100, 50, 100, 50]]);
  });

  it('draws nothing at zero progress even with a minimum height', () => {
    expect(rects(drawBars({ ...base, minBarHeight: 4 }, 0))).toEqual([]);
  });

  it('applies the minimum bar height once progress is positive', () => {
    expect(rects(drawBars({ ...base, minBarHeight: 4 }))).toEqual([
      [0, 96, 100, 4],
      [100, 0, 100, 100],
    ]);
  });

  it('extends negative bars downward from the origin', () => {
    const surface = drawBars({ ...base, entries: [{ value: -50 }, { value: 50 }] });

    expect(rects(surface)).toEqual([
      [0, 50, 100, 50],
      [100, 0, 100, 50],
    ]);
  });

  it('draws a full-height column behind each bar', () => {
    const surface = drawBars({ ...base, barAreaAlpha: 32 });
    const calls = surface.callsOf('fillRect');

    expect(calls.slice(0, 2).map((c) => c.args)).toEqual([
      [0, 0, 100, 100],
      [100, 0, 100, 100],
    ]);
    expect(calls.slice(0, 2).map((c) => c.style.fillStyle)).toEqual([
      'rgba(84, 112, 198, 0.1255)',
      'rgba(145, 204, 117, 0.1255)',
    ]);
  });

  it('draws markers on top of the bars when a point mode is set', () => {
    const surface = drawBars({ ...base, pointMode: 'circle', pointSize: 8 });

    expect(surface.callsOf('arc').map((c) => c.args.slice(0, 3))).toEqual([
      [50, 100, 4],
      [150, 0, 4],
    ]);
  });
});
