import { describe, it, expect, expectTypeOf } from 'vitest';
import { getDrawProgress, resolveEntries, resolveOptions } from '../OptionResolver';
import type { BarChartOptions, ChartOptions, LineChartOptions, PointChartOptions } from '../types';
import { resolveAs } from '../../__tests__/helpers/chartFrames';

describe('OptionResolver - base options', () => {
  it('fills in defaults', () => {
    const resolved = resolveOptions({ type: 'point' });

    expect(resolved.entries).toBeNull();
    expect(resolved.minValue).toBeNull();
    expect(resolved.maxValue).toBeNull();
    expect(resolved.margin).toBe(20);
    expect(resolved.labelTextSize).toBe(16);
    expect(resolved.labelColor).toBe('#808080');
    expect(resolved.typeface).toBe('sans-serif');
    expect(resolved.backgroundColor).toBe('#FFFFFF');
    expect(resolved.animationProgress).toBe(1);
    expect(resolved.easing).toBe('linear');
    expect(resolved.palette).toHaveLength(9);
  });

  it('clamps animation progress into [0, 1]', () => {
    expect(resolveOptions({ type: 'bar', animationProgress: 1.7 }).animationProgress).toBe(1);
    expect(resolveOptions({ type: 'bar', animationProgress: -3 }).animationProgress).toBe(0);
    expect(resolveOptions({ type: 'bar', animationProgress: Number.NaN }).animationProgress).toBe(1);
  });

  it('falls back for non-finite or negative sizes', () => {
    const resolved = resolveOptions({ type: 'line', margin: -5, labelTextSize: Number.POSITIVE_INFINITY });

    expect(resolved.margin).toBe(0);
    expect(resolved.labelTextSize).toBe(16);
  });

  it('drops non-finite value bounds', () => {
    const resolved = resolveOptions({ type: 'line', minValue: Number.NaN, maxValue: 10 });

    expect(resolved.minValue).toBeNull();
    expect(resolved.maxValue).toBe(10);
  });

  it('trims the typeface and ignores a blank one', () => {
    expect(resolveOptions({ type: 'pie', typeface: '  serif ' }).typeface).toBe('serif');
    expect(resolveOptions({ type: 'pie', typeface: '   ' }).typeface).toBe('sans-serif');
  });

  it('ignores an unknown easing name', () => {
    const options: ChartOptions = JSON.parse('{"type":"bar","animation":{"easing":"wobble"}}');
    expect(resolveOptions(options).easing).toBe('linear');
  });

  it('rejects an unknown chart type', () => {
    const options: ChartOptions = JSON.parse('{"type":"heatmap"}');
    expect(() => resolveOptions(options)).toThrow('Unhandled chart type: heatmap');
  });
});

describe('OptionResolver - entries', () => {
  it('assigns palette colors by index and derives label colors', () => {
    const entries = resolveEntries(
      [{ value: 1 }, { value: 2, color: ' #123456 ' }, { value: 3 }],
      ['#AA0000', '#00AA00'],
      '#333333'
    );

    expect(entries).toEqual([
      { value: 1, label: null, valueLabel: null, color: '#AA0000', textColor: '#333333', valueLabelColor: '#AA0000' },
      { value: 2, label: null, valueLabel: null, color: '#123456', textColor: '#333333', valueLabelColor: '#123456' },
      { value: 3, label: null, valueLabel: null, color: '#AA0000', textColor: '#333333', valueLabelColor: '#AA0000' },
    ]);
  });

  it('keeps explicit text colors and non-empty labels', () => {
    const [entry] =
      resolveEntries(
        [{ value: 5, label: 'Mar', valueLabel: '', textColor: '#111111', valueLabelColor: '#222222' }],
        ['#AA0000'],
        '#333333'
      ) ?? [];

    expect(entry).toEqual({
      value: 5,
      label: 'Mar',
      valueLabel: null,
      color: '#AA0000',
      textColor: '#111111',
      valueLabelColor: '#222222',
    });
  });

  it('maps non-finite values to zero', () => {
    const entries = resolveEntries([{ value: Number.NaN }, { value: Number.NEGATIVE_INFINITY }], ['#AA0000'], '#333');
    expect(entries?.map((e) => e.value)).toEqual([0, 0]);
  });

  it('uses the custom palette from the options', () => {
    const resolved = resolveOptions({ type: 'bar', palette: ['', '#ABCDEF'], entries: [{ value: 1 }] });

    expect(resolved.palette).toEqual(['#ABCDEF']);
    expect(resolved.entries?.[0]?.color).toBe('#ABCDEF');
  });

  it('keeps an empty entry list distinct from a cleared one', () => {
    expect(resolveOptions({ type: 'bar', entries: [] }).entries).toEqual([]);
    expect(resolveOptions({ type: 'bar', entries: null }).entries).toBeNull();
  });
});

describe('OptionResolver - per-type options', () => {
  it('resolves line defaults', () => {
    const line = resolveAs('line', { type: 'line' });

    expect(line.lineMode).toBe('spline');
    expect(line.lineSize).toBe(3);
    expect(line.lineAreaAlpha).toBe(32);
    expect(line.pointMode).toBe('circle');
    expect(line.pointSize).toBe(10);
    expect('pointAreaAlpha' in line).toBe(false);
    expect(line.enableYFadeOutGradient).toBe(false);
    expect(line.enableYSolidGradient).toBe(false);
  });

  it('rounds and clamps alphas to the byte range', () => {
    expect(resolveAs('line', { type: 'line', lineAreaAlpha: 300 }).lineAreaAlpha).toBe(255);
    expect(resolveAs('line', { type: 'line', lineAreaAlpha: 12.6 }).lineAreaAlpha).toBe(13);
    expect(resolveAs('bar', { type: 'bar', barAreaAlpha: -1 }).barAreaAlpha).toBe(0);
  });

  it('resolves point and bar defaults', () => {
    const point = resolveAs('point', { type: 'point' });
    expect(point.pointSize).toBe(14);
    expect(point.pointAreaAlpha).toBe(100);

    const bar = resolveAs('bar', { type: 'bar' });
    expect(bar.pointMode).toBe('none');
    expect(bar.barAreaAlpha).toBe(32);
    expect(bar.minBarHeight).toBe(0);
    expect('pointAreaAlpha' in bar).toBe(false);
  });

  it('offers point areas on point charts only', () => {
    expectTypeOf<PointChartOptions>().toHaveProperty('pointAreaAlpha');
    expectTypeOf<LineChartOptions>().not.toHaveProperty('pointAreaAlpha');
    expectTypeOf<BarChartOptions>().not.toHaveProperty('pointAreaAlpha');
  });

  it('clamps the donut hole below a full radius', () => {
    expect(resolveAs('donut', { type: 'donut' }).holeRadius).toBe(0.5);
    expect(resolveAs('donut', { type: 'donut', holeRadius: 2 }).holeRadius).toBe(0.99);
    expect(resolveAs('donut', { type: 'donut', holeRadius: -1 }).holeRadius).toBe(0);
  });

  it('resolves radar and gauge defaults', () => {
    const radar = resolveAs('radar', { type: 'radar' });
    expect(radar.borderLineColor).toBe('rgba(128, 128, 128, 0.43)');
    expect(radar.borderLineSize).toBe(2);

    const gauge = resolveAs('radialGauge', { type: 'radialGauge' });
    expect(gauge.lineSize).toBeNull();
    expect(gauge.lineAreaAlpha).toBe(52);
    expect(gauge.startAngle).toBe(-90);
    expect(gauge.labelMode).toBe('leftAndRight');
  });

  it('keeps an explicit gauge line size', () => {
    expect(resolveAs('radialGauge', { type: 'radialGauge', lineSize: 12 }).lineSize).toBe(12);
    expect(resolveAs('radialGauge', { type: 'radialGauge', lineSize: -4 }).lineSize).toBe(0);
  });
});

describe('getDrawProgress', () => {
  it('applies the configured easing', () => {
    const linear = resolveOptions({ type: 'bar', animationProgress: 0.5 });
    const cubic = resolveOptions({ type: 'bar', animationProgress: 0.5, animation: { easing: 'cubicOut' } });

    expect(getDrawProgress(linear)).toBe(0.5);
    expect(getDrawProgress(cubic)).toBe(0.875);
  });
});
