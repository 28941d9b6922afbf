import { describe, it, expect } from 'vitest';
import { formatRgba, parseCssColorToRgba, scaleAlpha, withAlpha } from '../colors';

describe('parseCssColorToRgba', () => {
  it('parses short and long hex colors', () => {
    expect(parseCssColorToRgba('#fff')).toEqual([255, 255, 255, 1]);
    expect(parseCssColorToRgba('#5470C6')).toEqual([84, 112, 198, 1]);
    expect(parseCssColorToRgba('#11223380')).toEqual([17, 34, 51, 128 / 255]);
    expect(parseCssColorToRgba('#0008')).toEqual([0, 0, 0, 136 / 255]);
  });

  it('parses functional notation, including percentages', () => {
    expect(parseCssColorToRgba('rgba(10, 20, 30, 0.5)')).toEqual([10, 20, 30, 0.5]);
    expect(parseCssColorToRgba('rgb(100%, 0%, 50%)')).toEqual([255, 0, 127.5, 1]);
    expect(parseCssColorToRgba('rgb(300 10 10 / 50%)')).toEqual([255, 10, 10, 0.5]);
  });

  it('parses a few named colors', () => {
    expect(parseCssColorToRgba('transparent')).toEqual([0, 0, 0, 0]);
    expect(parseCssColorToRgba(' White ')).toEqual([255, 255, 255, 1]);
  });

  it('returns null for unsupported input', () => {
    expect(parseCssColorToRgba('')).toBeNull();
    expect(parseCssColorToRgba('#12')).toBeNull();
    expect(parseCssColorToRgba('#ggg')).toBeNull();
    expect(parseCssColorToRgba('hsl(0, 100%, 50%)')).toBeNull();
    expect(parseCssColorToRgba('rgb(1, 2)')).toBeNull();
  });
});

describe('formatRgba', () => {
  it('rounds channels and alpha', () => {
    expect(formatRgba([10.4, 20.6, 30, 1 / 3])).toBe('rgba(10, 21, 30, 0.3333)');
  });
});

describe('withAlpha', () => {
  it('replaces the alpha on the byte scale', () => {
    expect(withAlpha('#FF0000', 255)).toBe('rgba(255, 0, 0, 1)');
    expect(withAlpha('rgba(255, 0, 0, 0.2)', 0)).toBe('rgba(255, 0, 0, 0)');
    expect(withAlpha('#00FF00', 32)).toBe('rgba(0, 255, 0, 0.1255)');
  });

  it('falls back to black for unparsable colors', () => {
    expect(withAlpha('not-a-color', 128)).toBe('rgba(0, 0, 0, 0.502)');
  });
});

describe('scaleAlpha', () => {
  it('multiplies the existing alpha', () => {
    expect(scaleAlpha('rgba(10, 20, 30, 0.5)', 0.5)).toBe('rgba(10, 20, 30, 0.25)');
  });

  it('clamps the factor into [0, 1]', () => {
    expect(scaleAlpha('rgba(10, 20, 30, 0.5)', 2)).toBe('rgba(10, 20, 30, 0.5)');
    expect(scaleAlpha('#FFFFFF', -1)).toBe('rgba(255, 255, 255, 0)');
  });
});
