import { describe, it, expect } from 'vitest';
import {
  clamp01,
  easeBounceOut,
  easeCubicInOut,
  easeCubicOut,
  easeLinear,
  easeProgress,
  getEasing,
  isEasingName,
} from '../easing';

describe('easing', () => {
  it('clamps into [0, 1] and maps NaN to 0', () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(1.5)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
    expect(clamp01(0.25)).toBe(0.25);
  });

  it('keeps the endpoints fixed', () => {
    for (const ease of [easeLinear, easeCubicOut, easeCubicInOut, easeBounceOut]) {
      expect(ease(0)).toBeCloseTo(0, 10);
      expect(ease(1)).toBeCloseTo(1, 10);
    }
  });

  it('computes midpoint values', () => {
    expect(easeLinear(0.3)).toBe(0.3);
    expect(easeCubicOut(0.5)).toBe(0.875);
    expect(easeCubicInOut(0.5)).toBe(0.5);
    expect(easeCubicInOut(0.25)).toBe(0.0625);
    expect(easeCubicInOut(0.75)).toBe(0.9375);
    expect(easeBounceOut(0.5)).toBeCloseTo(0.765625, 10);
  });

  it('recognizes only the registered easing names', () => {
    expect(isEasingName('bounceOut')).toBe(true);
    expect(isEasingName('toString')).toBe(false);
    expect(isEasingName('wobble')).toBe(false);
    expect(isEasingName(3)).toBe(false);
    expect(isEasingName(undefined)).toBe(false);
  });

  it('resolves names and falls back to linear', () => {
    expect(getEasing('cubicOut')).toBe(easeCubicOut);
    expect(getEasing(undefined)).toBe(easeLinear);
    expect(getEasing(null)).toBe(easeLinear);
  });

  it('eases raw progress after clamping it', () => {
    expect(easeProgress(2, 'cubicOut')).toBe(1);
    expect(easeProgress(-1, 'bounceOut')).toBe(0);
    expect(easeProgress(0.5, 'cubicOut')).toBe(0.875);
  });
});
