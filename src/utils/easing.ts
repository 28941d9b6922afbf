import type { AnimationConfig } from '../config/types';

export type EasingFunction = (t: number) => number;

export type EasingName = NonNullable<AnimationConfig['easing']>;

export const clamp01 = (t: number): number => {
  if (Number.isNaN(t)) return 0;
  if (t <= 0) return 0;
  if (t >= 1) return 1;
  return t;
};

const cubicIn: EasingFunction = (x) => x * x * x;

/** Mirrors an ease-in curve so it decelerates into 1. */
const easeOut =
  (easeIn: EasingFunction): EasingFunction =>
  (x) =>
    1 - easeIn(1 - x);

/** Ease-in over the first half, mirrored ease-out over the second. */
const easeInOut =
  (easeIn: EasingFunction): EasingFunction =>
  (x) =>
    x < 0.5 ? easeIn(2 * x) / 2 : 1 - easeIn(2 - 2 * x) / 2;

// Four parabolic arcs, each landing on 1 (Penner's bounce).
const BOUNCE_SCALE = 7.5625;
const BOUNCE_ARCS: ReadonlyArray<{ readonly until: number; readonly center: number; readonly floor: number }> = [
  { until: 1 / 2.75, center: 0, floor: 0 },
  { until: 2 / 2.75, center: 1.5 / 2.75, floor: 0.75 },
  { until: 2.5 / 2.75, center: 2.25 / 2.75, floor: 0.9375 },
  { until: Number.POSITIVE_INFINITY, center: 2.625 / 2.75, floor: 0.984375 },
];

const bounceOut: EasingFunction = (x) => {
  const arc = BOUNCE_ARCS.find((a) => x < a.until) ?? BOUNCE_ARCS[BOUNCE_ARCS.length - 1];
  if (!arc) return x;
  const d = x - arc.center;
  return BOUNCE_SCALE * d * d + arc.floor;
};

/** Clamps the input so every easing is defined on all numbers. */
const clamped =
  (ease: EasingFunction): EasingFunction =>
  (t) =>
    ease(clamp01(t));

export const easeLinear: EasingFunction = clamped((x) => x);
export const easeCubicOut: EasingFunction = clamped(easeOut(cubicIn));
export const easeCubicInOut: EasingFunction = clamped(easeInOut(cubicIn));
export const easeBounceOut: EasingFunction = clamped(bounceOut);

const easings = {
  linear: easeLinear,
  cubicOut: easeCubicOut,
  cubicInOut: easeCubicInOut,
  bounceOut: easeBounceOut,
} as const satisfies Readonly<Record<EasingName, EasingFunction>>;

export const isEasingName = (value: unknown): value is EasingName =>
  typeof value === 'string' && Object.hasOwn(easings, value);

export function getEasing(name: EasingName | null | undefined): EasingFunction {
  return isEasingName(name) ? easings[name] : easeLinear;
}

/**
 * Maps raw host progress to the progress used for drawing.
 * The result is always in [0, 1] (bounce overshoot is clamped).
 */
export function easeProgress(progress: number, name: EasingName | null | undefined): number {
  return clamp01(getEasing(name)(progress));
}
