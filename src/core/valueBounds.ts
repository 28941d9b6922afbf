export interface ValueBounds {
  readonly min: number;
  readonly max: number;
  /** `max - min`; `0` for a degenerate range. */
  readonly range: number;
}

/**
 * Resolves the value range a chart maps onto its plot.
 *
 * - No explicit bound: `min = min(0, min(values))`, `max = max(values)`, so a zero
 *   baseline stays representable for positive data.
 * - Explicit bounds are widened to include every value.
 * - No values: `[0, 0]`.
 */
export function computeValueBounds(
  values: ReadonlyArray<number>,
  minValue: number | null,
  maxValue: number | null
): ValueBounds {
  if (values.length === 0) {
    return { min: 0, max: 0, range: 0 };
  }

  let lo = Number.POSITIVE_INFINITY;
  let hi = Number.NEGATIVE_INFINITY;
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }

  const min = minValue === null ? Math.min(0, lo) : Math.min(minValue, lo);
  const max = maxValue === null ? hi : Math.max(maxValue, hi);
  return { min, max, range: max - min };
}

/**
 * Position of `value` within the bounds, `0` at `min` and `1` at `max`.
 * A degenerate range maps every value to the midpoint.
 */
export function normalizeValue(value: number, bounds: ValueBounds): number {
  if (!(bounds.range > 0)) return 0.5;
  if (Number.isFinite(bounds.range)) return (value - bounds.min) / bounds.range;
  // `max - min` overflowed; halved operands stay finite.
  const half = bounds.max / 2 - bounds.min / 2;
  return (value / 2 - bounds.min / 2) / half;
}
