import { describe, it, expect } from 'vitest';
import { resolveEntries } from '../../config/OptionResolver';
import { defaultPalette } from '../../config/defaults';
import type { ChartEntry } from '../../config/types';
import {
  calculateFooterHeaderHeight,
  calculateItemSize,
  calculateYOrigin,
  computeCartesianLayout,
  measureLabels,
  type CartesianLayoutInput,
} from '../layout';
import { createRecordingSurface } from '../../__tests__/helpers/createRecordingSurface';

const entriesOf = (entries: ReadonlyArray<ChartEntry>) => resolveEntries(entries, defaultPalette, '#808080') ?? [];

const inputFor = (
  entries: ReadonlyArray<ChartEntry>,
  overrides: Partial<CartesianLayoutInput> = {}
): CartesianLayoutInput => ({
  entries: entriesOf(entries),
  minValue: null,
  maxValue: null,
  margin: 0,
  labelStyle: { textSize: 16, typeface: 'sans-serif' },
  labelOrientation: 'horizontal',
  valueLabelOrientation: 'horizontal',
  ...overrides,
});

describe('computeCartesianLayout', () => {
  it('places two unlabeled entries in equal slots with zero margin', () => {
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor([{ value: 0 }, { value: 5000 }]),
      200,
      100
    );

    expect(layout.itemSize).toEqual({ width: 100, height: 100 });
    expect(layout.points).toEqual([
      { x: 50, y: 100 },
      { x: 150, y: 0 },
    ]);
    expect(layout.origin).toBe(100);
    expect(layout.headerHeight).toBe(0);
    expect(layout.footerHeight).toBe(0);
  });

  it('puts the bound values on the origin and the plot top', () => {
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor(
        [
          { value: 1000, label: 'Jan' },
          { value: 17000, label: 'Feb' },
        ],
        { minValue: 1000, maxValue: 17000 }
      ),
      200,
      100
    );

    // 16px footer, zero margin: the plot spans rows 0..84.
    expect(layout.origin).toBe(84);
    expect(layout.points).toEqual([
      { x: 50, y: 84 },
      { x: 150, y: 0 },
    ]);
  });

  it('centers a value whose min and max bounds coincide', () => {
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor([{ value: 5000 }], { minValue: 5000, maxValue: 5000 }),
      100,
      100
    );

    expect(layout.points).toEqual([{ x: 50, y: 50 }]);
    expect(layout.origin).toBe(50);
  });

  it('keeps points finite for values at the ends of the number range', () => {
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor([{ value: -1e308 }, { value: 1e308 }]),
      200,
      100
    );

    expect(layout.points).toEqual([
      { x: 50, y: 100 },
      { x: 150, y: 0 },
    ]);
    expect(layout.origin).toBe(50);
  });

  it('returns one finite point per entry, left to right', () => {
    const values = [1000, 17000, 4000, 9000, 12000];
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor(values.map((value) => ({ value })), { margin: 20 }),
      640,
      320
    );

    expect(layout.points).toHaveLength(values.length);
    for (const point of layout.points) {
      expect(Number.isFinite(point.x)).toBe(true);
      expect(Number.isFinite(point.y)).toBe(true);
    }
    for (let i = 1; i < layout.points.length; i++) {
      expect(layout.points[i]?.x ?? 0).toBeGreaterThan(layout.points[i - 1]?.x ?? 0);
    }
  });

  it('puts larger values higher on the plot', () => {
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor([{ value: 100 }, { value: 300 }, { value: 200 }], { margin: 10 }),
      300,
      200
    );
    const [low, high, mid] = layout.points.map((p) => p.y);

    expect(high).toBeLessThan(mid ?? 0);
    expect(mid).toBeLessThan(low ?? 0);
  });

  it('reserves a footer for labels and a header for value labels', () => {
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor(
        [
          { value: 10, label: 'Jan', valueLabel: '10' },
          { value: 20, label: 'Feb', valueLabel: '20' },
        ],
        { margin: 20 }
      ),
      300,
      200
    );

    // Text height falls back to the text size; each band adds one margin.
    expect(layout.footerHeight).toBe(36);
    expect(layout.headerHeight).toBe(36);
    expect(layout.plotTop).toBe(56);
    expect(layout.itemSize.height).toBe(200 - 40 - 72);
  });

  it('sizes vertical label bands by the widest label', () => {
    const layout = computeCartesianLayout(
      createRecordingSurface(),
      inputFor([{ value: 10, label: 'March' }, { value: 20, label: 'May' }], {
        margin: 20,
        labelOrientation: 'vertical',
      }),
      300,
      200
    );

    // 'March' measures 5 * 16 * 0.5 = 40 pixels.
    expect(layout.footerHeight).toBe(60);
  });
});

describe('calculateItemSize', () => {
  it('splits the width into slots separated by margins', () => {
    expect(calculateItemSize(3, 10, 340, 200, 30, 0)).toEqual({ width: 100, height: 150 });
  });

  it('clamps sizes that the margins exceed', () => {
    expect(calculateItemSize(4, 50, 100, 50, 20, 20)).toEqual({ width: 0, height: 0 });
  });

  it('returns a zero width without entries', () => {
    expect(calculateItemSize(0, 10, 300, 100, 0, 0).width).toBe(0);
  });
});

describe('calculateYOrigin', () => {
  it('sits at the plot bottom for positive data', () => {
    expect(calculateYOrigin({ min: 0, max: 100, range: 100 }, 200, 10)).toBe(210);
  });

  it('sits at the zero row for mixed data', () => {
    expect(calculateYOrigin({ min: -50, max: 50, range: 100 }, 200, 10)).toBe(110);
  });

  it('sits at the plot top for all-negative data', () => {
    expect(calculateYOrigin({ min: -10, max: -5, range: 5 }, 200, 10)).toBe(10);
  });

  it('clamps to the lower bound when zero is below it', () => {
    expect(calculateYOrigin({ min: 20, max: 120, range: 100 }, 100, 0)).toBe(100);
  });
});

describe('calculateFooterHeaderHeight', () => {
  it('is zero when every label is empty', () => {
    const sizes = [
      { width: 0, height: 0 },
      { width: 0, height: 0 },
    ];
    expect(calculateFooterHeaderHeight(sizes, 'horizontal', [null, ''], 20)).toBe(0);
  });

  it('uses the tallest label plus one margin', () => {
    const sizes = [
      { width: 30, height: 12 },
      { width: 50, height: 18 },
    ];
    expect(calculateFooterHeaderHeight(sizes, 'horizontal', ['a', 'b'], 5)).toBe(23);
    expect(calculateFooterHeaderHeight(sizes, 'vertical', ['a', 'b'], 5)).toBe(55);
  });
});

describe('measureLabels', () => {
  it('measures with the chart font and restores the surface state', () => {
    const surface = createRecordingSurface();
    const sizes = measureLabels(surface, ['Jan', null, ''], { textSize: 20, typeface: 'serif' });

    expect(sizes).toEqual([
      { width: 30, height: 20 },
      { width: 0, height: 0 },
      { width: 0, height: 0 },
    ]);
    expect(surface.font).toBe('10px sans-serif');
    expect(surface.depth).toBe(0);
  });
});
