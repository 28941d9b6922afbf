import type { LabelMode } from '../config/types';
import type { ResolvedChartEntry } from '../config/OptionResolver';
import { toCssFont, withSurfaceState, type ChartSurface } from '../core/ChartSurface';

export interface CaptionStyle {
  readonly margin: number;
  readonly textSize: number;
  readonly typeface: string;
}

export interface CaptionColumns {
  readonly left: ReadonlyArray<ResolvedChartEntry>;
  readonly right: ReadonlyArray<ResolvedChartEntry>;
}

/**
 * `leftAndRight` puts the first half of the entries (rounded down) on the right
 * and the rest on the left.
 */
export function splitCaptionEntries(entries: ReadonlyArray<ResolvedChartEntry>, mode: LabelMode): CaptionColumns {
  switch (mode) {
    case 'none':
      return { left: [], right: [] };
    case 'rightOnly':
      return { left: [], right: entries };
    case 'leftAndRight': {
      const half = Math.floor(entries.length / 2);
      return { left: entries.slice(half), right: entries.slice(0, half) };
    }
  }
}

/**
 * Top row of each caption swatch: spread evenly between `2 * margin` from the
 * top and from the bottom; a single caption is centered.
 */
export function computeCaptionRows(count: number, height: number, style: CaptionStyle): number[] {
  if (count <= 0) return [];

  const top = 2 * style.margin;
  const available = height - 2 * top;
  const free = available - style.textSize;
  if (count === 1) return [top + free / 2];

  const step = free / (count - 1);
  return Array.from({ length: count }, (_, i) => top + i * step);
}

function drawCaptionColumn(
  surface: ChartSurface,
  entries: ReadonlyArray<ResolvedChartEntry>,
  side: 'left' | 'right',
  width: number,
  height: number,
  style: CaptionStyle
): void {
  const size = style.textSize;
  const rows = computeCaptionRows(entries.length, height, style);
  const swatchX = side === 'left' ? style.margin : width - style.margin - size;
  const textX = side === 'left' ? swatchX + size + style.margin / 2 : swatchX - style.margin / 2;

  withSurfaceState(surface, (s) => {
    s.font = toCssFont(size, style.typeface);
    s.textAlign = side === 'left' ? 'left' : 'right';
    s.textBaseline = 'middle';

    entries.forEach((entry, i) => {
      const y = rows[i];
      if (y === undefined) return;

      s.fillStyle = entry.color;
      s.fillRect(swatchX, y, size, size);

      const centerY = y + size / 2;
      const lines: Array<{ readonly text: string; readonly color: string }> = [];
      if (entry.valueLabel) lines.push({ text: entry.valueLabel, color: entry.valueLabelColor });
      if (entry.label) lines.push({ text: entry.label, color: entry.textColor });

      const lineGap = size * 1.2;
      const firstLineY = centerY - ((lines.length - 1) * lineGap) / 2;
      lines.forEach((line, j) => {
        s.fillStyle = line.color;
        s.fillText(line.text, textX, firstLineY + j * lineGap);
      });
    });
  });
}

/**
 * Swatch, value label and label for each entry along the left and/or right edge.
 */
export function drawCaptions(
  surface: ChartSurface,
  entries: ReadonlyArray<ResolvedChartEntry>,
  mode: LabelMode,
  width: number,
  height: number,
  style: CaptionStyle
): void {
  const { left, right } = splitCaptionEntries(entries, mode);
  if (right.length > 0) drawCaptionColumn(surface, right, 'right', width, height, style);
  if (left.length > 0) drawCaptionColumn(surface, left, 'left', width, height, style);
}
