/**
 * CSS color helpers.
 *
 * Colors are only parsed to rescale their alpha; anything unparsable falls back
 * to opaque black rather than failing the draw.
 */

/** `r`, `g`, `b` in 0..255, `a` in 0..1. */
export type Rgba = readonly [r: number, g: number, b: number, a: number];

const OPAQUE_BLACK: Rgba = [0, 0, 0, 1];

const NAMED_COLORS: Readonly<Record<string, Rgba>> = {
  transparent: [0, 0, 0, 0],
  black: [0, 0, 0, 1],
  white: [255, 255, 255, 1],
  gray: [128, 128, 128, 1],
  grey: [128, 128, 128, 1],
  red: [255, 0, 0, 1],
  green: [0, 128, 0, 1],
  blue: [0, 0, 255, 1],
};

const clamp = (v: number, lo: number, hi: number): number => Math.min(hi, Math.max(lo, v));

const parseHex = (hex: string): Rgba | null => {
  if (!/^[0-9a-f]+$/i.test(hex)) return null;

  if (hex.length === 3 || hex.length === 4) {
    const digits = Array.from(hex, (c) => parseInt(c + c, 16));
    const [r = 0, g = 0, b = 0, a = 255] = digits;
    return [r, g, b, a / 255];
  }

  if (hex.length === 6 || hex.length === 8) {
    const digits: number[] = [];
    for (let i = 0; i < hex.length; i += 2) {
      digits.push(parseInt(hex.slice(i, i + 2), 16));
    }
    const [r = 0, g = 0, b = 0, a = 255] = digits;
    return [r, g, b, a / 255];
  }

  return null;
};

const parseFunctional = (input: string): Rgba | null => {
  const match = /^rgba?\(([^)]*)\)$/i.exec(input);
  if (!match) return null;

  const parts = (match[1] ?? '')
    .split(/[\s,/]+/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  if (parts.length !== 3 && parts.length !== 4) return null;

  const channels = parts.slice(0, 3).map((p) => (p.endsWith('%') ? (parseFloat(p) / 100) * 255 : parseFloat(p)));
  const alphaRaw = parts[3];
  const alpha =
    alphaRaw === undefined ? 1 : alphaRaw.endsWith('%') ? parseFloat(alphaRaw) / 100 : parseFloat(alphaRaw);

  if (channels.some((c) => !Number.isFinite(c)) || !Number.isFinite(alpha)) return null;
  const [r = 0, g = 0, b = 0] = channels;
  return [clamp(r, 0, 255), clamp(g, 0, 255), clamp(b, 0, 255), clamp(alpha, 0, 1)];
};

/**
 * Parses a CSS color string. Returns `null` for unsupported input.
 */
export function parseCssColorToRgba(color: string): Rgba | null {
  const input = color.trim().toLowerCase();
  if (input.length === 0) return null;

  if (input.startsWith('#')) return parseHex(input.slice(1));

  const named = NAMED_COLORS[input];
  if (named) return named;

  return parseFunctional(input);
}

const roundAlpha = (a: number): number => Math.round(a * 10000) / 10000;

export function formatRgba([r, g, b, a]: Rgba): string {
  return `rgba(${Math.round(r)}, ${Math.round(g)}, ${Math.round(b)}, ${roundAlpha(a)})`;
}

/**
 * Replaces the color's alpha with `alpha` on the 0..255 scale used by chart options.
 */
export function withAlpha(color: string, alpha: number): string {
  const [r, g, b] = parseCssColorToRgba(color) ?? OPAQUE_BLACK;
  const a = Number.isFinite(alpha) ? clamp(alpha, 0, 255) / 255 : 0;
  return formatRgba([r, g, b, a]);
}

/**
 * Multiplies the color's own alpha by `factor` (clamped to [0, 1]).
 */
export function scaleAlpha(color: string, factor: number): string {
  const [r, g, b, a] = parseCssColorToRgba(color) ?? OPAQUE_BLACK;
  const f = Number.isFinite(factor) ? clamp(factor, 0, 1) : 0;
  return formatRgba([r, g, b, a * f]);
}
