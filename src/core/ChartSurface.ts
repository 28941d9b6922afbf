/**
 * Drawing surface contract.
 *
 * The subset of the Canvas 2D API that chart renderers call. A browser
 * `CanvasRenderingContext2D` (or `OffscreenCanvasRenderingContext2D`) satisfies
 * it structurally, as does any server-side canvas implementing the same API.
 *
 * Coordinates are surface-local pixels with the origin at the top-left and +y down.
 */

export interface SurfaceGradient {
  addColorStop(offset: number, color: string): void;
}

export interface SurfacePattern {
  setTransform?(transform?: unknown): void;
}

export type SurfacePaint = string | SurfaceGradient | SurfacePattern;

export interface SurfaceTextMetrics {
  readonly width: number;
  readonly actualBoundingBoxAscent?: number;
  readonly actualBoundingBoxDescent?: number;
}

export interface ChartSurface {
  fillStyle: SurfacePaint;
  strokeStyle: SurfacePaint;
  lineWidth: number;
  lineCap: string;
  lineJoin: string;
  font: string;
  textAlign: string;
  textBaseline: string;
  globalCompositeOperation: string;

  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  rotate(angle: number): void;

  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  bezierCurveTo(cp1x: number, cp1y: number, cp2x: number, cp2y: number, x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number, counterclockwise?: boolean): void;
  rect(x: number, y: number, w: number, h: number): void;
  fill(): void;
  stroke(): void;

  fillRect(x: number, y: number, w: number, h: number): void;
  clearRect(x: number, y: number, w: number, h: number): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): SurfaceTextMetrics;

  createLinearGradient(x0: number, y0: number, x1: number, y1: number): SurfaceGradient;
}

/**
 * Runs `draw` with the surface state saved, restoring it on every exit path.
 *
 * Paint state (styles, gradients, composite mode, transforms, font) set inside
 * `draw` never leaks into the next drawing step.
 */
export function withSurfaceState<T>(surface: ChartSurface, draw: (surface: ChartSurface) => T): T {
  surface.save();
  try {
    return draw(surface);
  } finally {
    surface.restore();
  }
}

/** Builds the CSS font shorthand used for every chart label. */
export function toCssFont(textSize: number, typeface: string): string {
  return `${textSize}px ${typeface}`;
}
