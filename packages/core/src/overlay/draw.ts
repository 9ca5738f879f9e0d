import type { Point } from '../detector/types.js';
import type { ChannelCount, Raster } from '../image/raster.js';

export type Rgb = readonly [number, number, number];

/** Per-channel sample values for one pixel */
export type PixelValue = readonly number[];

// 3x5 block digits, '#' marks a lit cell
const DIGIT_GLYPHS: Record<string, readonly string[]> = {
  '0': ['###', '#.#', '#.#', '#.#', '###'],
  '1': ['.#.', '##.', '.#.', '.#.', '###'],
  '2': ['###', '..#', '###', '#..', '###'],
  '3': ['###', '..#', '###', '..#', '###'],
  '4': ['#.#', '#.#', '###', '..#', '..#'],
  '5': ['###', '#..', '###', '..#', '###'],
  '6': ['###', '#..', '###', '#.#', '###'],
  '7': ['###', '..#', '..#', '..#', '..#'],
  '8': ['###', '#.#', '###', '#.#', '###'],
  '9': ['###', '#.#', '###', '..#', '###'],
  '-': ['...', '...', '###', '...', '...'],
};

export const GLYPH_WIDTH = 3;
export const GLYPH_HEIGHT = 5;

export function pixelValue(
  channels: ChannelCount,
  rgb: Rgb,
  gray: number
): PixelValue {
  switch (channels) {
    case 1:
      return [gray];
    case 2:
      return [gray, 255];
    case 3:
      return rgb;
    case 4:
      return [...rgb, 255];
  }
}

export function setPixel(
  raster: Raster,
  x: number,
  y: number,
  value: PixelValue
): void {
  if (x < 0 || y < 0 || x >= raster.width || y >= raster.height) return;
  const base = (y * raster.width + x) * raster.channels;
  for (let c = 0; c < raster.channels; c++) {
    raster.data[base + c] = value[c] ?? 0;
  }
}

/** Bresenham line between rounded endpoints, clipped to the raster */
export function drawLine(
  raster: Raster,
  from: Point,
  to: Point,
  value: PixelValue
): void {
  let x0 = Math.round(from.x);
  let y0 = Math.round(from.y);
  const x1 = Math.round(to.x);
  const y1 = Math.round(to.y);
  const dx = Math.abs(x1 - x0);
  const dy = -Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx + dy;

  for (;;) {
    setPixel(raster, x0, y0, value);
    if (x0 === x1 && y0 === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) {
      err += dy;
      x0 += sx;
    }
    if (e2 <= dx) {
      err += dx;
      y0 += sy;
    }
  }
}

export function drawPolygon(
  raster: Raster,
  points: readonly Point[],
  value: PixelValue
): void {
  points.forEach((point, index) => {
    const next = points[(index + 1) % points.length];
    if (next) drawLine(raster, point, next, value);
  });
}

export function textWidth(text: string, scale: number): number {
  if (text.length === 0) return 0;
  return (text.length * (GLYPH_WIDTH + 1) - 1) * scale;
}

/**
 * Draw `text` with its block centred on `center`. Characters without a
 * glyph leave a blank cell.
 */
export function drawText(
  raster: Raster,
  text: string,
  center: Point,
  scale: number,
  value: PixelValue
): void {
  const left = Math.round(center.x - textWidth(text, scale) / 2);
  const top = Math.round(center.y - (GLYPH_HEIGHT * scale) / 2);

  [...text].forEach((char, charIndex) => {
    const glyph = DIGIT_GLYPHS[char];
    if (!glyph) return;
    const originX = left + charIndex * (GLYPH_WIDTH + 1) * scale;
    glyph.forEach((row, rowIndex) => {
      [...row].forEach((cell, colIndex) => {
        if (cell !== '#') return;
        for (let dy = 0; dy < scale; dy++) {
          for (let dx = 0; dx < scale; dx++) {
            setPixel(
              raster,
              originX + colIndex * scale + dx,
              top + rowIndex * scale + dy,
              value
            );
          }
        }
      });
    });
  });
}
