import { HarnessError } from '../types/errors.js';

/**
 * Decoded 8-bit grayscale image handed to the detector. Rows may be padded:
 * pixel (x, y) lives at `data[y * stride + x]`.
 */
export interface InputImage {
  readonly width: number;
  readonly height: number;
  readonly stride: number;
  readonly data: Uint8Array;
}

export type ChannelCount = 1 | 2 | 3 | 4;

/** Interleaved 8-bit raster, tightly packed. */
export interface Raster {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  readonly data: Uint8Array;
}

export interface RasterLayout {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
}

export interface DecodedImage {
  readonly gray: InputImage;
  readonly original: Raster;
}

export function createRaster(layout: RasterLayout): Raster {
  assertLayout(layout);
  return {
    width: layout.width,
    height: layout.height,
    channels: layout.channels,
    data: new Uint8Array(layout.width * layout.height * layout.channels),
  };
}

export function createInputImage(
  width: number,
  height: number,
  data?: Uint8Array
): InputImage {
  const buffer = data ?? new Uint8Array(width * height);
  if (buffer.length < width * height) {
    throw new HarnessError({
      message: `Image buffer holds ${buffer.length} bytes, expected ${width * height}`,
      context: { width, height },
    });
  }
  return { width, height, stride: width, data: buffer };
}

export function isChannelCount(value: number): value is ChannelCount {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

export function sameLayout(a: RasterLayout, b: RasterLayout): boolean {
  return (
    a.width === b.width && a.height === b.height && a.channels === b.channels
  );
}

/**
 * Luma conversion (BT.601 weights). Two-channel rasters are gray + alpha;
 * the alpha channel is ignored.
 */
export function toGrayImage(raster: Raster): InputImage {
  const { width, height, channels, data } = raster;
  const gray = new Uint8Array(width * height);
  for (let i = 0; i < width * height; i++) {
    const base = i * channels;
    if (channels < 3) {
      gray[i] = data[base] ?? 0;
      continue;
    }
    const r = data[base] ?? 0;
    const g = data[base + 1] ?? 0;
    const b = data[base + 2] ?? 0;
    gray[i] = Math.round(0.299 * r + 0.587 * g + 0.114 * b);
  }
  return { width, height, stride: width, data: gray };
}

function assertLayout(layout: RasterLayout): void {
  if (
    !Number.isInteger(layout.width) ||
    !Number.isInteger(layout.height) ||
    layout.width <= 0 ||
    layout.height <= 0
  ) {
    throw new HarnessError({
      message: `Invalid raster size ${layout.width}x${layout.height}`,
      context: { width: layout.width, height: layout.height },
    });
  }
}
