import sharp from 'sharp';
import { createInputImage, type InputImage } from '@fiducial-bench/core';

// sharp's accepted sigma ranges
const MIN_BLUR_SIGMA = 0.3;
const MAX_BLUR_SIGMA = 1000;
const MAX_SHARPEN_SIGMA = 10;

function grayPipeline(image: InputImage): sharp.Sharp {
  const { width, height } = image;
  const packed = Buffer.alloc(width * height);
  for (let y = 0; y < height; y++) {
    const row = y * image.stride;
    packed.set(image.data.subarray(row, row + width), y * width);
  }
  return sharp(packed, { raw: { width, height, channels: 1 } });
}

async function readGray(pipeline: sharp.Sharp): Promise<InputImage> {
  const { data, info } = await pipeline
    .raw()
    .toBuffer({ resolveWithObject: true });
  const gray = new Uint8Array(info.width * info.height);
  for (let i = 0; i < gray.length; i++) {
    gray[i] = data[i * info.channels] ?? 0;
  }
  return createInputImage(info.width, info.height, gray);
}

/**
 * Nearest-neighbour downscale by the integer part of `factor`. A factor
 * below 2, or one that would leave no pixels, returns the input.
 */
export async function decimate(
  image: InputImage,
  factor: number
): Promise<InputImage> {
  const step = Math.floor(factor);
  if (step < 2) return image;

  const width = Math.floor(image.width / step);
  const height = Math.floor(image.height / step);
  if (width === 0 || height === 0) return image;

  return readGray(
    grayPipeline(image).resize(width, height, {
      kernel: 'nearest',
      fit: 'fill',
    })
  );
}

/**
 * Gaussian blur for a positive sigma, sharpen for a negative one, identity
 * for zero. Sigmas are clamped into the range sharp takes.
 */
export async function blurOrSharpen(
  image: InputImage,
  sigma: number
): Promise<InputImage> {
  if (sigma > 0) {
    const clamped = Math.min(MAX_BLUR_SIGMA, Math.max(MIN_BLUR_SIGMA, sigma));
    return readGray(grayPipeline(image).blur(clamped));
  }
  if (sigma < 0) {
    const clamped = Math.min(MAX_SHARPEN_SIGMA, -sigma);
    return readGray(grayPipeline(image).sharpen({ sigma: clamped }));
  }
  return image;
}

/** Expand 8-bit gray to the RGBA layout of an ImageData */
export function toRgba(image: InputImage): Uint8ClampedArray {
  const rgba = new Uint8ClampedArray(image.width * image.height * 4);
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const value = image.data[y * image.stride + x] ?? 0;
      const base = (y * image.width + x) * 4;
      rgba[base] = value;
      rgba[base + 1] = value;
      rgba[base + 2] = value;
      rgba[base + 3] = 255;
    }
  }
  return rgba;
}
