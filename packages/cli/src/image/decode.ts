import sharp from 'sharp';
import {
  DecodeError,
  isChannelCount,
  toGrayImage,
  type DecodedImage,
  type Raster,
} from '@fiducial-bench/core';

/**
 * Decode any format sharp reads into an interleaved raster (alpha dropped)
 * plus its 8-bit grayscale conversion.
 */
export async function decodeImage(path: string): Promise<DecodedImage> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(path)
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new DecodeError({
      message: `Error loading ${path}`,
      context: { path },
      cause: error,
    });
  }

  const { data, info } = decoded;
  if (!isChannelCount(info.channels)) {
    throw new DecodeError({
      message: `Error loading ${path}`,
      context: { path, value: info.channels },
      cause: new Error(`unsupported channel count ${info.channels}`),
    });
  }

  const original: Raster = {
    width: info.width,
    height: info.height,
    channels: info.channels,
    data: new Uint8Array(data),
  };
  return { original, gray: toGrayImage(original) };
}
