import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';

import sharp from 'sharp';
import {
  baseName,
  type DisplayRequest,
  type ImageDisplay,
  type Raster,
} from '@fiducial-bench/core';

export const DEFAULT_OVERLAY_DIR = 'fiducial-overlays';

export interface FileDisplayOptions {
  dir?: string;
  /** Wait for a line on `input` after each overlay */
  pause?: boolean;
  input?: Readable;
  output?: Writable;
  /** Called with the written file path */
  onWrite?: (path: string) => void;
}

export function overlayFileName(request: DisplayRequest): string {
  return `${baseName(request.path)}.i${request.iteration}.overlay.png`;
}

export async function writePng(raster: Raster, path: string): Promise<void> {
  await sharp(Buffer.from(raster.data), {
    raw: {
      width: raster.width,
      height: raster.height,
      channels: raster.channels,
    },
  })
    .png()
    .toFile(path);
}

/**
 * Display that persists each blended overlay as a PNG. With `pause`, the
 * next image is not processed until a line is read from `input`.
 */
export function createFileDisplay(
  options: FileDisplayOptions = {}
): ImageDisplay {
  const dir = options.dir ?? DEFAULT_OVERLAY_DIR;
  let ready: Promise<string | undefined> | null = null;

  return async (request) => {
    ready ??= mkdir(dir, { recursive: true }).catch((error: unknown) => {
      // Retry on the next overlay
      ready = null;
      throw error;
    });
    await ready;

    const target = join(dir, overlayFileName(request));
    await writePng(request.blended, target);
    options.onWrite?.(target);

    if (options.pause) {
      const rl = createInterface({
        input: options.input ?? process.stdin,
        output: options.output ?? process.stderr,
      });
      try {
        await rl.question(`${target}: press Enter to continue `);
      } finally {
        rl.close();
      }
    }
  };
}
