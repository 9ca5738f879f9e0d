import type { RunConfiguration } from '../types/options.js';
import type { DetectorAdapter, DetectorOptions } from './types.js';

export function toDetectorOptions(config: RunConfiguration): DetectorOptions {
  return {
    border: config.border,
    threads: config.threads,
    decimate: config.decimate,
    blur: config.blur,
    refineEdges: config.refineEdges,
    refineDecode: config.refineDecode,
    refinePose: config.refinePose,
    quadContours: config.quadContours,
    debug: config.debug,
    camera: config.cameraParams,
    tagSize: config.tagSize,
  };
}

/**
 * Acquire a detector handle for the duration of `body`. The handle is
 * released on every exit path; a failing `configure` never reaches `body`.
 * When `body` fails, a failing `release` goes to `onReleaseError` and the
 * body's error is the one rethrown.
 */
export async function withDetector<Handle, T>(
  adapter: DetectorAdapter<Handle>,
  family: string,
  options: DetectorOptions,
  body: (handle: Handle) => Promise<T>,
  onReleaseError: (error: unknown) => void = () => {}
): Promise<T> {
  const handle = await adapter.configure(family, options);
  let result: T;
  try {
    result = await body(handle);
  } catch (error) {
    try {
      await adapter.release(handle);
    } catch (releaseError) {
      onReleaseError(releaseError);
    }
    throw error;
  }
  await adapter.release(handle);
  return result;
}
