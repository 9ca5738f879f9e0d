/**
 * Run configuration for the benchmark harness
 *
 * Every field is optional on input with the detector's customary defaults.
 * `resolveRunConfiguration` merges, validates and freezes the result; the
 * frozen configuration is shared read-only for the whole run.
 */

import { ConfigurationError } from './errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { CameraParams } from '../pose/tag-pose.js';

export type ReportMode = 'verbose' | 'quiet' | 'benchmark';

export interface RunOptions {
  /** Detector family name (default: 'tag36h11') */
  family?: string;
  /** Family border width in bits (default: 1) */
  border?: number;
  /** Repeat the whole input list this many times (default: 1) */
  iterations?: number;
  /** Thread hint passed to the detector (default: 4) */
  threads?: number;
  /** Downsample factor applied before quad detection (default: 1.0) */
  decimate?: number;
  /** Gaussian sigma; negative values sharpen (default: 0.0) */
  blur?: number;
  /** Spend more time aligning tag edges (default: true) */
  refineEdges?: boolean;
  /** Spend more time decoding tags (default: false) */
  refineDecode?: boolean;
  /** Spend more time computing tag pose (default: false) */
  refinePose?: boolean;
  /** Use contour-based quad detection (default: false) */
  quadContours?: boolean;
  /** Detector debug output (default: false) */
  debug?: boolean;
  /** Reduce report output to one line per image (default: false) */
  quiet?: boolean;
  /** Throughput mode; implies no display (default: false) */
  benchmark?: boolean;
  /** Render detection overlays (default: true) */
  display?: boolean;
  /** Number of Hamming histogram buckets (default: 10) */
  hammingBins?: number;
  /** Camera intrinsics; enables pose estimation (default: null) */
  cameraParams?: CameraParams | null;
  /** Physical tag edge length, in the pose's unit (default: 1) */
  tagSize?: number;
}

export type RunConfiguration = Readonly<Required<RunOptions>> & {
  readonly reportMode: ReportMode;
};

export type RunOptionKey = keyof RunOptions;

export const DEFAULT_RUN_OPTIONS: Readonly<Required<RunOptions>> =
  Object.freeze({
    family: 'tag36h11',
    border: 1,
    iterations: 1,
    threads: 4,
    decimate: 1.0,
    blur: 0.0,
    refineEdges: true,
    refineDecode: false,
    refinePose: false,
    quadContours: false,
    debug: false,
    quiet: false,
    benchmark: false,
    display: true,
    hammingBins: 10,
    cameraParams: null,
    tagSize: 1,
  });

const RUN_OPTION_KEYS: readonly RunOptionKey[] = [
  'family',
  'border',
  'iterations',
  'threads',
  'decimate',
  'blur',
  'refineEdges',
  'refineDecode',
  'refinePose',
  'quadContours',
  'debug',
  'quiet',
  'benchmark',
  'display',
  'hammingBins',
  'cameraParams',
  'tagSize',
];

/**
 * Merge user options over the defaults, validate and freeze.
 */
export function resolveRunConfiguration(
  options: RunOptions = {}
): RunConfiguration {
  const merged: Required<RunOptions> = { ...DEFAULT_RUN_OPTIONS };
  for (const key of RUN_OPTION_KEYS) {
    const value = options[key];
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  validateRunOptions(merged);

  // Benchmark mode takes precedence over quiet and never opens a display
  const reportMode: ReportMode = merged.benchmark
    ? 'benchmark'
    : merged.quiet
      ? 'quiet'
      : 'verbose';

  return Object.freeze({
    ...merged,
    display: merged.benchmark ? false : merged.display,
    cameraParams: merged.cameraParams
      ? Object.freeze({ ...merged.cameraParams })
      : null,
    reportMode,
  });
}

function validateRunOptions(options: Required<RunOptions>): void {
  if (typeof options.family !== 'string' || options.family.trim() === '') {
    throw invalid('family', options.family, 'a non-empty family name');
  }
  requirePositiveInteger('iterations', options.iterations);
  requirePositiveInteger('threads', options.threads);
  requirePositiveInteger('hammingBins', options.hammingBins);
  if (!Number.isInteger(options.border) || options.border < 0) {
    throw invalid('border', options.border, 'a non-negative integer');
  }
  if (!Number.isFinite(options.decimate) || options.decimate < 1) {
    throw invalid('decimate', options.decimate, 'a number >= 1');
  }
  if (!Number.isFinite(options.blur)) {
    throw invalid('blur', options.blur, 'a finite number');
  }
  if (!Number.isFinite(options.tagSize) || options.tagSize <= 0) {
    throw invalid('tagSize', options.tagSize, 'a positive number');
  }
  const camera = options.cameraParams;
  if (
    camera !== null &&
    !(
      camera.fx > 0 &&
      camera.fy > 0 &&
      Number.isFinite(camera.fx) &&
      Number.isFinite(camera.fy) &&
      Number.isFinite(camera.cx) &&
      Number.isFinite(camera.cy)
    )
  ) {
    throw invalid(
      'cameraParams',
      `${camera.fx},${camera.fy},${camera.cx},${camera.cy}`,
      'positive focal lengths and a finite principal point'
    );
  }
}

function requirePositiveInteger(option: RunOptionKey, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(option, value, 'a positive integer');
  }
}

function invalid(
  option: RunOptionKey,
  value: unknown,
  expected: string
): ConfigurationError {
  return new ConfigurationError({
    message: `Invalid ${option} value "${String(value)}". Expected ${expected}.`,
    errorCode: ErrorCode.INVALID_OPTION,
    context: { option, value },
  });
}
