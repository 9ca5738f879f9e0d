import {
  ConfigurationError,
  ErrorCode,
  type CameraParams,
  type RunOptions,
} from '@fiducial-bench/core';
import { isReportFormat, type ReportFormat } from '@fiducial-bench/reporter';

/**
 * CLI options interface matching Commander.js option structure. Numeric
 * flags arrive as strings and are converted by `parseRunFlags`.
 */
export interface CliOptions {
  family?: string;
  border?: string;
  iters?: string;
  threads?: string;
  decimate?: string;
  blur?: string;
  refineEdges?: boolean;
  refineDecode?: boolean;
  refinePose?: boolean;
  contours?: boolean;
  quiet?: boolean;
  benchmark?: boolean;
  display?: boolean;
  debug?: boolean;
  hammingBins?: string;
  cameraParams?: string;
  tagSize?: string;
  profile?: string;
  config?: string;
  overlayDir?: string;
  pause?: boolean;
  report?: string;
  reportFormat?: string;
}

export type RunFlag =
  | 'family'
  | 'border'
  | 'iters'
  | 'threads'
  | 'decimate'
  | 'blur'
  | 'refineEdges'
  | 'refineDecode'
  | 'refinePose'
  | 'contours'
  | 'quiet'
  | 'benchmark'
  | 'display'
  | 'debug'
  | 'hammingBins'
  | 'cameraParams'
  | 'tagSize';

const FLAG_NAMES: Record<RunFlag, string> = {
  family: '--family',
  border: '--border',
  iters: '--iters',
  threads: '--threads',
  decimate: '--decimate',
  blur: '--blur',
  refineEdges: '--refine-edges',
  refineDecode: '--refine-decode',
  refinePose: '--refine-pose',
  contours: '--contours',
  quiet: '--quiet',
  benchmark: '--benchmark',
  display: '--display',
  debug: '--debug',
  hammingBins: '--hamming-bins',
  cameraParams: '--camera-params',
  tagSize: '--tag-size',
};

function invalidFlag(
  flag: string,
  value: unknown,
  expected: string
): ConfigurationError {
  return new ConfigurationError({
    message: `Invalid ${flag} value "${String(value)}". Expected ${expected}.`,
    errorCode: ErrorCode.INVALID_OPTION,
    context: { option: flag, value },
  });
}

export function parseIntegerFlag(
  flag: string,
  raw: string,
  min: number
): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(value) || value < min) {
    throw invalidFlag(
      flag,
      raw,
      min > 0 ? 'a positive integer' : 'a non-negative integer'
    );
  }
  return value;
}

export function parseNumberFlag(
  flag: string,
  raw: string,
  min?: number
): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw invalidFlag(flag, raw, 'a number');
  }
  if (min !== undefined && value < min) {
    throw invalidFlag(flag, raw, `a number >= ${min}`);
  }
  return value;
}

/** `fx,fy,cx,cy` in pixels, optionally wrapped in parentheses */
export function parseCameraParams(flag: string, raw: string): CameraParams {
  const parts = raw
    .trim()
    .replace(/^\((.*)\)$/, '$1')
    .split(',')
    .map((part) => part.trim());
  const values = parts.map(Number);
  const [fx, fy, cx, cy] = values;
  if (
    parts.length !== 4 ||
    parts.some((part) => part === '') ||
    fx === undefined ||
    fy === undefined ||
    cx === undefined ||
    cy === undefined ||
    !values.every(Number.isFinite) ||
    fx <= 0 ||
    fy <= 0
  ) {
    throw invalidFlag(
      flag,
      raw,
      'four numbers fx,fy,cx,cy with positive focal lengths'
    );
  }
  return { fx, fy, cx, cy };
}

/**
 * Convert the explicitly given run flags into RunOptions. Flags for which
 * `isExplicit` is false (Commander defaults) are left out so the config
 * file and profile layers can supply them.
 */
export function parseRunFlags(
  options: CliOptions,
  isExplicit: (flag: RunFlag) => boolean = () => true
): RunOptions {
  const run: RunOptions = {};
  const given = (flag: RunFlag): boolean =>
    options[flag] !== undefined && isExplicit(flag);

  if (given('family') && options.family !== undefined) {
    run.family = options.family;
  }
  if (given('border') && options.border !== undefined) {
    run.border = parseIntegerFlag(FLAG_NAMES.border, options.border, 0);
  }
  if (given('iters') && options.iters !== undefined) {
    run.iterations = parseIntegerFlag(FLAG_NAMES.iters, options.iters, 1);
  }
  if (given('threads') && options.threads !== undefined) {
    run.threads = parseIntegerFlag(FLAG_NAMES.threads, options.threads, 1);
  }
  if (given('decimate') && options.decimate !== undefined) {
    run.decimate = parseNumberFlag(FLAG_NAMES.decimate, options.decimate, 1);
  }
  if (given('blur') && options.blur !== undefined) {
    run.blur = parseNumberFlag(FLAG_NAMES.blur, options.blur);
  }
  if (given('hammingBins') && options.hammingBins !== undefined) {
    run.hammingBins = parseIntegerFlag(
      FLAG_NAMES.hammingBins,
      options.hammingBins,
      1
    );
  }
  if (given('cameraParams') && options.cameraParams !== undefined) {
    run.cameraParams = parseCameraParams(
      FLAG_NAMES.cameraParams,
      options.cameraParams
    );
  }
  if (given('tagSize') && options.tagSize !== undefined) {
    const size = parseNumberFlag(FLAG_NAMES.tagSize, options.tagSize);
    if (size <= 0) {
      throw invalidFlag(
        FLAG_NAMES.tagSize,
        options.tagSize,
        'a positive number'
      );
    }
    run.tagSize = size;
  }
  if (given('refineEdges')) run.refineEdges = options.refineEdges;
  if (given('refineDecode')) run.refineDecode = options.refineDecode;
  if (given('refinePose')) run.refinePose = options.refinePose;
  if (given('contours')) run.quadContours = options.contours;
  if (given('quiet')) run.quiet = options.quiet;
  if (given('benchmark')) run.benchmark = options.benchmark;
  if (given('display')) run.display = options.display;
  if (given('debug')) run.debug = options.debug;

  return run;
}

/**
 * Resolve the report format flag into a known format or throw.
 */
export function resolveReportFormat(value: unknown): ReportFormat {
  if (value === undefined || value === null || value === '') {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (isReportFormat(raw)) {
    return raw;
  }
  throw invalidFlag('--report-format', value, 'one of: json, markdown');
}
