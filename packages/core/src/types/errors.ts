/**
 * Error hierarchy for fiducial-bench
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // input image path
  option?: string; // configuration field or CLI flag
  value?: unknown; // problematic value
  suggestion?: string;
  iteration?: number;
  // Allow extra keys for adapter-specific detail
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface HarnessErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Base error class for all harness errors
 */
export class HarnessError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: HarnessErrorParams) {
    const cause = toError(params.cause);
    super(params.message, { cause });
    this.name = this.constructor.name;
    this.errorCode = params.errorCode ?? ErrorCode.INTERNAL_ERROR;
    this.severity = params.severity ?? 'error';
    this.context = params.context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and reports
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Invalid run configuration or unknown detector family. Fatal: raised
 * before any image is processed.
 */
export class ConfigurationError extends HarnessError {
  constructor(params: HarnessErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get option(): string | undefined {
    return this.context?.option;
  }
}

/**
 * Unreadable or missing input image. The image is skipped.
 */
export class DecodeError extends HarnessError {
  constructor(
    params: HarnessErrorParams & { context: ErrorContext & { path: string } }
  ) {
    super({ ...params, errorCode: ErrorCode.DECODE_ERROR });
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

/**
 * A failure reported by the Detector Adapter for one image. Handled like a
 * DecodeError: the image is skipped, the run continues.
 */
export class DetectorError extends HarnessError {
  constructor(params: HarnessErrorParams) {
    super({ ...params, errorCode: ErrorCode.DETECTOR_ERROR });
  }
}

/**
 * A summary was requested before any image was processed.
 */
export class NoDataError extends HarnessError {
  constructor(message = 'No images were processed') {
    super({ message, errorCode: ErrorCode.NO_DATA, severity: 'info' });
  }
}

export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/** Render any thrown value as a one-line message */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function toError(cause: unknown): Error | undefined {
  if (cause === undefined) return undefined;
  if (cause instanceof Error) return cause;
  return new Error(String(cause));
}
