import { readFile } from 'node:fs/promises';

import { Ajv, type ErrorObject } from 'ajv';
import {
  ConfigurationError,
  ErrorCode,
  describeError,
  type RunOptions,
} from '@fiducial-bench/core';

/** JSON Schema of a `--config` file: any subset of the run options */
export const RUN_OPTIONS_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    family: { type: 'string', minLength: 1 },
    border: { type: 'integer', minimum: 0 },
    iterations: { type: 'integer', minimum: 1 },
    threads: { type: 'integer', minimum: 1 },
    decimate: { type: 'number', minimum: 1 },
    blur: { type: 'number' },
    refineEdges: { type: 'boolean' },
    refineDecode: { type: 'boolean' },
    refinePose: { type: 'boolean' },
    quadContours: { type: 'boolean' },
    debug: { type: 'boolean' },
    quiet: { type: 'boolean' },
    benchmark: { type: 'boolean' },
    display: { type: 'boolean' },
    hammingBins: { type: 'integer', minimum: 1 },
    cameraParams: {
      anyOf: [
        { type: 'null' },
        {
          type: 'object',
          additionalProperties: false,
          required: ['fx', 'fy', 'cx', 'cy'],
          properties: {
            fx: { type: 'number', exclusiveMinimum: 0 },
            fy: { type: 'number', exclusiveMinimum: 0 },
            cx: { type: 'number' },
            cy: { type: 'number' },
          },
        },
      ],
    },
    tagSize: { type: 'number', exclusiveMinimum: 0 },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: true });
const validateRunOptions = ajv.compile<RunOptions>(RUN_OPTIONS_SCHEMA);

function formatAjvError(error: ErrorObject): string {
  const where = error.instancePath === '' ? '(root)' : error.instancePath;
  if (error.keyword === 'additionalProperties') {
    const { additionalProperty } = error.params;
    return `${where} must NOT have additional property "${String(
      additionalProperty
    )}"`;
  }
  return `${where} ${error.message ?? 'is invalid'}`;
}

/** Validate an already parsed config document */
export function parseRunOptions(data: unknown, source: string): RunOptions {
  if (validateRunOptions(data)) {
    return { ...data };
  }
  const details = (validateRunOptions.errors ?? []).map(formatAjvError);
  throw new ConfigurationError({
    message: `Invalid config file ${source}: ${details.join('; ')}`,
    errorCode: ErrorCode.INVALID_OPTION,
    context: { option: '--config', path: source, value: details },
  });
}

export async function loadConfigFile(path: string): Promise<RunOptions> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError({
      message: `Cannot read config file ${path}`,
      context: { option: '--config', path },
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError({
      message: `Config file ${path} is not valid JSON: ${describeError(error)}`,
      context: { option: '--config', path },
      cause: error,
    });
  }
  return parseRunOptions(data, path);
}
