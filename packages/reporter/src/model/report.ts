/**
 * Data model for persisted run reports. A report is a plain JSON document:
 * the effective configuration, one record per image cycle and the run
 * summary, plus the Hamming histogram summed over every processed image.
 */
import { createRequire } from 'node:module';
import type {
  ImageRecord,
  RunConfiguration,
  RunSummary,
} from '@fiducial-bench/core';

const require = createRequire(import.meta.url);
const reporterPkg = require('../../package.json') as {
  name?: string;
  version?: string;
};
const corePkg = require('@fiducial-bench/core/package.json') as {
  version?: string;
};

const TOOL_NAME =
  typeof reporterPkg.name === 'string'
    ? reporterPkg.name
    : '@fiducial-bench/reporter';
const TOOL_VERSION =
  typeof reporterPkg.version === 'string' ? reporterPkg.version : '0.0.0';
const ENGINE_VERSION =
  typeof corePkg.version === 'string' ? corePkg.version : undefined;

export interface ReportMeta {
  toolName: string;
  toolVersion: string;
  engineVersion?: string;
  /** ISO-8601 */
  generatedAt: string;
  detector?: string;
  inputs: number;
}

export interface RunHistogram {
  buckets: number[];
  overflow: number;
}

export interface RunReport {
  meta: ReportMeta;
  configuration: RunConfiguration;
  records: ImageRecord[];
  histogram: RunHistogram;
  /** null when no image could be processed */
  summary: RunSummary | null;
}

export interface BuildRunReportInput {
  configuration: RunConfiguration;
  records: readonly ImageRecord[];
  summary: RunSummary | null;
  detector?: string;
  inputs?: number;
  now?: () => Date;
}

export function buildRunReport(input: BuildRunReportInput): RunReport {
  const now = input.now ?? (() => new Date());
  return {
    meta: {
      toolName: TOOL_NAME,
      toolVersion: TOOL_VERSION,
      engineVersion: ENGINE_VERSION,
      generatedAt: now().toISOString(),
      detector: input.detector,
      inputs: input.inputs ?? countInputs(input.records),
    },
    configuration: input.configuration,
    records: [...input.records],
    histogram: sumHistograms(input.configuration.hammingBins, input.records),
    summary: input.summary,
  };
}

export function sumHistograms(
  bins: number,
  records: readonly ImageRecord[]
): RunHistogram {
  const buckets = new Array<number>(bins).fill(0);
  let overflow = 0;
  for (const record of records) {
    if (record.status !== 'ok') continue;
    record.histogram.forEach((count, index) => {
      if (index < bins) buckets[index] = (buckets[index] ?? 0) + count;
    });
    overflow += record.overflow;
  }
  return { buckets, overflow };
}

function countInputs(records: readonly ImageRecord[]): number {
  return new Set(records.map((record) => record.path)).size;
}
