import {
  ErrorCode,
  resolveRunConfiguration,
  type ImageRecord,
  type RunSummary,
} from '@fiducial-bench/core';

export const FIXED_NOW = (): Date => new Date('2026-01-02T03:04:05.000Z');

export const configuration = resolveRunConfiguration({
  family: 'tag25h9',
  hammingBins: 3,
  quiet: true,
});

export const records: ImageRecord[] = [
  {
    status: 'ok',
    iteration: 1,
    index: 0,
    path: 'frames/a.png',
    detections: [
      { id: 3, hamming: 0, family: 'tag25h9' },
      { id: 8, hamming: 2, family: 'tag25h9' },
    ],
    histogram: [1, 0, 1],
    overflow: 0,
    elapsedMicros: 1500,
  },
  {
    status: 'failed',
    iteration: 1,
    index: 1,
    path: 'frames/missing.png',
    errorCode: ErrorCode.DECODE_ERROR,
    error: 'Error loading frames/missing.png',
  },
  {
    status: 'ok',
    iteration: 1,
    index: 2,
    path: 'frames/c.png',
    detections: [{ id: 1, hamming: 5, family: 'tag25h9' }],
    histogram: [0, 0, 0],
    overflow: 1,
    elapsedMicros: 2500,
  },
];

export const summary: RunSummary = {
  totalDetections: 3,
  totalImages: 2,
  failedImages: 1,
  totalElapsedMicros: 4000,
  totalMs: 4,
  avgMsPerFrame: 2,
};
