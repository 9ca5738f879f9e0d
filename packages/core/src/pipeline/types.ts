import type { DetectorAdapter } from '../detector/types.js';
import type { DecodedImage, Raster } from '../image/raster.js';
import type { ErrorCode } from '../errors/codes.js';
import type { RunConfiguration } from '../types/options.js';
import type { RunStatistics, RunSummary } from '../stats/run-statistics.js';
import type { OutputSink } from '../util/output.js';

export type ImageDecoder = (path: string) => Promise<DecodedImage>;

export interface DisplayRequest {
  path: string;
  /** 1-based */
  iteration: number;
  original: Raster;
  blended: Raster;
}

/** Shows one composited overlay; resolves once the user dismissed it */
export type ImageDisplay = (request: DisplayRequest) => Promise<void>;

export interface DetectionSummary {
  id: number;
  hamming: number;
  family: string;
}

export type ImageRecord =
  | {
      status: 'ok';
      iteration: number;
      index: number;
      path: string;
      detections: DetectionSummary[];
      histogram: number[];
      overflow: number;
      elapsedMicros: number;
    }
  | {
      status: 'failed';
      iteration: number;
      index: number;
      path: string;
      errorCode: ErrorCode;
      error: string;
    };

export interface BenchmarkHooks {
  onImage?: (record: ImageRecord) => void;
}

export interface BenchmarkOptions<Handle = unknown> {
  config: RunConfiguration;
  inputs: readonly string[];
  detector: DetectorAdapter<Handle>;
  decode: ImageDecoder;
  /** Receives overlays when `config.display` is set */
  display?: ImageDisplay;
  sink?: OutputSink;
  hooks?: BenchmarkHooks;
}

export interface BenchmarkOutcome {
  summary: RunSummary | null;
  statistics: RunStatistics;
}
