import type { Detection, DetectorCounters } from '../detector/types.js';
import type { TagPose } from '../pose/tag-pose.js';
import { NoDataError, type HarnessError } from '../types/errors.js';
import type { ReportMode } from '../types/options.js';
import type { RunStatistics, RunSummary } from '../stats/run-statistics.js';
import { baseName, fixed, padLeft, padRight } from '../util/format.js';
import { logDiagnostic, type OutputSink } from '../util/output.js';
import {
  formatTimingProfile,
  type TimingProfile,
} from '../util/time-profile.js';

export interface ImageReport {
  path: string;
  detections: readonly Detection[];
  profile: TimingProfile;
  counters?: DetectorCounters;
  buckets: readonly number[];
  elapsedMicros: number;
}

export interface RunReporter {
  readonly mode: ReportMode;
  iterationStarted(iteration: number, total: number): void;
  imageStarted(path: string): void;
  imageProcessed(report: ImageReport): void;
  imageFailed(path: string, error: HarnessError): void;
  /** Returns the run summary, or null when no image was processed */
  runFinished(statistics: RunStatistics): RunSummary | null;
}

export function formatDetectionLine(index: number, det: Detection): string {
  const bits = det.family.bitsPerSide * det.family.bitsPerSide;
  return (
    `Detection ${padLeft(index, 3)}: ` +
    `ID (${padLeft(bits, 2)}h${padLeft(det.family.minHamming, 2)})-${padRight(det.id, 4)}, ` +
    `Hamming ${det.hamming}, ` +
    `Goodness ${fixed(det.goodness, 8, 3)}, ` +
    `Margin ${fixed(det.decisionMargin, 8, 3)}`
  );
}

/** Translation and reprojection error of a posed detection */
export function formatPoseLine(pose: TagPose): string {
  const [x, y, z] = pose.translation;
  return (
    `  Pose t = (${x.toFixed(4)}, ${y.toFixed(4)}, ${z.toFixed(4)}), ` +
    `error ${pose.error.toFixed(3)}`
  );
}

export function formatHistogram(buckets: readonly number[]): string {
  return buckets.map((count) => padLeft(count, 5)).join('');
}

export function formatBenchmarkSummary(summary: RunSummary): string {
  return (
    `${summary.totalDetections} detections over ${summary.totalImages} images ` +
    `in ${summary.totalMs.toFixed(3)} ms ` +
    `(${summary.avgMsPerFrame.toFixed(3)} ms per frame)`
  );
}

abstract class BaseReporter implements RunReporter {
  abstract readonly mode: ReportMode;

  constructor(protected readonly sink: OutputSink) {}

  iterationStarted(iteration: number, total: number): void {
    if (total > 1) {
      this.line(`Iteration ${iteration} / ${total}`);
    }
  }

  imageStarted(_path: string): void {}

  abstract imageProcessed(report: ImageReport): void;

  imageFailed(_path: string, error: HarnessError): void {
    const cause = error.cause ? `: ${error.cause.message}` : '';
    logDiagnostic(this.sink, `${error.message}${cause}`);
  }

  runFinished(statistics: RunStatistics): RunSummary | null {
    try {
      return statistics.summary();
    } catch (error) {
      if (error instanceof NoDataError) return null;
      throw error;
    }
  }

  protected line(text: string): void {
    this.sink.stdout(`${text}\n`);
  }
}

export class VerboseReporter extends BaseReporter {
  readonly mode = 'verbose' as const;

  override imageStarted(path: string): void {
    this.line(`Loading ${path}`);
  }

  imageProcessed(report: ImageReport): void {
    report.detections.forEach((det, index) => {
      this.line(formatDetectionLine(index, det));
      if (det.pose) this.line(formatPoseLine(det.pose));
    });
    for (const stage of formatTimingProfile(report.profile)) {
      this.line(stage);
    }
    if (report.counters) {
      const { edges, segments, quads } = report.counters;
      this.line(`Edges: ${edges}, Segments: ${segments}, Quads: ${quads}`);
    }
    this.line(`Hamming histogram: ${formatHistogram(report.buckets)}`);
  }
}

export class QuietReporter extends BaseReporter {
  readonly mode = 'quiet' as const;

  imageProcessed(report: ImageReport): void {
    this.line(
      `${formatHistogram(report.buckets)}${fixed(report.elapsedMicros / 1e3, 12, 3)}`
    );
  }
}

export class BenchmarkReporter extends BaseReporter {
  readonly mode = 'benchmark' as const;

  // Keeps stdout to one parseable line per image
  override iterationStarted(): void {}

  imageProcessed(report: ImageReport): void {
    const ids = report.detections.map((det) => ` ${det.id}`).join('');
    this.line(`${baseName(report.path)}${ids}`);
  }

  // A failed image still gets its line, with no ids
  override imageFailed(path: string, error: HarnessError): void {
    super.imageFailed(path, error);
    this.line(baseName(path));
  }

  override runFinished(statistics: RunStatistics): RunSummary | null {
    const summary = super.runFinished(statistics);
    if (summary) {
      this.sink.stderr(`${formatBenchmarkSummary(summary)}\n`);
    }
    return summary;
  }
}

export function createRunReporter(
  mode: ReportMode,
  sink: OutputSink
): RunReporter {
  switch (mode) {
    case 'benchmark':
      return new BenchmarkReporter(sink);
    case 'quiet':
      return new QuietReporter(sink);
    case 'verbose':
      return new VerboseReporter(sink);
  }
}
