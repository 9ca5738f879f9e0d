import { toDetectorOptions, withDetector } from '../detector/scoped.js';
import type { DetectorAdapter, DetectResult } from '../detector/types.js';
import type { DecodedImage } from '../image/raster.js';
import {
  composeOverlay,
  type OverlayOptions,
} from '../overlay/overlay-compositor.js';
import { createRunReporter, type RunReporter } from '../report/run-reporter.js';
import { HammingHistogram } from '../stats/hamming-histogram.js';
import { RunStatistics } from '../stats/run-statistics.js';
import {
  DecodeError,
  DetectorError,
  describeError,
  type HarnessError,
} from '../types/errors.js';
import type { RunConfiguration } from '../types/options.js';
import { logDiagnostic, processSink, type OutputSink } from '../util/output.js';
import { profileTotalMicros } from '../util/time-profile.js';
import type {
  BenchmarkHooks,
  BenchmarkOptions,
  BenchmarkOutcome,
  ImageDecoder,
  ImageDisplay,
} from './types.js';

interface CycleContext<Handle> {
  config: RunConfiguration;
  detector: DetectorAdapter<Handle>;
  handle: Handle;
  decode: ImageDecoder;
  display?: ImageDisplay;
  overlay: OverlayOptions;
  sink: OutputSink;
  reporter: RunReporter;
  histogram: HammingHistogram;
  statistics: RunStatistics;
  hooks: BenchmarkHooks;
}

/**
 * Run `iterations × inputs` detection cycles, strictly one at a time, in
 * input order. The detector handle is acquired once and released on every
 * exit path. Per-image failures, display failures included, are reported
 * and skipped; only a failing `configure` (or an unexpected error) aborts
 * the run.
 */
export async function runBenchmark<Handle>(
  options: BenchmarkOptions<Handle>
): Promise<BenchmarkOutcome> {
  const { config, inputs, detector, decode, display } = options;
  const sink: OutputSink = options.sink ?? processSink;
  const reporter = createRunReporter(config.reportMode, sink);
  const statistics = new RunStatistics();
  const histogram = new HammingHistogram(config.hammingBins);

  if (config.display && !display) {
    logDiagnostic(sink, 'display requested but no display is available');
  }

  return withDetector(
    detector,
    config.family,
    toDetectorOptions(config),
    async (handle) => {
      const context: CycleContext<Handle> = {
        config,
        detector,
        handle,
        decode,
        display: config.display ? display : undefined,
        overlay: {
          camera: config.cameraParams ?? undefined,
          tagSize: config.tagSize,
        },
        sink,
        reporter,
        histogram,
        statistics,
        hooks: options.hooks ?? {},
      };

      for (let iter = 0; iter < config.iterations; iter++) {
        reporter.iterationStarted(iter + 1, config.iterations);
        for (let index = 0; index < inputs.length; index++) {
          const path = inputs[index];
          if (path === undefined) continue;
          await runCycle(context, path, iter + 1, index);
        }
      }

      return { summary: reporter.runFinished(statistics), statistics };
    },
    (error) =>
      logDiagnostic(sink, `Detector release failed: ${describeError(error)}`)
  );
}

async function runCycle<Handle>(
  ctx: CycleContext<Handle>,
  path: string,
  iteration: number,
  index: number
): Promise<void> {
  ctx.histogram.reset();
  ctx.reporter.imageStarted(path);

  let image: DecodedImage;
  try {
    image = await ctx.decode(path);
  } catch (error) {
    fail(ctx, path, iteration, index, asDecodeError(error, path));
    return;
  }

  let result: DetectResult;
  try {
    result = await ctx.detector.detect(ctx.handle, image.gray);
  } catch (error) {
    fail(ctx, path, iteration, index, asDetectorError(error, path));
    return;
  }

  for (const det of result.detections) {
    ctx.histogram.record(det.hamming);
  }
  const elapsedMicros = profileTotalMicros(result.profile);
  ctx.statistics.addImageResult(result.detections.length, elapsedMicros);

  ctx.reporter.imageProcessed({
    path,
    detections: result.detections,
    profile: result.profile,
    counters: result.counters,
    buckets: ctx.histogram.buckets(),
    elapsedMicros,
  });

  if (ctx.display) {
    const blended = composeOverlay(
      image.original,
      result.detections,
      ctx.overlay
    );
    try {
      await ctx.display({ path, iteration, original: image.original, blended });
    } catch (error) {
      logDiagnostic(
        ctx.sink,
        `Display failed for ${path}: ${describeError(error)}`
      );
    }
  }

  ctx.hooks.onImage?.({
    status: 'ok',
    iteration,
    index,
    path,
    detections: result.detections.map((det) => ({
      id: det.id,
      hamming: det.hamming,
      family: det.family.name,
    })),
    histogram: ctx.histogram.buckets(),
    overflow: ctx.histogram.overflow(),
    elapsedMicros,
  });
}

function fail<Handle>(
  ctx: CycleContext<Handle>,
  path: string,
  iteration: number,
  index: number,
  error: HarnessError
): void {
  ctx.statistics.recordFailure();
  ctx.reporter.imageFailed(path, error);
  ctx.hooks.onImage?.({
    status: 'failed',
    iteration,
    index,
    path,
    errorCode: error.errorCode,
    error: error.message,
  });
}

function asDecodeError(error: unknown, path: string): HarnessError {
  if (error instanceof DecodeError) return error;
  return new DecodeError({
    message: `Error loading ${path}`,
    context: { path },
    cause: error,
  });
}

function asDetectorError(error: unknown, path: string): HarnessError {
  if (error instanceof DetectorError) return error;
  return new DetectorError({
    message: `Detector failed on ${path}`,
    context: { path },
    cause: error,
  });
}
