#!/usr/bin/env node

// CLI entry point
// - `fiducial-bench [options] [inputs...]` runs the detector over every input
//   image, `--iters` times, and prints the per-image report of the chosen mode.
// - Option layers, lowest first: defaults, --config file, --profile, flags.
// - Overlays are written as PNG files (--overlay-dir); --report persists a
//   JSON or Markdown run report.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  HarnessError,
  ErrorCode,
  isHarnessError,
  logDiagnostic,
  processSink,
  resolveRunConfiguration,
  runBenchmark,
  type DetectorAdapter,
  type ImageDecoder,
  type ImageDisplay,
  type ImageRecord,
  type OutputSink,
} from '@fiducial-bench/core';
import { buildRunReport, writeRunReport } from '@fiducial-bench/reporter';

import { loadConfigFile } from './config-file.js';
import { printEffectiveConfig } from './debug.js';
import { createArucoAdapter } from './detector/js-aruco2.js';
import {
  parseRunFlags,
  resolveReportFormat,
  type CliOptions,
  type RunFlag,
} from './flags.js';
import { decodeImage } from './image/decode.js';
import {
  DEFAULT_OVERLAY_DIR,
  createFileDisplay,
  type FileDisplayOptions,
} from './image/display.js';
import { applySpeedProfile } from './profiles.js';
import { renderCLIView } from './render.js';

const VERSION = '0.1.0';

export interface CliDependencies {
  sink?: OutputSink;
  decode?: ImageDecoder;
  createDetector?: (warn: (message: string) => void) => DetectorAdapter;
  createDisplay?: (options: FileDisplayOptions) => ImageDisplay;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('fiducial-bench')
    .description('Benchmark a fiducial tag detector over a set of images')
    .version(VERSION)
    .argument('[inputs...]', 'Image files to process')
    .option('-f, --family <name>', 'Tag family (default: tag36h11)')
    .option('--border <n>', 'Family border width in bits (default: 1)')
    .option('-i, --iters <n>', 'Repeat processing on input set (default: 1)')
    .option('-t, --threads <n>', 'Detector thread hint (default: 4)')
    .option('-x, --decimate <factor>', 'Decimate input image (default: 1.0)')
    .option(
      '-b, --blur <sigma>',
      'Gaussian blur sigma; negative sharpens (default: 0.0)'
    )
    .option('--no-refine-edges', 'Skip edge refinement')
    .option('--refine-decode', 'Spend more time decoding tags')
    .option('--refine-pose', 'Spend more time computing pose')
    .option('-c, --contours', 'Use contour-based quad detection')
    .option('-q, --quiet', 'Reduce output to one line per image')
    .option(
      '-B, --benchmark',
      'Print ids per image and throughput; disables the display'
    )
    .option('-n, --no-display', 'Do not write overlay images')
    .option('-d, --debug', 'Print the effective configuration to stderr')
    .option('--hamming-bins <n>', 'Hamming histogram buckets (default: 10)')
    .option(
      '--camera-params <fx,fy,cx,cy>',
      'Camera intrinsics in pixels; enables pose estimation'
    )
    .option('--tag-size <size>', 'Tag edge length for poses (default: 1)')
    .option('--profile <name>', 'Speed preset: fast|balanced|accurate')
    .option('--config <file>', 'JSON file with run option defaults')
    .option(
      '--overlay-dir <dir>',
      'Directory for overlay images',
      DEFAULT_OVERLAY_DIR
    )
    .option('--pause', 'Wait for Enter after each overlay')
    .option('--report <file>', 'Write a run report to this file')
    .option('--report-format <fmt>', 'Report format: json|markdown', 'json')
    .action(async function (
      this: Command,
      inputs: string[],
      options: CliOptions
    ) {
      try {
        await runCli(this, inputs, options, deps);
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  return program;
}

async function runCli(
  command: Command,
  inputs: string[],
  options: CliOptions,
  deps: CliDependencies
): Promise<void> {
  const sink = deps.sink ?? processSink;
  const isExplicit = (flag: RunFlag): boolean =>
    command.getOptionValueSource(flag) !== 'default';

  const fileOptions = options.config
    ? await loadConfigFile(options.config)
    : {};
  const explicit = parseRunFlags(options, isExplicit);
  const config = resolveRunConfiguration(
    applySpeedProfile(fileOptions, options.profile, explicit)
  );
  const reportFormat = resolveReportFormat(options.reportFormat);

  if (config.debug) {
    printEffectiveConfig(sink, config, inputs);
  }

  const warn = (message: string): void => logDiagnostic(sink, message);
  const detector: DetectorAdapter = deps.createDetector
    ? deps.createDetector(warn)
    : createArucoAdapter({ warn });
  const display = config.display
    ? (deps.createDisplay ?? createFileDisplay)({
        dir: options.overlayDir ?? DEFAULT_OVERLAY_DIR,
        pause: options.pause === true,
        onWrite: config.debug
          ? (path) => logDiagnostic(sink, `overlay written to ${path}`)
          : undefined,
      })
    : undefined;

  const records: ImageRecord[] = [];
  const outcome = await runBenchmark({
    config,
    inputs,
    detector,
    decode: deps.decode ?? decodeImage,
    display,
    sink,
    hooks: options.report
      ? { onImage: (record) => records.push(record) }
      : undefined,
  });

  if (options.report) {
    const report = buildRunReport({
      configuration: config,
      records,
      summary: outcome.summary,
      detector: detector.name,
      inputs: inputs.length,
    });
    await writeRunReport(report, options.report, reportFormat);
    logDiagnostic(sink, `report written to ${options.report}`);
  }
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: HarnessError;
  if (isHarnessError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new HarnessError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(
  argv: string[] = process.argv,
  deps: CliDependencies = {}
): Promise<void> {
  await createProgram(deps).parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
