// @fiducial-bench/core entry point
//
// Public API:
// - runBenchmark(): the iteration/benchmark loop over a Detector Adapter.
// - Run configuration (resolveRunConfiguration) and the error taxonomy.
// - HammingHistogram / RunStatistics aggregators and the reporting modes.
// - Overlay compositor (renderOverlay / blendRasters) and raster helpers.
// - Tag pose from corners and camera intrinsics (estimateTagPose).

export { runBenchmark } from './pipeline/benchmark.js';
export type {
  BenchmarkHooks,
  BenchmarkOptions,
  BenchmarkOutcome,
  DetectionSummary,
  DisplayRequest,
  ImageDecoder,
  ImageDisplay,
  ImageRecord,
} from './pipeline/types.js';

// Configuration
export {
  DEFAULT_RUN_OPTIONS,
  resolveRunConfiguration,
  type ReportMode,
  type RunConfiguration,
  type RunOptionKey,
  type RunOptions,
} from './types/options.js';

// Errors
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  HarnessError,
  ConfigurationError,
  DecodeError,
  DetectorError,
  NoDataError,
  isHarnessError,
  describeError,
  type ErrorContext,
  type HarnessErrorParams,
  type SerializedError,
} from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Detector boundary
export { toDetectorOptions, withDetector } from './detector/scoped.js';
export type {
  Detection,
  DetectorAdapter,
  DetectorCounters,
  DetectorOptions,
  DetectResult,
  FamilyDescriptor,
  Point,
} from './detector/types.js';

// Images
export {
  createInputImage,
  createRaster,
  isChannelCount,
  sameLayout,
  toGrayImage,
  type ChannelCount,
  type DecodedImage,
  type InputImage,
  type Raster,
  type RasterLayout,
} from './image/raster.js';

// Aggregation and reporting
export { HammingHistogram } from './stats/hamming-histogram.js';
export { RunStatistics, type RunSummary } from './stats/run-statistics.js';
export {
  BenchmarkReporter,
  QuietReporter,
  VerboseReporter,
  createRunReporter,
  formatBenchmarkSummary,
  formatDetectionLine,
  formatHistogram,
  type ImageReport,
  type RunReporter,
} from './report/run-reporter.js';
export {
  TimeProfiler,
  formatTimingProfile,
  profileStages,
  profileTotalMicros,
  type StageTiming,
  type TimeProfilerOptions,
  type TimeStamp,
  type TimingProfile,
} from './util/time-profile.js';
export {
  LOG_PREFIX,
  logDiagnostic,
  processSink,
  type OutputSink,
} from './util/output.js';
export { baseName } from './util/format.js';

// Overlay
export {
  DEFAULT_OVERLAY_STYLE,
  blendRasters,
  composeOverlay,
  labelScale,
  renderOverlay,
  type OverlayOptions,
  type OverlayStyle,
  type StrokeStyle,
} from './overlay/overlay-compositor.js';

// Pose
export {
  estimateTagPose,
  projectPoint,
  type CameraParams,
  type Mat3,
  type TagPose,
  type Vec3,
} from './pose/tag-pose.js';
