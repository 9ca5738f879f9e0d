export {
  buildRunReport,
  sumHistograms,
  type BuildRunReportInput,
  type ReportMeta,
  type RunHistogram,
  type RunReport,
} from './model/report.js';
export { renderMarkdownReport } from './render/markdown.js';
export {
  REPORT_FORMATS,
  isReportFormat,
  serializeRunReport,
  writeRunReport,
  type ReportFormat,
} from './write.js';
