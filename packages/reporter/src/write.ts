import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { RunReport } from './model/report.js';
import { renderMarkdownReport } from './render/markdown.js';

export type ReportFormat = 'json' | 'markdown';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'markdown'];

export function isReportFormat(value: string): value is ReportFormat {
  return value === 'json' || value === 'markdown';
}

export function serializeRunReport(
  report: RunReport,
  format: ReportFormat
): string {
  return format === 'markdown'
    ? renderMarkdownReport(report)
    : `${JSON.stringify(report, null, 2)}\n`;
}

/** Write the report, creating parent directories as needed */
export async function writeRunReport(
  report: RunReport,
  path: string,
  format: ReportFormat = 'json'
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeRunReport(report, format), 'utf8');
}
