import type { CameraParams, ImageRecord } from '@fiducial-bench/core';

import type { RunReport } from '../model/report.js';

const ms = (micros: number): string => (micros / 1000).toFixed(3);

function renderRecord(record: ImageRecord): string {
  if (record.status === 'failed') {
    return `| ${record.iteration} | ${record.path} | failed (${record.errorCode}) | ${escapeCell(record.error)} | — |`;
  }
  const ids = record.detections.map((det) => det.id).join(', ') || '—';
  return `| ${record.iteration} | ${record.path} | ${record.detections.length} | ${ids} | ${ms(record.elapsedMicros)} |`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function formatCamera(camera: CameraParams | null): string {
  return camera ? `${camera.fx},${camera.fy},${camera.cx},${camera.cy}` : '—';
}

export function renderMarkdownReport(report: RunReport): string {
  const lines: string[] = [];
  const { meta, configuration, summary, histogram } = report;

  lines.push(`# Fiducial Benchmark Report – ${configuration.family}`, '');
  lines.push(`- Tool: ${meta.toolName} ${meta.toolVersion}`);
  lines.push(`- Engine: ${meta.engineVersion ?? 'n/a'}`);
  lines.push(`- Detector: ${meta.detector ?? 'n/a'}`);
  lines.push(`- Generated: ${meta.generatedAt}`);
  lines.push(`- Inputs: ${meta.inputs}`);
  lines.push(`- Iterations: ${configuration.iterations}`);
  lines.push(`- Mode: ${configuration.reportMode}`);

  lines.push('', '## Configuration', '', '| Option | Value |', '|---|---|');
  const options: Array<[string, string | number | boolean]> = [
    ['family', configuration.family],
    ['border', configuration.border],
    ['threads', configuration.threads],
    ['decimate', configuration.decimate],
    ['blur', configuration.blur],
    ['refineEdges', configuration.refineEdges],
    ['refineDecode', configuration.refineDecode],
    ['refinePose', configuration.refinePose],
    ['quadContours', configuration.quadContours],
    ['hammingBins', configuration.hammingBins],
    ['cameraParams', formatCamera(configuration.cameraParams)],
    ['tagSize', configuration.tagSize],
  ];
  options.forEach(([name, value]) => {
    lines.push(`| ${name} | ${String(value)} |`);
  });

  lines.push('', '## Summary', '');
  if (summary) {
    lines.push(
      `- Detections: ${summary.totalDetections}`,
      `- Images processed: ${summary.totalImages}`,
      `- Images failed: ${summary.failedImages}`,
      `- Total time: ${summary.totalMs.toFixed(3)} ms`,
      `- Per frame: ${summary.avgMsPerFrame.toFixed(3)} ms`
    );
  } else {
    lines.push('No images were processed.');
  }

  lines.push('', '## Hamming histogram', '', '| Distance | Detections |');
  lines.push('|---|---|');
  histogram.buckets.forEach((count, distance) => {
    lines.push(`| ${distance} | ${count} |`);
  });
  if (histogram.overflow > 0) {
    lines.push(`| ≥ ${histogram.buckets.length} | ${histogram.overflow} |`);
  }

  lines.push('', '## Images', '');
  if (report.records.length === 0) {
    lines.push('No per-image records captured.');
  } else {
    lines.push(
      '| Iteration | Path | Detections | IDs | Time (ms) |',
      '|---|---|---|---|---|'
    );
    report.records.forEach((record) => lines.push(renderRecord(record)));
  }

  return `${lines.join('\n')}\n`;
}
