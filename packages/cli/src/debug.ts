import {
  logDiagnostic,
  type OutputSink,
  type RunConfiguration,
} from '@fiducial-bench/core';

/**
 * Print the effective run configuration to the diagnostic stream.
 * Used behind the --debug flag.
 */
export function printEffectiveConfig(
  sink: OutputSink,
  config: RunConfiguration,
  inputs: readonly string[]
): void {
  logDiagnostic(sink, `effective config: ${JSON.stringify(config, null, 2)}`);
  logDiagnostic(sink, `inputs: ${inputs.length}`);
}
