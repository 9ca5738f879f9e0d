/**
 * Where report lines and diagnostics go. Report lines are written verbatim
 * to `stdout`; diagnostics go to `stderr` with the tool prefix.
 */
export interface OutputSink {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const LOG_PREFIX = '[fiducial-bench]';

export const processSink: OutputSink = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export function logDiagnostic(sink: OutputSink, message: string): void {
  sink.stderr(`${LOG_PREFIX} ${message}\n`);
}
