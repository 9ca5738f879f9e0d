/**
 * Error Code Infrastructure
 * Stable error codes and the process exit codes they map to.
 */

// Severity levels used across the harness
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Configuration Errors (E100–E199)
  CONFIGURATION_ERROR = 'E100',
  UNKNOWN_FAMILY = 'E101',
  INVALID_OPTION = 'E102',

  // Per-image Errors (E200–E299)
  DECODE_ERROR = 'E200',
  DETECTOR_ERROR = 'E210',

  // Reporting (E300–E399)
  NO_DATA = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// A rejected configuration exits with the -1 convention (255 on POSIX).
export const EXIT_CODES = {
  [ErrorCode.CONFIGURATION_ERROR]: 255,
  [ErrorCode.UNKNOWN_FAMILY]: 255,
  [ErrorCode.INVALID_OPTION]: 255,
  [ErrorCode.DECODE_ERROR]: 2,
  [ErrorCode.DETECTOR_ERROR]: 3,
  [ErrorCode.NO_DATA]: 0,
  [ErrorCode.INTERNAL_ERROR]: 1,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
