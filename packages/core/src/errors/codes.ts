/**
 * Error Code Infrastructure
 * Stable error codes and exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Catalog Errors (E010–E019)
  UNKNOWN_ENTRY = 'E010',

  // Resolution Errors (E020–E029)
  EMPTY_POSITION_CLASS = 'E020',
  INVALID_MASK = 'E021',

  // Entropy Errors (E030–E039)
  INVALID_DOMAIN = 'E030',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.UNKNOWN_ENTRY]: 10,
  [ErrorCode.EMPTY_POSITION_CLASS]: 20,
  [ErrorCode.INVALID_MASK]: 21,
  [ErrorCode.INVALID_DOMAIN]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
