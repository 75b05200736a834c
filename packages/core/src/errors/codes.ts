/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Merge Errors (E001–E099)
  INCOMPATIBLE_SCHEMAS = 'E001',
  UNSUPPORTED_MERGE = 'E002',
  EMPTY_COMPOSITION = 'E003',
  CIRCULAR_COMPOSITION = 'E004',

  // Reference Errors (E100–E199)
  UNSUPPORTED_REFERENCE = 'E100',
  MISSING_SCHEMA_VALUE = 'E101',

  // Schema Structure Errors (E200–E299)
  INVALID_SCHEMA_STRUCTURE = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INCOMPATIBLE_SCHEMAS]: 10,
  [ErrorCode.UNSUPPORTED_MERGE]: 11,
  [ErrorCode.EMPTY_COMPOSITION]: 12,
  [ErrorCode.CIRCULAR_COMPOSITION]: 13,
  [ErrorCode.UNSUPPORTED_REFERENCE]: 20,
  [ErrorCode.MISSING_SCHEMA_VALUE]: 21,
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
