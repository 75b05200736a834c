/**
 * Error hierarchy for schemafold
 * Structured errors with stable codes, typed context and cause chains
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  schemaPath?: string; // JSON pointer inside the document (e.g. '#/components/schemas/Pet')
  ref?: string; // Reference string being processed
  field?: string; // Schema field a merge rule failed on
  side?: 1 | 2; // Which merge input the failure belongs to
  left?: unknown; // Value from the first merge input
  right?: unknown; // Value from the second merge input
  path?: readonly string[]; // Naming context forwarded to the generator
  setting?: string; // Configuration key
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  schemaPath?: string;
}

export interface SchemaFoldErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all schemafold errors
 */
export abstract class SchemaFoldError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: SchemaFoldErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and the raw left/right values
   * - prod: excludes stack and replaces merge operands with their JSON type
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? summarizeContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      schemaPath: this.context?.schemaPath,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

function summarizeContext(context?: ErrorContext): ErrorContext | undefined {
  if (!context) return context;
  const summarized: ErrorContext = { ...context };
  if ('left' in summarized) summarized.left = describeOperand(summarized.left);
  if ('right' in summarized) {
    summarized.right = describeOperand(summarized.right);
  }
  return summarized;
}

function describeOperand(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Every failure the merge engine can report. The first ten mirror the
 * compatibility rules; the rest cover wrapping stages and guards.
 */
export type MergeErrorKind =
  | 'UnsupportedReference'
  | 'MissingSchemaValue'
  | 'IncompatibleTypes'
  | 'IncompatibleFormats'
  | 'UndefinedDefaultMerge'
  | 'ConflictingFlag'
  | 'IncompatibleBoundDialect'
  | 'ConflictingBound'
  | 'UnsupportedAdditionalPropertiesMerge'
  | 'TransitiveFlattenError'
  | 'AllOfMergeFailed'
  | 'UnsupportedItemsMerge'
  | 'EmptyComposition'
  | 'CompositionDepthExceeded'
  | 'CircularComposition'
  | 'MalformedSchema';

export type MergeStage =
  | 'resolve'
  | 'propagate'
  | 'flatten'
  | 'merge'
  | 'orchestrate';

const ERROR_CODE_BY_KIND: Record<MergeErrorKind, ErrorCode> = {
  UnsupportedReference: ErrorCode.UNSUPPORTED_REFERENCE,
  MissingSchemaValue: ErrorCode.MISSING_SCHEMA_VALUE,
  IncompatibleTypes: ErrorCode.INCOMPATIBLE_SCHEMAS,
  IncompatibleFormats: ErrorCode.INCOMPATIBLE_SCHEMAS,
  UndefinedDefaultMerge: ErrorCode.UNSUPPORTED_MERGE,
  ConflictingFlag: ErrorCode.INCOMPATIBLE_SCHEMAS,
  IncompatibleBoundDialect: ErrorCode.INCOMPATIBLE_SCHEMAS,
  ConflictingBound: ErrorCode.INCOMPATIBLE_SCHEMAS,
  UnsupportedAdditionalPropertiesMerge: ErrorCode.UNSUPPORTED_MERGE,
  TransitiveFlattenError: ErrorCode.INCOMPATIBLE_SCHEMAS,
  AllOfMergeFailed: ErrorCode.INCOMPATIBLE_SCHEMAS,
  UnsupportedItemsMerge: ErrorCode.UNSUPPORTED_MERGE,
  EmptyComposition: ErrorCode.EMPTY_COMPOSITION,
  CompositionDepthExceeded: ErrorCode.CIRCULAR_COMPOSITION,
  CircularComposition: ErrorCode.CIRCULAR_COMPOSITION,
  MalformedSchema: ErrorCode.INVALID_SCHEMA_STRUCTURE,
};

/**
 * Wrapping kinds take the error code of what they wrap, so a CLI exit code
 * reflects the actual conflict rather than the stage that reported it.
 */
function resolveErrorCode(kind: MergeErrorKind, cause?: Error): ErrorCode {
  if (
    (kind === 'AllOfMergeFailed' || kind === 'TransitiveFlattenError') &&
    cause instanceof SchemaFoldError
  ) {
    return cause.errorCode;
  }
  return ERROR_CODE_BY_KIND[kind];
}

/**
 * Merge, flatten, propagation and resolution failures
 */
export class SchemaMergeError extends SchemaFoldError {
  public readonly kind: MergeErrorKind;
  public readonly stage: MergeStage;

  constructor(params: {
    kind: MergeErrorKind;
    stage: MergeStage;
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: resolveErrorCode(params.kind, params.cause),
      context: params.context,
      cause: params.cause,
    });
    this.kind = params.kind;
    this.stage = params.stage;
  }

  /**
   * Kind of the innermost merge error in the cause chain
   */
  get rootKind(): MergeErrorKind {
    let current: SchemaMergeError = this;
    while (current.cause instanceof SchemaMergeError) {
      current = current.cause;
    }
    return current.kind;
  }

  get field(): string | undefined {
    return this.context?.field;
  }
}

/**
 * Raw schema documents that cannot be turned into the schema model
 */
export class ParseError extends SchemaFoldError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCHEMA_STRUCTURE,
      context: params.context,
      cause: params.cause,
    });
  }

  get schemaPath(): string | undefined {
    return this.context?.schemaPath;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends SchemaFoldError {
  constructor(params: {
    message: string;
    setting?: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting: params.setting, ...(params.context ?? {}) },
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

export function isSchemaFoldError(error: unknown): error is SchemaFoldError {
  return error instanceof SchemaFoldError;
}

export function isSchemaMergeError(error: unknown): error is SchemaMergeError {
  return error instanceof SchemaMergeError;
}
