/**
 * ErrorPresenter - pure presentation layer for SchemaFoldError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import {
  SchemaMergeError,
  type ErrorContext,
  type SchemaFoldError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  schemaPath?: string;
  ref?: string;
  field?: string;
  /** Messages of wrapped errors, outermost first */
  causes: string[];
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError & { kind?: string };

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: SchemaFoldError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      schemaPath: error.context?.schemaPath,
      ref: error.context?.ref,
      field: error.context?.field,
      causes: this.#causeChain(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForProduction(error: SchemaFoldError): ProductionView {
    const base = error.toJSON('prod');
    return error instanceof SchemaMergeError
      ? { ...base, kind: error.rootKind }
      : base;
  }

  #formatTitle(error: SchemaFoldError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const loc = ctx.schemaPath ?? ctx.ref ?? ctx.path?.join('/');
    return loc ? `Location: ${loc}` : undefined;
  }

  #causeChain(error: Error): string[] {
    const causes: string[] = [];
    let current = error.cause;
    while (current instanceof Error) {
      causes.push(current.message);
      current = current.cause;
    }
    return causes;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}

export default ErrorPresenter;
