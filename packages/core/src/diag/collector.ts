import type { DiagnosticsMode } from '../types/options.js';
import type {
  MergeDiagnostic,
  MergeDiagnosticCode,
} from './codes.js';

export interface DiagnosticSink {
  emit(
    code: MergeDiagnosticCode,
    details?: Record<string, unknown>
  ): void;
}

/**
 * Records diagnostics for one merge call under a fixed naming path.
 * With mode 'off' every emit is dropped.
 */
export class DiagnosticCollector implements DiagnosticSink {
  readonly #entries: MergeDiagnostic[] = [];

  constructor(
    private readonly path: readonly string[],
    private readonly mode: DiagnosticsMode = 'collect'
  ) {}

  emit(code: MergeDiagnosticCode, details?: Record<string, unknown>): void {
    if (this.mode === 'off') return;
    this.#entries.push({ code, path: this.path.join('/'), details });
  }

  get entries(): readonly MergeDiagnostic[] {
    return this.#entries;
  }
}

export const NOOP_DIAGNOSTICS: DiagnosticSink = {
  emit: () => undefined,
};

export function formatDiagnostic(diagnostic: MergeDiagnostic): string {
  const location = diagnostic.path === '' ? '<root>' : diagnostic.path;
  const details = diagnostic.details
    ? ` ${JSON.stringify(diagnostic.details)}`
    : '';
  return `${diagnostic.code} ${location}${details}`;
}
