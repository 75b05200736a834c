import type { TypeGenerator } from './codegen/types.js';
import type { MergeDiagnostic } from './diag/codes.js';
import { DiagnosticCollector } from './diag/collector.js';
import { createMergeContext } from './merge/context.js';
import { MergeOrchestrator, foldAllOf } from './merge/orchestrator.js';
import type { SchemaResolver } from './resolver/types.js';
import type { SchemaFoldError, SchemaMergeError } from './types/errors.js';
import { resolveOptions, type MergeOptions } from './types/options.js';
import type { Result } from './types/result.js';
import type { SchemaSource, SchemaValue } from './types/schema.js';

export interface MergeAllOfOptions<T> {
  resolver: SchemaResolver;
  generator: TypeGenerator<T>;
  options?: MergeOptions;
}

export interface MergeAllOfResult<T> {
  result: Result<T, SchemaFoldError>;
  diagnostics: readonly MergeDiagnostic[];
}

/**
 * Merge an allOf list and generate its type in one call.
 *
 * @throws {ConfigError} When `options` are invalid
 */
export function mergeAllOf<T>(
  sources: readonly SchemaSource[],
  path: readonly string[],
  { resolver, generator, options }: MergeAllOfOptions<T>
): MergeAllOfResult<T> {
  const orchestrator = new MergeOrchestrator({ resolver, generator, options });
  const result = orchestrator.mergeAllOf(sources, path);
  return { result, diagnostics: orchestrator.diagnostics };
}

export interface MergeSchemasResult {
  result: Result<SchemaValue, SchemaMergeError>;
  diagnostics: readonly MergeDiagnostic[];
}

/**
 * Merge an allOf list into a single schema value without generating a type.
 *
 * @throws {ConfigError} When `options` are invalid
 */
export function mergeSchemas(
  sources: readonly SchemaSource[],
  resolver: SchemaResolver,
  options?: MergeOptions
): MergeSchemasResult {
  const resolved = resolveOptions(options);
  const collector = new DiagnosticCollector([], resolved.diagnostics);
  const result = foldAllOf(
    sources,
    [],
    createMergeContext({
      resolver,
      diagnostics: collector,
      maxAllOfDepth: resolved.guards.maxAllOfDepth,
    })
  );
  return { result, diagnostics: collector.entries };
}
