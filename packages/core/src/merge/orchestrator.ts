/**
 * allOf merge orchestration
 *
 * Folds the pairwise merge over an ordered list of schema sources and hands
 * the single result to the type generator.
 */

import type { TypeGenerator } from '../codegen/types.js';
import { DiagnosticCollector } from '../diag/collector.js';
import type { MergeDiagnostic } from '../diag/codes.js';
import type { SchemaResolver } from '../resolver/types.js';
import { SchemaMergeError, type SchemaFoldError } from '../types/errors.js';
import {
  resolveOptions,
  type MergeOptions,
  type ResolvedMergeOptions,
} from '../types/options.js';
import { type Result, ok, err } from '../types/result.js';
import { inline, type SchemaSource, type SchemaValue } from '../types/schema.js';
import { createMergeContext, type MergeContext } from './context.js';
import { legacyMergeAllOf } from './legacy-merge.js';
import { mergeSchemaValues } from './pairwise-merger.js';
import { valueWithPropagatedRef } from './reference-propagator.js';

export interface MergeOrchestratorParams<T> {
  resolver: SchemaResolver;
  generator: TypeGenerator<T>;
  options?: MergeOptions;
}

export class MergeOrchestrator<T> {
  private readonly resolver: SchemaResolver;
  private readonly generator: TypeGenerator<T>;
  private readonly options: ResolvedMergeOptions;
  #diagnostics: readonly MergeDiagnostic[] = [];

  /**
   * @throws {ConfigError} When options are invalid
   */
  constructor(params: MergeOrchestratorParams<T>) {
    this.resolver = params.resolver;
    this.generator = params.generator;
    this.options = resolveOptions(params.options);
  }

  /** Diagnostics recorded by the most recent call */
  get diagnostics(): readonly MergeDiagnostic[] {
    return this.#diagnostics;
  }

  /**
   * Merge `sources` as an allOf and generate the resulting type under `path`.
   */
  mergeAllOf(
    sources: readonly SchemaSource[],
    path: readonly string[]
  ): Result<T, SchemaFoldError> {
    const collector = this.#startCall(path);

    if (this.options.compatibility.oldMergeSchemas) {
      collector.emit('LEGACY_MERGE_SELECTED', { members: sources.length });
      return legacyMergeAllOf(sources, path, this.generator);
    }

    const [only] = sources;
    if (sources.length === 1 && only !== undefined) {
      collector.emit('SINGLE_SOURCE_PASSTHROUGH');
      return this.generator.generate(only, path);
    }

    const merged = this.#fold(sources, path, collector);
    if (merged.isErr()) return merged;
    return this.generator.generate(inline(merged.value), path);
  }

  #startCall(path: readonly string[]): DiagnosticCollector {
    const collector = new DiagnosticCollector(path, this.options.diagnostics);
    this.#diagnostics = collector.entries;
    return collector;
  }

  #fold(
    sources: readonly SchemaSource[],
    path: readonly string[],
    collector: DiagnosticCollector
  ): Result<SchemaValue, SchemaMergeError> {
    return foldAllOf(
      sources,
      path,
      createMergeContext({
        resolver: this.resolver,
        diagnostics: collector,
        maxAllOfDepth: this.options.guards.maxAllOfDepth,
      })
    );
  }
}

/**
 * Fold `sources` left to right into one schema value. Every member has its
 * external references propagated before it is merged; a single member comes
 * back dereferenced and propagated.
 */
export function foldAllOf(
  sources: readonly SchemaSource[],
  path: readonly string[],
  context: MergeContext
): Result<SchemaValue, SchemaMergeError> {
  const [first, ...rest] = sources;
  if (first === undefined) {
    return err(
      new SchemaMergeError({
        kind: 'EmptyComposition',
        stage: 'orchestrate',
        message: 'allOf requires at least one schema',
        context: { path },
      })
    );
  }

  const initial = valueWithPropagatedRef(first, context);
  if (initial.isErr()) return initial;
  let schema = initial.value;

  for (const source of rest) {
    const next = valueWithPropagatedRef(source, context);
    if (next.isErr()) return next;
    const merged = mergeSchemaValues(schema, next.value, true, context);
    if (merged.isErr()) {
      return err(
        new SchemaMergeError({
          kind: 'AllOfMergeFailed',
          stage: 'orchestrate',
          message: `error merging schemas for AllOf: ${merged.error.message}`,
          context: { ...merged.error.context, path },
          cause: merged.error,
        })
      );
    }
    schema = merged.value;
  }
  return ok(schema);
}
