import { NOOP_DIAGNOSTICS, type DiagnosticSink } from '../diag/collector.js';
import type { SchemaResolver } from '../resolver/types.js';
import { DEFAULT_OPTIONS } from '../types/options.js';

/**
 * State threaded through one merge call. Nested flattening derives a child
 * context; nothing here is mutated.
 */
export interface MergeContext {
  readonly resolver: SchemaResolver;
  readonly diagnostics: DiagnosticSink;
  readonly maxAllOfDepth: number;
  /** Number of enclosing allOf lists being flattened */
  readonly depth: number;
  /** References currently being flattened, outermost first */
  readonly flattening: readonly string[];
}

export function createMergeContext(params: {
  resolver: SchemaResolver;
  diagnostics?: DiagnosticSink;
  maxAllOfDepth?: number;
}): MergeContext {
  return {
    resolver: params.resolver,
    diagnostics: params.diagnostics ?? NOOP_DIAGNOSTICS,
    maxAllOfDepth: params.maxAllOfDepth ?? DEFAULT_OPTIONS.guards.maxAllOfDepth,
    depth: 0,
    flattening: [],
  };
}
