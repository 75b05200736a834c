// @schemafold/core entry point
//
// - mergeAllOf / mergeSchemas facades from ./api.js for one-off calls
// - MergeOrchestrator and the individual stages (propagation, pairwise merge,
//   transitive flattening) for callers that drive the engine themselves
// - DocumentStore resolver, schema parser and the two emitters

export * from './api.js';

// Model
export * from './types/schema.js';
export * from './types/result.js';
export * from './types/errors.js';
export * from './types/options.js';
export { OrderedMap } from './util/ordered-map.js';

// Engine
export {
  MergeOrchestrator,
  foldAllOf,
  type MergeOrchestratorParams,
} from './merge/orchestrator.js';
export { createMergeContext, type MergeContext } from './merge/context.js';
export {
  valueWithPropagatedRef,
  qualifyLocalReferences,
  type QualifiedSchema,
} from './merge/reference-propagator.js';
export { mergeSchemaValues } from './merge/pairwise-merger.js';
export { flattenAllOf } from './merge/transitive-flattener.js';
export { legacyMergeAllOf } from './merge/legacy-merge.js';

// Resolution and parsing
export type { SchemaResolver, LocatedSchema } from './resolver/types.js';
export {
  DocumentStore,
  splitReference,
  normalizeDocumentPath,
  type DocumentStoreOptions,
} from './resolver/document-store.js';
export {
  parseSchemaSource,
  parseSchemaValue,
  childPointer,
  isRecord,
} from './parser/schema-parser.js';

// Generation
export type { TypeGenerator } from './codegen/types.js';
export {
  TypeScriptEmitter,
  toTypeName,
  referenceTypeName,
  renderSource,
  type GeneratedTypeScript,
} from './codegen/typescript-emitter.js';
export {
  SchemaDocumentEmitter,
  sourceToRaw,
  valueToRaw,
  type RawSchema,
} from './codegen/schema-document-emitter.js';

// Diagnostics
export {
  MERGE_DIAGNOSTIC_CODES,
  type MergeDiagnostic,
  type MergeDiagnosticCode,
} from './diag/codes.js';
export {
  DiagnosticCollector,
  NOOP_DIAGNOSTICS,
  formatDiagnostic,
  type DiagnosticSink,
} from './diag/collector.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';
