import { DiagnosticCollector } from '../../diag/collector.js';
import { parseSchemaValue } from '../../parser/schema-parser.js';
import { DocumentStore } from '../../resolver/document-store.js';
import type { SchemaValue } from '../../types/schema.js';
import { createMergeContext, type MergeContext } from '../context.js';

export interface TestContext {
  context: MergeContext;
  collector: DiagnosticCollector;
  store: DocumentStore;
}

export function createTestContext(
  root: unknown = {},
  documents: Record<string, unknown> = {},
  maxAllOfDepth?: number
): TestContext {
  const store = new DocumentStore(root, { documents });
  const collector = new DiagnosticCollector(['Test']);
  const context = createMergeContext({
    resolver: store,
    diagnostics: collector,
    maxAllOfDepth,
  });
  return { context, collector, store };
}

/** Parse a raw schema literal, throwing on malformed input */
export function schema(raw: unknown): SchemaValue {
  return parseSchemaValue(raw).unwrap();
}
