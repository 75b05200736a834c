import type { SchemaMergeError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import type { SchemaSource, SchemaValue } from '../types/schema.js';

/**
 * A dereferenced schema together with the document it was read from.
 * Local references inside `value` are relative to `documentPath`.
 */
export interface LocatedSchema {
  value: SchemaValue;
  /** '' for the root document and for inline sources */
  documentPath: string;
}

/**
 * Dereferencing capability used by the merge engine.
 *
 * Inline sources resolve to their own value. References resolve to the value
 * they point at, or fail with `MissingSchemaValue` / `UnsupportedReference`.
 * Implementations may hand out the same SchemaValue instance to every
 * caller of the same reference.
 */
export interface SchemaResolver {
  resolve(source: SchemaSource): Result<SchemaValue, SchemaMergeError>;
  /** Like `resolve`, also reporting the document the value lives in */
  locate(source: SchemaSource): Result<LocatedSchema, SchemaMergeError>;
}
