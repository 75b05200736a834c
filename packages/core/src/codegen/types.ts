import type { SchemaFoldError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import type { SchemaSource } from '../types/schema.js';

/**
 * Type generation capability at the end of the merge pipeline.
 *
 * `path` is the naming context of the type being produced and is forwarded
 * untouched by the engine.
 */
export interface TypeGenerator<T> {
  generate(
    source: SchemaSource,
    path: readonly string[]
  ): Result<T, SchemaFoldError>;

  /**
   * Combine independently generated members into one type. Only the legacy
   * allOf strategy expresses composition this way.
   */
  intersect(
    members: readonly T[],
    path: readonly string[]
  ): Result<T, SchemaFoldError>;
}
