import type { TypeGenerator } from '../codegen/types.js';
import { SchemaMergeError, type SchemaFoldError } from '../types/errors.js';
import { type Result, err } from '../types/result.js';
import type { SchemaSource } from '../types/schema.js';

/**
 * Legacy allOf handling, kept behind `compatibility.oldMergeSchemas`.
 *
 * Nothing is flattened: every member is generated on its own under
 * `<path>/AllOf<i>` and the generator joins the results.
 */
export function legacyMergeAllOf<T>(
  sources: readonly SchemaSource[],
  path: readonly string[],
  generator: TypeGenerator<T>
): Result<T, SchemaFoldError> {
  const [only] = sources;
  if (only === undefined) {
    return err(
      new SchemaMergeError({
        kind: 'EmptyComposition',
        stage: 'orchestrate',
        message: 'allOf requires at least one schema',
        context: { path },
      })
    );
  }
  if (sources.length === 1) return generator.generate(only, path);

  const members: T[] = [];
  for (const [i, source] of sources.entries()) {
    const generated = generator.generate(source, [...path, `AllOf${i}`]);
    if (generated.isErr()) return generated;
    members.push(generated.value);
  }
  return generator.intersect(members, path);
}
