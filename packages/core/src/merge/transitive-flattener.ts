/**
 * Transitive allOf flattening
 *
 * Collapses a schema's own allOf list into one value before it takes part in
 * an outer merge, so composition never survives nested.
 */

import { SchemaMergeError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { SchemaSource, SchemaValue } from '../types/schema.js';
import type { MergeContext } from './context.js';
import { mergeSchemaValues } from './pairwise-merger.js';
import { valueWithPropagatedRef } from './reference-propagator.js';

function wrapAllOfFailure(cause: SchemaMergeError): SchemaMergeError {
  return new SchemaMergeError({
    kind: 'AllOfMergeFailed',
    stage: 'flatten',
    message: `error merging schemas for AllOf: ${cause.message}`,
    context: { ...cause.context },
    cause,
  });
}

function guard(
  sources: readonly SchemaSource[],
  context: MergeContext
): SchemaMergeError | undefined {
  if (sources.length === 0) {
    return new SchemaMergeError({
      kind: 'EmptyComposition',
      stage: 'flatten',
      message: 'cannot flatten an empty allOf list',
    });
  }
  if (context.depth >= context.maxAllOfDepth) {
    return new SchemaMergeError({
      kind: 'CompositionDepthExceeded',
      stage: 'flatten',
      message: `allOf nesting exceeds ${context.maxAllOfDepth} levels`,
      context: { depth: context.depth },
    });
  }
  for (const source of sources) {
    if (
      source.kind === 'reference' &&
      context.flattening.includes(source.ref)
    ) {
      return new SchemaMergeError({
        kind: 'CircularComposition',
        stage: 'flatten',
        message: `allOf member ${source.ref} composes itself`,
        context: {
          ref: source.ref,
          chain: [...context.flattening, source.ref],
        },
      });
    }
  }
  return undefined;
}

/**
 * Fold the pairwise merge over a non-empty allOf list, left to right, with
 * allOfContext set. Members carrying their own allOf are flattened first,
 * with the member's reference added to the chain of enclosing references.
 */
export function flattenAllOf(
  sources: readonly SchemaSource[],
  context: MergeContext
): Result<SchemaValue, SchemaMergeError> {
  const rejected = guard(sources, context);
  if (rejected) return err(rejected);

  const child: MergeContext = { ...context, depth: context.depth + 1 };

  const values: SchemaValue[] = [];
  for (const source of sources) {
    // Members of an external schema keep resolving inside their own document
    const resolved = valueWithPropagatedRef(source, child);
    if (resolved.isErr()) return err(wrapAllOfFailure(resolved.error));
    const member = resolved.value;
    if (!member.allOf || member.allOf.length === 0) {
      values.push(member);
      continue;
    }
    const nested = flattenAllOf(member.allOf, {
      ...child,
      flattening:
        source.kind === 'reference'
          ? [...child.flattening, source.ref]
          : child.flattening,
    });
    if (nested.isErr()) return err(wrapAllOfFailure(nested.error));
    values.push(nested.value);
  }

  context.diagnostics.emit('ALLOF_FLATTENED', {
    members: values.length,
    depth: child.depth,
  });

  const [head, ...rest] = values;
  let accumulated = head;
  for (const value of rest) {
    const merged = mergeSchemaValues(accumulated, value, true, child);
    if (merged.isErr()) return err(wrapAllOfFailure(merged.error));
    accumulated = merged.value;
  }
  return ok(accumulated);
}
