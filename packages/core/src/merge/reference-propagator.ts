/**
 * Reference propagation for schemas copied out of an external document
 *
 * A schema reached through `other.json#/components/schemas/Pet` may itself
 * point at `#/components/schemas/Tag`, which is only meaningful inside
 * other.json. Once the schema takes part in a merge in the root document,
 * such local references are qualified as `other.json#/components/schemas/Tag`.
 * The same holds for a root `$ref` alias whose target lives in other.json.
 */

import type { SchemaMergeError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import {
  isLocalReference,
  reference,
  type AdditionalProperties,
  type SchemaSource,
  type SchemaValue,
} from '../types/schema.js';
import type { MergeContext } from './context.js';

export interface QualifiedSchema {
  value: SchemaValue;
  /** Number of local references that were qualified */
  rewritten: number;
}

/**
 * Copy `schema` with the local references of its direct members qualified
 * by `documentPath`. Values from the root document come back unchanged.
 */
export function qualifyLocalReferences(
  schema: SchemaValue,
  documentPath: string
): QualifiedSchema {
  if (documentPath === '') return { value: schema, rewritten: 0 };

  let rewritten = 0;
  const qualify = (member: SchemaSource): SchemaSource => {
    if (member.kind === 'reference' && isLocalReference(member)) {
      rewritten++;
      return reference(`${documentPath}${member.ref}`);
    }
    return member;
  };

  const copy: { -readonly [K in keyof SchemaValue]: SchemaValue[K] } = {
    ...schema,
  };
  if (schema.properties) copy.properties = schema.properties.map(qualify);
  if (schema.allOf) copy.allOf = schema.allOf.map(qualify);
  if (schema.oneOf) copy.oneOf = schema.oneOf.map(qualify);
  if (schema.items) copy.items = qualify(schema.items);
  if (schema.additionalProperties?.kind === 'schema') {
    const additional: AdditionalProperties = {
      kind: 'schema',
      schema: qualify(schema.additionalProperties.schema),
    };
    copy.additionalProperties = additional;
  }
  return { value: copy, rewritten };
}

/**
 * Dereference `source` for use in a merge. A value read from an external
 * document comes back as a fresh copy whose direct local references are
 * document-qualified; the resolver's own value is left untouched.
 */
export function valueWithPropagatedRef(
  source: SchemaSource,
  context: MergeContext
): Result<SchemaValue, SchemaMergeError> {
  const located = context.resolver.locate(source);
  if (located.isErr()) return located;

  const { value, rewritten } = qualifyLocalReferences(
    located.value.value,
    located.value.documentPath
  );
  if (rewritten > 0 && source.kind === 'reference') {
    context.diagnostics.emit('EXTERNAL_REF_PROPAGATED', {
      ref: source.ref,
      rewritten,
    });
  }
  return ok(value);
}
