/* eslint-disable complexity */
/**
 * Serializes schema model values back to raw OpenAPI schema objects
 */

import type { SchemaFoldError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import type {
  AdditionalProperties,
  ExclusiveBound,
  JsonValue,
  SchemaSource,
  SchemaValue,
} from '../types/schema.js';
import type { TypeGenerator } from './types.js';

export type RawSchema = { [key: string]: JsonValue };

function boundToRaw(bound: ExclusiveBound): JsonValue {
  switch (bound.kind) {
    case 'flag':
      return bound.exclusive;
    case 'numeric':
      return bound.value;
  }
}

function additionalToRaw(value: AdditionalProperties): JsonValue {
  switch (value.kind) {
    case 'flag':
      return value.allowed;
    case 'schema':
      return sourceToRaw(value.schema);
  }
}

export function sourceToRaw(source: SchemaSource): RawSchema {
  if (source.kind === 'reference') return { $ref: source.ref };
  return valueToRaw(source.value);
}

/**
 * Keys come out in a fixed order with vendor extensions last.
 */
export function valueToRaw(schema: SchemaValue): RawSchema {
  const out: RawSchema = {};
  if (schema.type !== undefined) out.type = schema.type;
  if (schema.format !== undefined) out.format = schema.format;
  if (schema.description !== undefined) out.description = schema.description;
  if (schema.enum !== undefined) out.enum = schema.enum.slice();
  if (schema.default !== undefined) out.default = schema.default;
  if (schema.exclusiveMinimum) {
    out.exclusiveMinimum = boundToRaw(schema.exclusiveMinimum);
  }
  if (schema.exclusiveMaximum) {
    out.exclusiveMaximum = boundToRaw(schema.exclusiveMaximum);
  }
  if (schema.uniqueItems !== undefined) out.uniqueItems = schema.uniqueItems;
  if (schema.nullable !== undefined) out.nullable = schema.nullable;
  if (schema.readOnly !== undefined) out.readOnly = schema.readOnly;
  if (schema.writeOnly !== undefined) out.writeOnly = schema.writeOnly;
  if (schema.required !== undefined) out.required = schema.required.slice();
  if (schema.properties) {
    const properties: RawSchema = {};
    for (const [name, source] of schema.properties) {
      properties[name] = sourceToRaw(source);
    }
    out.properties = properties;
  }
  if (schema.additionalProperties) {
    out.additionalProperties = additionalToRaw(schema.additionalProperties);
  }
  if (schema.items) out.items = sourceToRaw(schema.items);
  if (schema.allOf !== undefined) out.allOf = schema.allOf.map(sourceToRaw);
  if (schema.oneOf !== undefined) out.oneOf = schema.oneOf.map(sourceToRaw);
  for (const [key, value] of schema.extensions ?? []) {
    out[key] = value;
  }
  return out;
}

/**
 * Generator producing raw schema documents, used for `--out json` and for
 * inspecting merge results.
 */
export class SchemaDocumentEmitter implements TypeGenerator<RawSchema> {
  generate(
    source: SchemaSource,
    _path: readonly string[]
  ): Result<RawSchema, SchemaFoldError> {
    return ok(sourceToRaw(source));
  }

  intersect(
    members: readonly RawSchema[],
    _path: readonly string[]
  ): Result<RawSchema, SchemaFoldError> {
    return ok({ allOf: members.slice() });
  }
}
