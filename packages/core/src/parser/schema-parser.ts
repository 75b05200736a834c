/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */
/**
 * Raw OpenAPI schema objects → schema model
 *
 * Only the keywords the merge engine reads are interpreted. Unknown keywords
 * are ignored and `x-*` keys are kept as extensions.
 */

import { ParseError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import {
  inline,
  isPrimitiveType,
  reference,
  type AdditionalProperties,
  type ExclusiveBound,
  type JsonValue,
  type PrimitiveType,
  type SchemaSource,
  type SchemaValue,
} from '../types/schema.js';
import { OrderedMap } from '../util/ordered-map.js';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  ) {
    return true;
  }
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (isRecord(value)) return Object.values(value).every(isJsonValue);
  return false;
}

/**
 * Append a token to a JSON pointer, escaping '~' and '/'
 */
export function childPointer(pointer: string, ...tokens: string[]): string {
  let out = pointer;
  for (const token of tokens) {
    out += `/${token.replace(/~/g, '~0').replace(/\//g, '~1')}`;
  }
  return out;
}

function fail(message: string, schemaPath: string, value?: unknown): ParseError {
  return new ParseError({ message, context: { schemaPath, value } });
}

/**
 * Parse a property, composition member or items entry: either a `$ref`
 * object or an inline schema.
 */
export function parseSchemaSource(
  raw: unknown,
  pointer = '#'
): Result<SchemaSource, ParseError> {
  if (isRecord(raw) && '$ref' in raw) {
    const ref = raw.$ref;
    if (typeof ref !== 'string' || ref.length === 0) {
      return err(fail('"$ref" must be a non-empty string', pointer, ref));
    }
    return ok(reference(ref));
  }
  const value = parseSchemaValue(raw, pointer);
  if (value.isErr()) return value;
  return ok(inline(value.value));
}

function parseSourceList(
  raw: unknown,
  pointer: string
): Result<SchemaSource[], ParseError> {
  if (!Array.isArray(raw)) {
    return err(fail('Expected an array of schemas', pointer, raw));
  }
  const out: SchemaSource[] = [];
  for (let i = 0; i < raw.length; i++) {
    const parsed = parseSchemaSource(raw[i], childPointer(pointer, String(i)));
    if (parsed.isErr()) return parsed;
    out.push(parsed.value);
  }
  return ok(out);
}

function parseType(
  raw: unknown,
  pointer: string
): Result<PrimitiveType | undefined, ParseError> {
  if (raw === undefined) return ok(undefined);
  if (Array.isArray(raw)) {
    if (raw.length === 0) return ok(undefined);
    if (raw.length > 1) {
      return err(
        fail('Multiple types in "type" are not supported', pointer, raw)
      );
    }
    return parseType(raw[0], pointer);
  }
  if (!isPrimitiveType(raw)) {
    return err(fail(`Unsupported type ${JSON.stringify(raw)}`, pointer, raw));
  }
  return ok(raw);
}

function parseBound(
  raw: unknown,
  pointer: string
): Result<ExclusiveBound | undefined, ParseError> {
  if (raw === undefined) return ok(undefined);
  if (typeof raw === 'boolean') return ok({ kind: 'flag', exclusive: raw });
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return ok({ kind: 'numeric', value: raw });
  }
  return err(fail('Exclusive bound must be a boolean or a number', pointer, raw));
}

function parseFlag(
  raw: unknown,
  pointer: string
): Result<boolean | undefined, ParseError> {
  if (raw === undefined || typeof raw === 'boolean') return ok(raw);
  return err(fail('Expected a boolean', pointer, raw));
}

function parseAdditionalProperties(
  raw: unknown,
  pointer: string
): Result<AdditionalProperties | undefined, ParseError> {
  if (raw === undefined) return ok(undefined);
  if (typeof raw === 'boolean') return ok({ kind: 'flag', allowed: raw });
  const schema = parseSchemaSource(raw, pointer);
  if (schema.isErr()) return schema;
  return ok({ kind: 'schema', schema: schema.value });
}

/**
 * Parse an inline schema object. A `$ref` at this level is rejected: callers
 * that accept references go through parseSchemaSource.
 */
export function parseSchemaValue(
  raw: unknown,
  pointer = '#'
): Result<SchemaValue, ParseError> {
  if (!isRecord(raw)) {
    return err(fail('Schema must be an object', pointer, raw));
  }
  if ('$ref' in raw) {
    return err(fail('Expected an inline schema, found "$ref"', pointer, raw.$ref));
  }

  const schema: Mutable<SchemaValue> = {};

  const type = parseType(raw.type, childPointer(pointer, 'type'));
  if (type.isErr()) return type;
  if (type.value !== undefined) schema.type = type.value;

  if (raw.format !== undefined) {
    if (typeof raw.format !== 'string') {
      return err(
        fail('"format" must be a string', childPointer(pointer, 'format'))
      );
    }
    schema.format = raw.format;
  }

  if (raw.description !== undefined) {
    if (typeof raw.description !== 'string') {
      return err(
        fail(
          '"description" must be a string',
          childPointer(pointer, 'description')
        )
      );
    }
    schema.description = raw.description;
  }

  if (raw.enum !== undefined) {
    if (!Array.isArray(raw.enum) || !raw.enum.every(isJsonValue)) {
      return err(
        fail(
          '"enum" must be an array of JSON values',
          childPointer(pointer, 'enum'),
          raw.enum
        )
      );
    }
    schema.enum = raw.enum.slice();
  }

  if ('default' in raw && raw.default !== undefined) {
    if (!isJsonValue(raw.default)) {
      return err(
        fail('"default" must be a JSON value', childPointer(pointer, 'default'))
      );
    }
    schema.default = raw.default;
  }

  const exclusiveMinimum = parseBound(
    raw.exclusiveMinimum,
    childPointer(pointer, 'exclusiveMinimum')
  );
  if (exclusiveMinimum.isErr()) return exclusiveMinimum;
  if (exclusiveMinimum.value) schema.exclusiveMinimum = exclusiveMinimum.value;

  const exclusiveMaximum = parseBound(
    raw.exclusiveMaximum,
    childPointer(pointer, 'exclusiveMaximum')
  );
  if (exclusiveMaximum.isErr()) return exclusiveMaximum;
  if (exclusiveMaximum.value) schema.exclusiveMaximum = exclusiveMaximum.value;

  for (const flag of [
    'uniqueItems',
    'nullable',
    'readOnly',
    'writeOnly',
  ] as const) {
    const parsed = parseFlag(raw[flag], childPointer(pointer, flag));
    if (parsed.isErr()) return parsed;
    if (parsed.value !== undefined) schema[flag] = parsed.value;
  }

  if (raw.required !== undefined) {
    const required = raw.required;
    if (
      !Array.isArray(required) ||
      !required.every((name): name is string => typeof name === 'string')
    ) {
      return err(
        fail(
          '"required" must be an array of strings',
          childPointer(pointer, 'required'),
          required
        )
      );
    }
    schema.required = required.slice();
  }

  if (raw.properties !== undefined) {
    const propsPointer = childPointer(pointer, 'properties');
    if (!isRecord(raw.properties)) {
      return err(fail('"properties" must be an object', propsPointer));
    }
    const properties = new OrderedMap<string, SchemaSource>();
    for (const [name, rawProperty] of Object.entries(raw.properties)) {
      const parsed = parseSchemaSource(
        rawProperty,
        childPointer(propsPointer, name)
      );
      if (parsed.isErr()) return parsed;
      properties.set(name, parsed.value);
    }
    schema.properties = properties;
  }

  const additionalProperties = parseAdditionalProperties(
    raw.additionalProperties,
    childPointer(pointer, 'additionalProperties')
  );
  if (additionalProperties.isErr()) return additionalProperties;
  if (additionalProperties.value) {
    schema.additionalProperties = additionalProperties.value;
  }

  if (raw.items !== undefined) {
    const items = parseSchemaSource(raw.items, childPointer(pointer, 'items'));
    if (items.isErr()) return items;
    schema.items = items.value;
  }

  for (const keyword of ['allOf', 'oneOf'] as const) {
    if (raw[keyword] === undefined) continue;
    const members = parseSourceList(raw[keyword], childPointer(pointer, keyword));
    if (members.isErr()) return members;
    schema[keyword] = members.value;
  }

  const extensions = new OrderedMap<string, JsonValue>();
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith('x-')) continue;
    if (!isJsonValue(value)) {
      return err(
        fail(`Extension "${key}" must be a JSON value`, childPointer(pointer, key))
      );
    }
    extensions.set(key, value);
  }
  if (extensions.size > 0) schema.extensions = extensions;

  return ok(schema);
}
