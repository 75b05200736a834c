/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */
/**
 * Pairwise schema merge
 *
 * Combines two dereferenced schema values field by field. Rules run in a
 * fixed order and the first incompatibility aborts the whole merge.
 */

import { SchemaMergeError, type ErrorContext } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type {
  AdditionalProperties,
  ExclusiveBound,
  JsonValue,
  SchemaSource,
  SchemaValue,
} from '../types/schema.js';
import { OrderedMap } from '../util/ordered-map.js';
import type { MergeContext } from './context.js';
import { flattenAllOf } from './transitive-flattener.js';

type MutableSchema = { -readonly [K in keyof SchemaValue]: SchemaValue[K] };

type FlagField = 'uniqueItems' | 'nullable' | 'readOnly' | 'writeOnly';
type BoundField = 'exclusiveMinimum' | 'exclusiveMaximum';

function conflict(
  kind: SchemaMergeError['kind'],
  message: string,
  context: ErrorContext
): SchemaMergeError {
  return new SchemaMergeError({ kind, stage: 'merge', message, context });
}

function concat<T>(
  a: readonly T[] | undefined,
  b: readonly T[] | undefined
): T[] | undefined {
  if (a === undefined && b === undefined) return undefined;
  return [...(a ?? []), ...(b ?? [])];
}

function mergeExtensions(
  s1: SchemaValue,
  s2: SchemaValue
): OrderedMap<string, JsonValue> | undefined {
  if (!s1.extensions && !s2.extensions) return undefined;
  const out = new OrderedMap<string, JsonValue>();
  for (const [key, value] of s1.extensions ?? []) out.set(key, value);
  for (const [key, value] of s2.extensions ?? []) out.set(key, value);
  return out;
}

/**
 * Absent flags read as false, so only an explicit true on one side conflicts.
 */
function mergeFlag(
  field: FlagField,
  s1: SchemaValue,
  s2: SchemaValue
): Result<boolean | undefined, SchemaMergeError> {
  const left = s1[field] ?? false;
  const right = s2[field] ?? false;
  if (left !== right) {
    return err(
      conflict(
        'ConflictingFlag',
        `merging two schemas with different ${field}`,
        { field, left: s1[field], right: s2[field] }
      )
    );
  }
  return ok(s1[field] ?? s2[field]);
}

type FlagBound = Extract<ExclusiveBound, { kind: 'flag' }>;
type NumericBound = Extract<ExclusiveBound, { kind: 'numeric' }>;

function mergeBound(
  field: BoundField,
  s1: SchemaValue,
  s2: SchemaValue
): Result<ExclusiveBound | undefined, SchemaMergeError> {
  const left = s1[field];
  const right = s2[field];
  if (!left) return ok(right);
  if (!right) return ok(left);

  switch (left.kind) {
    case 'flag':
      return mergeWithFlagBound(field, left, right);
    case 'numeric':
      return mergeWithNumericBound(field, left, right);
  }
}

function mergeWithFlagBound(
  field: BoundField,
  left: FlagBound,
  right: ExclusiveBound
): Result<ExclusiveBound, SchemaMergeError> {
  switch (right.kind) {
    case 'flag':
      if (left.exclusive !== right.exclusive) {
        return err(
          conflict(
            'ConflictingBound',
            `merging two schemas with different ${field}`,
            { field, left: left.exclusive, right: right.exclusive }
          )
        );
      }
      return ok(left);
    case 'numeric':
      return err(
        conflict(
          'IncompatibleBoundDialect',
          `merging two schemas with right-hand-side ${field} defined as OpenAPI 3.1 type, not OpenAPI 3.0`,
          { field, side: 2, left: left.exclusive, right: right.value }
        )
      );
  }
}

function mergeWithNumericBound(
  field: BoundField,
  left: NumericBound,
  right: ExclusiveBound
): Result<ExclusiveBound, SchemaMergeError> {
  switch (right.kind) {
    case 'flag':
      return err(
        conflict(
          'IncompatibleBoundDialect',
          `merging two schemas with left-hand-side ${field} defined as OpenAPI 3.1 type, not OpenAPI 3.0`,
          { field, side: 1, left: left.value, right: right.exclusive }
        )
      );
    case 'numeric':
      if (left.value !== right.value) {
        return err(
          conflict(
            'ConflictingBound',
            `merging two schemas with different ${field}`,
            { field, left: left.value, right: right.value }
          )
        );
      }
      return ok(left);
  }
}

function isExplicitFalse(value: AdditionalProperties | undefined): boolean {
  return value?.kind === 'flag' && !value.allowed;
}

function isExplicitTrue(value: AdditionalProperties | undefined): boolean {
  return value?.kind === 'flag' && value.allowed;
}

function mergeAdditionalProperties(
  s1: SchemaValue,
  s2: SchemaValue
): Result<AdditionalProperties | undefined, SchemaMergeError> {
  const left = s1.additionalProperties;
  const right = s2.additionalProperties;

  if (isExplicitFalse(left) || isExplicitFalse(right)) {
    return ok({ kind: 'flag', allowed: false });
  }
  if (left?.kind === 'schema') {
    if (right?.kind === 'schema') {
      return err(
        conflict(
          'UnsupportedAdditionalPropertiesMerge',
          'merging two schemas with additional properties, this is unhandled',
          { field: 'additionalProperties', left, right }
        )
      );
    }
    return ok(left);
  }
  if (right?.kind === 'schema') return ok(right);
  if (isExplicitTrue(left) || isExplicitTrue(right)) {
    return ok({ kind: 'flag', allowed: true });
  }
  return ok(undefined);
}

function mergeItems(
  s1: SchemaValue,
  s2: SchemaValue
): Result<SchemaSource | undefined, SchemaMergeError> {
  const left = s1.items;
  const right = s2.items;
  if (!left) return ok(right);
  if (!right) return ok(left);
  if (
    left.kind === 'reference' &&
    right.kind === 'reference' &&
    left.ref === right.ref
  ) {
    return ok(left);
  }
  return err(
    conflict(
      'UnsupportedItemsMerge',
      'merging two schemas with different items, this is unhandled',
      { field: 'items', left, right }
    )
  );
}

function mergeProperties(
  s1: SchemaValue,
  s2: SchemaValue,
  allOfContext: boolean,
  context: MergeContext
): OrderedMap<string, SchemaSource> | undefined {
  if (!s1.properties && !s2.properties) return undefined;
  const out = new OrderedMap<string, SchemaSource>();
  for (const [name, source] of s1.properties ?? []) out.set(name, source);
  for (const [name, source] of s2.properties ?? []) {
    // Second input wins without a shape comparison
    if (out.set(name, source)) {
      context.diagnostics.emit('PROPERTY_OVERRIDDEN', {
        property: name,
        allOf: allOfContext,
      });
    }
  }
  return out;
}

function flattenSide(
  schema: SchemaValue,
  side: 1 | 2,
  context: MergeContext
): Result<SchemaValue, SchemaMergeError> {
  if (!schema.allOf || schema.allOf.length === 0) return ok(schema);
  const flattened = flattenAllOf(schema.allOf, context);
  if (flattened.isErr()) {
    return err(
      new SchemaMergeError({
        kind: 'TransitiveFlattenError',
        stage: 'flatten',
        message: `error transitive merging AllOf on schema ${side}`,
        context: { side },
        cause: flattened.error,
      })
    );
  }
  return flattened;
}

/**
 * Merge two schema values into a new one.
 *
 * An input carrying its own non-empty `allOf` is first replaced by the
 * flattening of that list. `allOfContext` marks allOf-driven merges; it is
 * reported with diagnostics but no compatibility rule depends on it yet.
 */
export function mergeSchemaValues(
  first: SchemaValue,
  second: SchemaValue,
  allOfContext: boolean,
  context: MergeContext
): Result<SchemaValue, SchemaMergeError> {
  const left = flattenSide(first, 1, context);
  if (left.isErr()) return left;
  const right = flattenSide(second, 2, context);
  if (right.isErr()) return right;
  const s1 = left.value;
  const s2 = right.value;

  const result: MutableSchema = {};

  const extensions = mergeExtensions(s1, s2);
  if (extensions) result.extensions = extensions;

  const oneOf = concat(s1.oneOf, s2.oneOf);
  if (oneOf) result.oneOf = oneOf;

  const allOf = concat(s1.allOf, s2.allOf);
  if (allOf) result.allOf = allOf;

  if (s1.type && s2.type && s1.type !== s2.type) {
    return err(
      conflict('IncompatibleTypes', 'can not merge incompatible types', {
        field: 'type',
        left: s1.type,
        right: s2.type,
      })
    );
  }
  const type = s1.type ?? s2.type;
  if (type) result.type = type;

  // An unset format refines nothing, so only two different values conflict
  if (
    s1.format !== undefined &&
    s2.format !== undefined &&
    s1.format !== s2.format
  ) {
    return err(
      conflict('IncompatibleFormats', 'can not merge incompatible formats', {
        field: 'format',
        left: s1.format,
        right: s2.format,
      })
    );
  }
  const format = s1.format ?? s2.format;
  if (format !== undefined) result.format = format;

  const description = s1.description || s2.description;
  if (description) result.description = description;

  // Union rather than intersection: the merged type accepts either list
  const enumValues = concat(s1.enum, s2.enum);
  if (enumValues) result.enum = enumValues;

  if (s1.default !== undefined && s2.default !== undefined) {
    return err(
      conflict(
        'UndefinedDefaultMerge',
        'merging two sets of defaults is undefined',
        { field: 'default', left: s1.default, right: s2.default }
      )
    );
  }
  const defaultValue = s1.default !== undefined ? s1.default : s2.default;
  if (defaultValue !== undefined) result.default = defaultValue;

  const uniqueItems = mergeFlag('uniqueItems', s1, s2);
  if (uniqueItems.isErr()) return uniqueItems;
  if (uniqueItems.value !== undefined) result.uniqueItems = uniqueItems.value;

  const exclusiveMinimum = mergeBound('exclusiveMinimum', s1, s2);
  if (exclusiveMinimum.isErr()) return exclusiveMinimum;
  if (exclusiveMinimum.value) result.exclusiveMinimum = exclusiveMinimum.value;

  const exclusiveMaximum = mergeBound('exclusiveMaximum', s1, s2);
  if (exclusiveMaximum.isErr()) return exclusiveMaximum;
  if (exclusiveMaximum.value) result.exclusiveMaximum = exclusiveMaximum.value;

  for (const field of ['nullable', 'readOnly', 'writeOnly'] as const) {
    const merged = mergeFlag(field, s1, s2);
    if (merged.isErr()) return merged;
    if (merged.value !== undefined) result[field] = merged.value;
  }

  const required = concat(s1.required, s2.required);
  if (required) result.required = required;

  const properties = mergeProperties(s1, s2, allOfContext, context);
  if (properties) result.properties = properties;

  const additionalProperties = mergeAdditionalProperties(s1, s2);
  if (additionalProperties.isErr()) return additionalProperties;
  if (additionalProperties.value) {
    result.additionalProperties = additionalProperties.value;
  }

  const items = mergeItems(s1, s2);
  if (items.isErr()) return items;
  if (items.value) result.items = items.value;

  return ok(result);
}
