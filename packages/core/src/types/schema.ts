/**
 * Schema object model consumed and produced by the merge engine.
 *
 * Values are treated as immutable once parsed; the engine only ever builds
 * new values from them.
 */

import type { OrderedMap } from '../util/ordered-map.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export const PRIMITIVE_TYPES = [
  'object',
  'array',
  'string',
  'number',
  'integer',
  'boolean',
] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

/**
 * exclusiveMinimum / exclusiveMaximum: a boolean modifier of minimum/maximum
 * in OpenAPI 3.0, a numeric bound of its own in OpenAPI 3.1.
 */
export type ExclusiveBound =
  | { readonly kind: 'flag'; readonly exclusive: boolean }
  | { readonly kind: 'numeric'; readonly value: number };

/**
 * Explicit additionalProperties. An absent field is `undefined` and is not
 * the same as `{ kind: 'flag', allowed: true }`.
 */
export type AdditionalProperties =
  | { readonly kind: 'flag'; readonly allowed: boolean }
  | { readonly kind: 'schema'; readonly schema: SchemaSource };

export interface SchemaValue {
  readonly type?: PrimitiveType;
  readonly format?: string;
  readonly description?: string;
  readonly enum?: readonly JsonValue[];
  /** `null` is a present default; `undefined` means none */
  readonly default?: JsonValue;
  readonly exclusiveMinimum?: ExclusiveBound;
  readonly exclusiveMaximum?: ExclusiveBound;
  readonly uniqueItems?: boolean;
  readonly nullable?: boolean;
  readonly readOnly?: boolean;
  readonly writeOnly?: boolean;
  readonly required?: readonly string[];
  readonly properties?: OrderedMap<string, SchemaSource>;
  readonly additionalProperties?: AdditionalProperties;
  readonly items?: SchemaSource;
  /** Vendor extensions (`x-*` keys) */
  readonly extensions?: OrderedMap<string, JsonValue>;
  readonly allOf?: readonly SchemaSource[];
  readonly oneOf?: readonly SchemaSource[];
}

export interface InlineSchemaSource {
  readonly kind: 'inline';
  readonly value: SchemaValue;
}

export interface ReferenceSchemaSource {
  readonly kind: 'reference';
  readonly ref: string;
}

export type SchemaSource = InlineSchemaSource | ReferenceSchemaSource;

export function inline(value: SchemaValue): InlineSchemaSource {
  return { kind: 'inline', value };
}

export function reference(ref: string): ReferenceSchemaSource {
  return { kind: 'reference', ref };
}

/**
 * Local references address the same document and start with a fragment.
 */
export function isLocalReference(source: SchemaSource): boolean {
  return source.kind === 'reference' && source.ref.startsWith('#');
}

export function isPrimitiveType(value: unknown): value is PrimitiveType {
  return (
    typeof value === 'string' &&
    PRIMITIVE_TYPES.some((candidate) => candidate === value)
  );
}
