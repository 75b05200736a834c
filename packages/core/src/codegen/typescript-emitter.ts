/* eslint-disable complexity */
/**
 * Renders schema sources as TypeScript type aliases
 *
 * References are emitted by name (the last pointer segment), so the output
 * of one call only declares the type named by `path`.
 */

import type { SchemaFoldError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import type { SchemaSource, SchemaValue } from '../types/schema.js';
import type { TypeGenerator } from './types.js';

export interface GeneratedTypeScript {
  name: string;
  /** Type expression usable in place of `name` */
  expression: string;
  /** `export type` declarations, dependencies first */
  declarations: string[];
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function toTypeName(segments: readonly string[]): string {
  const words = segments
    .flatMap((segment) => segment.split(/[^A-Za-z0-9]+/))
    .filter((word) => word.length > 0);
  if (words.length === 0) return 'Schema';
  const name = words
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
  return /^[0-9]/.test(name) ? `_${name}` : name;
}

export function referenceTypeName(ref: string): string {
  const hash = ref.indexOf('#');
  const pointer = hash >= 0 ? ref.slice(hash + 1) : '';
  const segment = pointer.split('/').filter(Boolean).pop();
  if (segment) {
    return toTypeName([segment.replace(/~1/g, '/').replace(/~0/g, '~')]);
  }
  const documentPath = hash >= 0 ? ref.slice(0, hash) : ref;
  const base = documentPath.split('/').pop() ?? '';
  return toTypeName([base.replace(/\.[^.]*$/, '')]);
}

function parenthesize(expression: string): string {
  return expression.includes(' | ') || expression.includes(' & ')
    ? `(${expression})`
    : expression;
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

function objectExpression(schema: SchemaValue): string {
  const required = new Set(schema.required ?? []);
  const members: string[] = [];
  for (const [name, source] of schema.properties ?? []) {
    const readonly =
      source.kind === 'inline' && source.value.readOnly ? 'readonly ' : '';
    const optional = required.has(name) ? '' : '?';
    members.push(
      `${readonly}${propertyKey(name)}${optional}: ${renderSource(source)};`
    );
  }

  const additional = schema.additionalProperties;
  if (additional?.kind === 'schema') {
    members.push(`[key: string]: ${renderSource(additional.schema)};`);
  } else if (additional?.kind === 'flag' && additional.allowed) {
    members.push('[key: string]: unknown;');
  }

  if (members.length === 0) {
    return additional ? '{}' : 'Record<string, unknown>';
  }
  return `{ ${members.join(' ')} }`;
}

function baseExpression(schema: SchemaValue): string {
  if (schema.allOf && schema.allOf.length > 0) {
    return schema.allOf
      .map((member) => parenthesize(renderSource(member)))
      .join(' & ');
  }
  if (schema.oneOf && schema.oneOf.length > 0) {
    return schema.oneOf.map(renderSource).join(' | ');
  }
  if (schema.enum && schema.enum.length > 0) {
    return [...new Set(schema.enum.map((value) => JSON.stringify(value)))].join(
      ' | '
    );
  }
  switch (schema.type) {
    case 'string':
      return 'string';
    case 'number':
    case 'integer':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'array':
      return `${parenthesize(schema.items ? renderSource(schema.items) : 'unknown')}[]`;
    case 'object':
      return objectExpression(schema);
    case undefined:
      return schema.properties || schema.additionalProperties
        ? objectExpression(schema)
        : 'unknown';
  }
}

export function renderSource(source: SchemaSource): string {
  if (source.kind === 'reference') return referenceTypeName(source.ref);
  const base = baseExpression(source.value);
  return source.value.nullable ? `${base} | null` : base;
}

function declare(name: string, expression: string, description?: string): string {
  const doc = description ? `/** ${description.replace(/\*\//g, '*\\/')} */\n` : '';
  return `${doc}export type ${name} = ${expression};`;
}

export class TypeScriptEmitter implements TypeGenerator<GeneratedTypeScript> {
  generate(
    source: SchemaSource,
    path: readonly string[]
  ): Result<GeneratedTypeScript, SchemaFoldError> {
    const name = toTypeName(path);
    const expression = renderSource(source);
    const description =
      source.kind === 'inline' ? source.value.description : undefined;
    return ok({
      name,
      expression,
      declarations: [declare(name, expression, description)],
    });
  }

  intersect(
    members: readonly GeneratedTypeScript[],
    path: readonly string[]
  ): Result<GeneratedTypeScript, SchemaFoldError> {
    const name = toTypeName(path);
    const expression = members.map((member) => member.name).join(' & ');
    return ok({
      name,
      expression,
      declarations: [
        ...members.flatMap((member) => member.declarations),
        declare(name, expression),
      ],
    });
  }
}
