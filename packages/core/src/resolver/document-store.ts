/* eslint-disable complexity */
/**
 * In-memory document store resolving `$ref` strings against loaded documents
 *
 * Local references (`#/...`) address the root document. External references
 * (`other.json#/...`) address the document registered under that path,
 * relative to the root document's directory. `locate` reports which document
 * a value was finally read from.
 */

import path from 'node:path';

import { parseSchemaValue, isRecord } from '../parser/schema-parser.js';
import { SchemaMergeError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { SchemaSource, SchemaValue } from '../types/schema.js';
import type { LocatedSchema, SchemaResolver } from './types.js';

export interface SplitReference {
  /** '' for local references */
  documentPath: string;
  /** JSON pointer without the leading '#', '' for the document root */
  pointer: string;
}

/**
 * Split a reference on its fragment marker. Anything other than one or two
 * parts is unsupported.
 */
export function splitReference(
  ref: string
): Result<SplitReference, SchemaMergeError> {
  const parts = ref.split('#');
  if (parts.length < 1 || parts.length > 2) {
    return err(
      new SchemaMergeError({
        kind: 'UnsupportedReference',
        stage: 'resolve',
        message: `unsupported reference: ${ref}`,
        context: { ref },
      })
    );
  }
  return ok({ documentPath: parts[0] ?? '', pointer: parts[1] ?? '' });
}

export function normalizeDocumentPath(documentPath: string): string {
  if (documentPath === '') return '';
  return path.posix.normalize(documentPath.replace(/\\/g, '/'));
}

function decodePointer(pointer: string): string[] | undefined {
  if (pointer === '' || pointer === '/') return [];
  if (!pointer.startsWith('/')) return undefined;
  const tokens: string[] = [];
  for (const rawToken of pointer.slice(1).split('/')) {
    let token: string;
    try {
      token = decodeURIComponent(rawToken);
    } catch (error) {
      if (error instanceof URIError) return undefined;
      throw error;
    }
    tokens.push(token.replace(/~1/g, '/').replace(/~0/g, '~'));
  }
  return tokens;
}

function walk(document: unknown, tokens: readonly string[]): unknown {
  let current: unknown = document;
  for (const token of tokens) {
    if (Array.isArray(current)) {
      const idx = Number(token);
      if (!Number.isInteger(idx) || idx < 0) return undefined;
      current = current[idx];
    } else if (isRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, token)) {
        return undefined;
      }
      current = current[token];
    } else {
      return undefined;
    }
  }
  return current;
}

export interface DocumentStoreOptions {
  /** Additional documents keyed by path relative to the root document */
  documents?: Record<string, unknown>;
  /** Maximum `$ref` → `$ref` hops followed for one lookup (default: 16) */
  maxRefHops?: number;
}

export class DocumentStore implements SchemaResolver {
  readonly #documents = new Map<string, unknown>();
  readonly #cache = new Map<string, LocatedSchema>();
  readonly #maxRefHops: number;

  constructor(rootDocument: unknown, options: DocumentStoreOptions = {}) {
    this.#documents.set('', rootDocument);
    for (const [documentPath, document] of Object.entries(
      options.documents ?? {}
    )) {
      this.addDocument(documentPath, document);
    }
    this.#maxRefHops = options.maxRefHops ?? 16;
  }

  addDocument(documentPath: string, document: unknown): void {
    this.#documents.set(normalizeDocumentPath(documentPath), document);
  }

  hasDocument(documentPath: string): boolean {
    return this.#documents.has(normalizeDocumentPath(documentPath));
  }

  resolve(source: SchemaSource): Result<SchemaValue, SchemaMergeError> {
    if (source.kind === 'inline') return ok(source.value);
    return this.resolveRef(source.ref);
  }

  locate(source: SchemaSource): Result<LocatedSchema, SchemaMergeError> {
    if (source.kind === 'inline') {
      return ok({ value: source.value, documentPath: '' });
    }
    return this.locateRef(source.ref);
  }

  resolveRef(ref: string): Result<SchemaValue, SchemaMergeError> {
    const located = this.locateRef(ref);
    if (located.isErr()) return located;
    return ok(located.value.value);
  }

  /**
   * Follow `ref` through any `$ref` hops. The returned document path names
   * the document of the last hop, which may differ from the one in `ref`.
   */
  locateRef(ref: string): Result<LocatedSchema, SchemaMergeError> {
    const seen = new Set<string>();
    let current = ref;

    for (let hop = 0; hop <= this.#maxRefHops; hop++) {
      const split = splitReference(current);
      if (split.isErr()) return split;
      const documentPath = normalizeDocumentPath(split.value.documentPath);
      const key = `${documentPath}#${split.value.pointer}`;

      const cached = this.#cache.get(key);
      if (cached) return ok(cached);

      if (seen.has(key)) {
        return err(
          new SchemaMergeError({
            kind: 'CircularComposition',
            stage: 'resolve',
            message: `circular $ref chain starting at ${ref}`,
            context: { ref, chain: [...seen] },
          })
        );
      }
      seen.add(key);

      const raw = this.#lookup(documentPath, split.value.pointer);
      if (raw === undefined) {
        return err(
          new SchemaMergeError({
            kind: 'MissingSchemaValue',
            stage: 'resolve',
            message: `reference ${current} does not resolve to a schema`,
            context: { ref: current },
          })
        );
      }

      if (isRecord(raw) && typeof raw.$ref === 'string') {
        // Local hops inside an external document stay in that document
        current =
          raw.$ref.startsWith('#') && documentPath !== ''
            ? `${documentPath}${raw.$ref}`
            : raw.$ref;
        continue;
      }

      const parsed = parseSchemaValue(raw, key);
      if (parsed.isErr()) {
        return err(
          new SchemaMergeError({
            kind: 'MalformedSchema',
            stage: 'resolve',
            message: `reference ${current} points at a malformed schema: ${parsed.error.message}`,
            context: { ref: current, schemaPath: parsed.error.schemaPath },
            cause: parsed.error,
          })
        );
      }
      const located: LocatedSchema = { value: parsed.value, documentPath };
      this.#cache.set(key, located);
      return ok(located);
    }

    return err(
      new SchemaMergeError({
        kind: 'CircularComposition',
        stage: 'resolve',
        message: `reference ${ref} exceeds ${this.#maxRefHops} $ref hops`,
        context: { ref },
      })
    );
  }

  #lookup(documentPath: string, pointer: string): unknown {
    if (!this.#documents.has(documentPath)) return undefined;
    const tokens = decodePointer(pointer);
    if (!tokens) return undefined;
    return walk(this.#documents.get(documentPath), tokens);
  }
}
