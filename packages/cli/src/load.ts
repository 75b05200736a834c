import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { resolve } from '@apidevtools/json-schema-ref-parser';
import { DocumentStore, ErrorCode, ParseError } from '@schemafold/core';

function toFilePath(location: string): string {
  return location.startsWith('file://')
    ? fileURLToPath(location)
    : path.resolve(location);
}

/**
 * Load a document and every file it references into a DocumentStore.
 *
 * Referenced documents are keyed by their path relative to the root
 * document's directory, which is how external `$ref` strings name them.
 * Remote (http) references are not fetched.
 */
export async function loadDocumentGraph(file: string): Promise<DocumentStore> {
  const rootPath = path.resolve(file);
  const rootDir = path.dirname(rootPath);

  let values: object;
  try {
    const refs = await resolve(rootPath, { resolve: { http: false } });
    values = refs.values();
  } catch (error) {
    throw new ParseError({
      message: `failed to load ${file}: ${error instanceof Error ? error.message : String(error)}`,
      errorCode: ErrorCode.PARSE_ERROR,
      context: { schemaPath: file },
      cause: error instanceof Error ? error : undefined,
    });
  }

  let root: unknown;
  const documents: Record<string, unknown> = {};
  const entries: Array<[string, unknown]> = Object.entries(values);
  for (const [location, document] of entries) {
    const filePath = toFilePath(location);
    if (filePath === rootPath) {
      root = document;
      continue;
    }
    const relative = path.relative(rootDir, filePath).split(path.sep).join('/');
    documents[relative] = document;
  }

  if (root === undefined) {
    throw new ParseError({
      message: `failed to load ${file}: document is empty`,
      errorCode: ErrorCode.PARSE_ERROR,
      context: { schemaPath: file },
    });
  }
  return new DocumentStore(root, { documents });
}
