#!/usr/bin/env node
/* eslint-disable complexity */

// CLI entry point
// - Command name: `schemafold` with the `merge` subcommand.
// - `merge` loads an OpenAPI/JSON document (and the files it references), selects a
//   schema by JSON pointer and merges its allOf list through the core engine, then prints
//   a TypeScript alias (--out ts) or the merged schema (--out json).

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorCode,
  ErrorPresenter,
  SchemaDocumentEmitter,
  SchemaFoldError,
  TypeScriptEmitter,
  isSchemaFoldError,
  inline,
  mergeAllOf,
  qualifyLocalReferences,
  reference,
  resolveOptions,
  type MergeDiagnostic,
  type ResolvedMergeOptions,
} from '@schemafold/core';
import { renderCLIView } from './render.js';
import {
  parseMergeOptions,
  resolveOutputFormat,
  resolveTypeName,
  type CliOptions,
} from './flags.js';
import { loadDocumentGraph } from './load.js';
import { printMergeDebug } from './debug.js';

export interface MergeRun {
  output: string;
  options: ResolvedMergeOptions;
  diagnostics: readonly MergeDiagnostic[];
}

function normalizePointer(pointer: string): string {
  if (pointer.startsWith('/')) return `#${pointer}`;
  return pointer;
}

/**
 * Load `document`, select `options.schema` and merge its allOf list.
 *
 * @throws {SchemaFoldError} On load, configuration or merge failures
 */
export async function runMerge(
  document: string,
  options: CliOptions
): Promise<MergeRun> {
  if (!options.schema) {
    throw new ConfigError({
      message: 'Missing --schema <pointer>',
      setting: 'schema',
    });
  }
  const pointer = normalizePointer(options.schema);
  const format = resolveOutputFormat(options.out);
  const mergeOptions = parseMergeOptions(options);
  const resolved = resolveOptions(mergeOptions);
  const path = [resolveTypeName(pointer, options.name)];

  const store = await loadDocumentGraph(document);
  const located = store.locate(reference(pointer));
  if (located.isErr()) throw located.error;
  // An alias into another document brings that document's local refs along
  const { value: selected } = qualifyLocalReferences(
    located.value.value,
    located.value.documentPath
  );
  // A schema without allOf goes through as the only member
  const sources = selected.allOf ?? [inline(selected)];

  if (format === 'json') {
    const { result, diagnostics } = mergeAllOf(sources, path, {
      resolver: store,
      generator: new SchemaDocumentEmitter(),
      options: mergeOptions,
    });
    if (result.isErr()) throw result.error;
    return {
      output: JSON.stringify(result.value, null, 2),
      options: resolved,
      diagnostics,
    };
  }

  const { result, diagnostics } = mergeAllOf(sources, path, {
    resolver: store,
    generator: new TypeScriptEmitter(),
    options: mergeOptions,
  });
  if (result.isErr()) throw result.error;
  return {
    output: result.value.declarations.join('\n\n'),
    options: resolved,
    diagnostics,
  };
}

const program = new Command();

program
  .name('schemafold')
  .description('Merge OpenAPI allOf compositions into single schemas')
  .version('0.1.0');

program
  .command('merge')
  .description('Merge the allOf list of one schema and print the result')
  .argument('<document>', 'OpenAPI or JSON Schema document (JSON or YAML)')
  .requiredOption(
    '-s, --schema <pointer>',
    'JSON pointer of the schema to merge, e.g. #/components/schemas/Pet'
  )
  .option('--name <type>', 'Name of the generated type')
  .option('--out <format>', 'Output format: ts|json', 'ts')
  .option(
    '--old-merge-schemas',
    'Use the legacy strategy (generate members separately and intersect)'
  )
  .option('--max-allof-depth <number>', 'Maximum nested allOf depth')
  .option('--debug', 'Print effective configuration and diagnostics to stderr')
  .action(async (document: string, options: CliOptions) => {
    try {
      const run = await runMerge(document, options);
      if (options.debug) {
        printMergeDebug(run.options, run.diagnostics);
      }
      process.stdout.write(`${run.output}\n`);
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

class UnexpectedCliError extends SchemaFoldError {}

export function toSchemaFoldError(err: unknown): SchemaFoldError {
  if (isSchemaFoldError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new UnexpectedCliError({
    message: message || 'Unexpected error',
    errorCode: ErrorCode.INTERNAL_ERROR,
    cause: err instanceof Error ? err : undefined,
  });
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });
  const error = toSchemaFoldError(err);

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
