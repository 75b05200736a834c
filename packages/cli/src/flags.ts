import { ConfigError, type MergeOptions } from '@schemafold/core';

export type OutputFormat = 'ts' | 'json';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  schema?: string;
  name?: string;
  out?: string;
  oldMergeSchemas?: boolean;
  maxAllofDepth?: string | number;
  debug?: boolean;
  [key: string]: unknown;
}

/**
 * Parse CLI options into MergeOptions configuration
 */
export function parseMergeOptions(options: CliOptions): MergeOptions {
  const mergeOptions: MergeOptions = {};

  if (options.oldMergeSchemas !== undefined) {
    mergeOptions.compatibility = { oldMergeSchemas: options.oldMergeSchemas };
  }

  if (options.maxAllofDepth !== undefined) {
    mergeOptions.guards = {
      maxAllOfDepth: parseDepth(options.maxAllofDepth),
    };
  }

  return mergeOptions;
}

function parseDepth(value: string | number): number {
  const depth = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(depth) || depth <= 0) {
    throw new ConfigError({
      message: `--max-allof-depth must be a positive integer, got "${value}"`,
      setting: 'guards.maxAllOfDepth',
    });
  }
  return depth;
}

export function resolveOutputFormat(out: string | undefined): OutputFormat {
  const format = (out ?? 'ts').toLowerCase();
  if (format === 'ts' || format === 'json') return format;
  throw new ConfigError({
    message: `--out must be ts or json, got "${out}"`,
    setting: 'out',
  });
}

/**
 * Type name for the merged schema: `--name`, or the last segment of the
 * schema pointer.
 */
export function resolveTypeName(
  pointer: string,
  name: string | undefined
): string {
  if (name !== undefined && name.trim() !== '') return name.trim();
  const hash = pointer.indexOf('#');
  const fragment = hash >= 0 ? pointer.slice(hash + 1) : pointer;
  const segment = fragment.split('/').filter(Boolean).pop();
  return segment ? segment.replace(/~1/g, '/').replace(/~0/g, '~') : 'Schema';
}
