import {
  formatDiagnostic,
  type MergeDiagnostic,
  type ResolvedMergeOptions,
} from '@schemafold/core';

/**
 * Print effective configuration and merge diagnostics to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printMergeDebug(
  options: ResolvedMergeOptions,
  diagnostics: readonly MergeDiagnostic[]
): void {
  process.stderr.write(
    `[schemafold] effective config: ${JSON.stringify(options)}\n`
  );
  if (diagnostics.length === 0) {
    process.stderr.write('[schemafold] diagnostics: []\n');
    return;
  }
  for (const diagnostic of diagnostics) {
    process.stderr.write(`[schemafold] ${formatDiagnostic(diagnostic)}\n`);
  }
}
