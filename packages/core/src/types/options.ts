/**
 * Configuration options for the allOf merge engine
 *
 * All options are optional with conservative defaults. Options are passed to
 * each orchestrator explicitly; nothing is read from process-wide state.
 */

import { ConfigError } from './errors.js';

/**
 * Backward-compatibility switches
 */
export interface CompatibilityOptions {
  /**
   * Route allOf through the legacy strategy, which generates each member on
   * its own and intersects the results instead of flattening (default: false)
   */
  oldMergeSchemas?: boolean;
}

/**
 * Safety guards against runaway nesting
 */
export interface GuardsOptions {
  /** Maximum nested allOf depth flattened before failing (default: 32) */
  maxAllOfDepth?: number;
}

export type DiagnosticsMode = 'off' | 'collect';

export interface MergeOptions {
  compatibility?: CompatibilityOptions;
  guards?: GuardsOptions;
  /** Whether merge diagnostics are recorded (default: 'collect') */
  diagnostics?: DiagnosticsMode;
}

export interface ResolvedMergeOptions {
  compatibility: Required<CompatibilityOptions>;
  guards: Required<GuardsOptions>;
  diagnostics: DiagnosticsMode;
}

export const DEFAULT_OPTIONS: ResolvedMergeOptions = {
  compatibility: {
    oldMergeSchemas: false,
  },
  guards: {
    maxAllOfDepth: 32,
  },
  diagnostics: 'collect',
};

/**
 * Resolves user options into a complete configuration
 *
 * @throws {ConfigError} When an option holds an invalid value
 */
export function resolveOptions(
  userOptions: MergeOptions = {}
): ResolvedMergeOptions {
  const resolved: ResolvedMergeOptions = {
    compatibility: {
      ...DEFAULT_OPTIONS.compatibility,
      ...userOptions.compatibility,
    },
    guards: { ...DEFAULT_OPTIONS.guards, ...userOptions.guards },
    diagnostics: userOptions.diagnostics ?? DEFAULT_OPTIONS.diagnostics,
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedMergeOptions): void {
  if (typeof options.compatibility.oldMergeSchemas !== 'boolean') {
    throw new ConfigError({
      message: 'compatibility.oldMergeSchemas must be boolean',
      setting: 'compatibility.oldMergeSchemas',
    });
  }

  const depth = options.guards.maxAllOfDepth;
  if (!Number.isInteger(depth) || depth <= 0) {
    throw new ConfigError({
      message: 'guards.maxAllOfDepth must be a positive integer',
      setting: 'guards.maxAllOfDepth',
      context: { value: depth },
    });
  }

  if (options.diagnostics !== 'off' && options.diagnostics !== 'collect') {
    throw new ConfigError({
      message: "diagnostics must be 'off' or 'collect'",
      setting: 'diagnostics',
    });
  }
}
