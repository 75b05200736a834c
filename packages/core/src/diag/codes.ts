export const MERGE_DIAGNOSTIC_CODES = {
  SINGLE_SOURCE_PASSTHROUGH: 'SINGLE_SOURCE_PASSTHROUGH',
  LEGACY_MERGE_SELECTED: 'LEGACY_MERGE_SELECTED',
  EXTERNAL_REF_PROPAGATED: 'EXTERNAL_REF_PROPAGATED',
  ALLOF_FLATTENED: 'ALLOF_FLATTENED',
  PROPERTY_OVERRIDDEN: 'PROPERTY_OVERRIDDEN',
} as const;

export type MergeDiagnosticCode =
  (typeof MERGE_DIAGNOSTIC_CODES)[keyof typeof MERGE_DIAGNOSTIC_CODES];

export interface MergeDiagnostic {
  code: MergeDiagnosticCode;
  /** Generator naming path joined with '/', '' at the root */
  path: string;
  details?: Record<string, unknown>;
}
