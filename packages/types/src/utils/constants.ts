export const CONVERTER_VERSION = '1.0.0';

export const DEFAULT_PROFILE = 'Level 1';

/**
 * Hard character caps per field. Truncation is a plain cutoff.
 */
export const FIELD_LIMITS = {
  description: 1500,
  rationale: 1000,
  impact: 1000,
  audit: 2500,
  remediation: 1500,
  defaultValue: 500,
  references: 800,
} as const;

export type LimitedField = keyof typeof FIELD_LIMITS;

/** Spreadsheet sheet-name length limit */
export const MAX_SHEET_NAME_LENGTH = 31;

export const ROW_HEIGHT = {
  PER_LINE: 14,
  MIN: 80,
  MAX: 350,
} as const;

export const OUTPUT_SUFFIX = '_Audit_Checklist';
