import { parse as parsePath } from 'path';
import { z } from 'zod';
import { OUTPUT_SUFFIX } from '@cisbench/types';

export const OUTPUT_FORMATS = ['xlsx', 'json'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export const CliOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  format: z.enum(OUTPUT_FORMATS, {
    errorMap: () => ({ message: `Format must be one of: ${OUTPUT_FORMATS.join(', ')}` }),
  }),
  sectionNames: z.string().min(1).optional(),
  quiet: z.boolean(),
});

// Helper to parse boolean env vars
export const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

// Empty env vars count as unset
export const envString = (key: string): string | undefined => {
  const val = process.env[key];
  return val === undefined || val === '' ? undefined : val;
};

/**
 * Output path precedence: positional argument, then --output, then
 * "<input-stem>_Audit_Checklist.<ext>" in the working directory.
 */
export function resolveOutputPath(
  inputPdf: string,
  positionalOutput: string | undefined,
  flagOutput: string | undefined,
  format: OutputFormat = 'xlsx'
): string {
  if (positionalOutput !== undefined && positionalOutput !== '') {
    return positionalOutput;
  }
  if (flagOutput !== undefined && flagOutput !== '') {
    return flagOutput;
  }
  return `${parsePath(inputPdf).name}${OUTPUT_SUFFIX}.${format}`;
}

export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
