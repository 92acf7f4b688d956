import { readFile } from 'fs/promises';
import { SectionNamesSchema, type SectionNames } from '../schemas/index.js';

/**
 * Display names for top-level benchmark sections. CIS benchmarks for
 * different platforms name their sections differently, so these are generic
 * and can be replaced with `loadSectionNames`.
 */
export const DEFAULT_SECTION_NAMES: SectionNames = Object.freeze({
  '1': 'Initial Setup',
  '2': 'System Configuration',
  '3': 'Network & Services',
  '4': 'Security Profiles',
  '5': 'Access Control',
  '6': 'Authentication',
  '7': 'Logging & Monitoring',
  '8': 'System Maintenance',
  '9': 'Additional Hardening',
});

/**
 * Display name for a section key, falling back to "Section N" when unmapped.
 */
export function resolveSectionName(
  sectionKey: string,
  names: SectionNames = DEFAULT_SECTION_NAMES
): string {
  return names[sectionKey] ?? `Section ${sectionKey}`;
}

/**
 * Load section names from a JSON object file (`{ "1": "Identity" }`).
 * Entries override the defaults; keys not present keep their default name.
 */
export async function loadSectionNames(filePath: string): Promise<SectionNames> {
  const raw = await readFile(filePath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Section names file is not valid JSON (${filePath}): ${message}`);
  }

  const parsed = SectionNamesSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid section names file (${filePath}): ${issues}`);
  }

  return Object.freeze({ ...DEFAULT_SECTION_NAMES, ...parsed.data });
}
