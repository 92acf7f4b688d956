#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { access, constants } from 'fs/promises';
import { CONVERTER_VERSION, loadSectionNames } from '@cisbench/types';
import { convertBenchmark } from './convert.js';
import {
  CliOptionsSchema,
  OUTPUT_FORMATS,
  envBool,
  envString,
  formatValidationError,
  resolveOutputPath,
} from './options.js';
import { createConsoleReporter } from './reporter.js';

const program = new Command();

program
  .name('cis-audit')
  .description('Convert a CIS Benchmark PDF into a multi-sheet Excel audit checklist')
  .version(CONVERTER_VERSION)
  .argument('<input-pdf>', 'Path to the CIS Benchmark PDF')
  .argument('[output-file]', 'Output file path (default: <input-stem>_Audit_Checklist.xlsx)')
  .option('-o, --output <file>', 'Output file path (alternative to the positional argument)', envString('CIS_OUTPUT_FILE'))
  .option(
    '-f, --format <format>',
    `Output format (${OUTPUT_FORMATS.join(', ')})`,
    envString('CIS_FORMAT') ?? 'xlsx'
  )
  .option('--section-names <file>', 'JSON file mapping section numbers to sheet names', envString('CIS_SECTION_NAMES'))
  .option('-q, --quiet', 'Suppress progress output', envBool('CIS_QUIET', false))
  .addHelpText('after', `
Examples:
  $ cis-audit CIS_Ubuntu_22_04.pdf
  $ cis-audit CIS_Windows_Server_2022.pdf Win_2022_Audit.xlsx
  $ cis-audit CIS_FortiGate_7_4.pdf --output FortiGate_Audit.xlsx
  $ cis-audit CIS_Ubuntu_22_04.pdf --format json`)
  .action(async (inputPdf: string, outputFile: string | undefined, rawOptions: Record<string, unknown>) => {
    try {
      const parsed = CliOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        console.error(`[ERROR] ${formatValidationError(parsed.error)}`);
        process.exit(1);
      }
      const options = parsed.data;
      const outputPath = resolveOutputPath(inputPdf, outputFile, options.output, options.format);

      if (!options.quiet) {
        console.log('='.repeat(80));
        console.log('CIS BENCHMARK PDF TO EXCEL CONVERTER');
        console.log('='.repeat(80));
        console.log(`[INFO] Input PDF: ${inputPdf}`);
        console.log(`[INFO] Output: ${outputPath}`);
      }

      if (!(await fileExists(inputPdf))) {
        console.error(`[ERROR] File not found: ${inputPdf}`);
        process.exit(1);
      }

      const sectionNames = options.sectionNames !== undefined
        ? await loadSectionNames(options.sectionNames)
        : undefined;

      const { result, sheets } = await convertBenchmark(inputPdf, {
        outputPath,
        format: options.format,
        sectionNames,
        onProgress: createConsoleReporter(options.quiet),
      });

      for (const warning of result.warnings) {
        console.error(`[WARN] ${warning}`);
      }

      if (!options.quiet) {
        console.log('');
        console.log('=== Conversion Summary ===');
        if (options.format === 'xlsx') {
          console.log(`Total sheets:   ${sheets} (1 Index + ${result.sections.length} Sections)`);
        }
        console.log(`Total controls: ${result.recommendations.length}`);
        console.log(`Output:         ${outputPath}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

// Helper to check if file exists
async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

await program.parseAsync();
