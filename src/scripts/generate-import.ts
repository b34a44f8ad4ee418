#!/usr/bin/env node
/**
 * CLI script for turning a customer order workbook into provisioning import CSVs
 */

import 'dotenv/config';
import * as path from 'path';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { Command, Option } from 'commander';
import { generateProvisioningExport } from '../core/export-processor.js';
import { SUPPORTED_EXTENSIONS } from '../parsers/order-form-parser.js';
import { getConfig } from '../utils/config.js';
import { configureLogger, logger } from '../utils/logger.js';
import { describeError, handleError } from '../utils/error-handler.js';
import type { BlankPilotPolicy, ExportResult } from '../types/index.js';

interface GenerateOptions {
  outDir: string;
  combined?: boolean;
  rateCenters: boolean;
  blankPilot?: 'skip' | 'members-only';
  dryRun?: boolean;
}

const BLANK_PILOT_POLICIES: Record<'skip' | 'members-only', BlankPilotPolicy> = {
  'skip': 'skip',
  'members-only': 'membersOnly',
};

function printSummary(result: ExportResult): void {
  const { counts } = result;

  console.log('\n=== Provisioning Import Summary ===');
  console.log(`Customer:           ${result.customerName || '(blank)'}`);
  console.log(`Region:             ${result.region || '(blank)'}`);
  console.log(`Number blocks:      ${counts.numberBlock}`);
  console.log(`Departments:        ${counts.department}`);
  console.log(`Subscribers:        ${counts.subscriber}`);
  console.log(`Managed devices:    ${counts.managedDevice}`);
  console.log(`Intercom ranges:    ${counts.intercomRange}`);
  console.log(`Hunt groups:        ${counts.huntGroup}`);
  console.log(`Hunt group pilots:  ${counts.huntGroupPilot}`);

  if (result.warnings.length > 0) {
    console.log('\nWarnings:');
    for (const warning of result.warnings) {
      console.log(`  - ${warning}`);
    }
  }
}

const program = new Command();

program
  .name('generate-import')
  .description('Generate provisioning import CSV files from a customer order workbook')
  .argument('<workbook>', 'Path to the order workbook (.xlsx, .xlsm, .xls)')
  .option('-o, --out-dir <dir>', 'Directory to write the CSV files to', process.cwd())
  .option('--combined', 'Write a single combined file instead of two')
  .option('--no-rate-centers', 'Skip NPA-NXX lookups and use the engineering sheet defaults')
  .addOption(
    new Option('--blank-pilot <policy>', 'Hunt groups without a pilot number').choices(['skip', 'members-only'])
  )
  .option('--dry-run', 'Parse and build without writing any files')
  .action(async (workbookPath: string, opts: GenerateOptions) => {
    try {
      const ext = path.extname(workbookPath).slice(1).toLowerCase();
      if (!SUPPORTED_EXTENSIONS.includes(ext)) {
        console.error(`Unsupported file type: .${ext}`);
        console.error(`Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`);
        process.exit(1);
      }

      const config = getConfig();
      configureLogger(config.logging);

      const filename = path.basename(workbookPath);
      logger.info('Generating provisioning import', { workbook: workbookPath, options: opts });

      const buffer = await readFile(workbookPath);
      const result = await generateProvisioningExport(
        buffer,
        {
          config,
          mode: opts.combined ? 'combined' : undefined,
          enrichRateCenters: opts.rateCenters ? undefined : false,
          blankPilotPolicy: opts.blankPilot === undefined ? undefined : BLANK_PILOT_POLICIES[opts.blankPilot],
        },
        filename
      );

      if (opts.dryRun) {
        for (const file of result.files) {
          console.log(`[DRY RUN] Would write ${path.join(opts.outDir, file.filename)}`);
        }
      } else {
        await mkdir(opts.outDir, { recursive: true });
        for (const file of result.files) {
          const outPath = path.join(opts.outDir, file.filename);
          await writeFile(outPath, file.content, 'utf-8');
          console.log(`[SUCCESS] ${outPath}`);
        }
      }

      printSummary(result);
      logger.info('Provisioning import complete', { files: result.files.map((file) => file.filename) });
    } catch (error) {
      console.error(`\nError: ${describeError(error)}`);
      handleError(error, workbookPath);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  handleError(error);
  process.exit(1);
});
