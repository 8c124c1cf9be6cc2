#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { TOOL_VERSION, describeError } from '@bankrecon/types';
import type { RunConfig } from '@bankrecon/types';
import { runReconciliation } from '@bankrecon/engine';
import { createRunLogger, formatRunSummary } from '@bankrecon/output';
import { envBool, resolveConfig, type CliOptions } from './config.js';

const program = new Command();

program
  .name('bank-recon')
  .description('Merge per-bank mainframe extracts into one reconciled workbook per bank and flow')
  .version(TOOL_VERSION)
  .option('-b, --base-dir <dir>', 'Directory with bank extract files', process.env['RECON_BASE_DIR'])
  .option('-p, --pac-file <file>', 'PAC lookup export (xlsx)', process.env['RECON_PAC_FILE'])
  .option('-v, --verbose', 'Echo progress to the console', envBool('RECON_VERBOSE', false))
  .option('--only-bank <id>', 'Process only one bank', process.env['RECON_ONLY_BANK'])
  .option('--skip-pm', 'Skip PM processing', envBool('RECON_SKIP_PM', false))
  .option('--skip-bm', 'Skip BM processing', envBool('RECON_SKIP_BM', false))
  .option('-o, --output-dir <dir>', 'Directory for output workbooks', process.env['RECON_OUTPUT_DIR'])
  .option('--log-file <file>', 'Run log file', process.env['RECON_LOG_FILE'])
  .option('--key-column <name>', 'Customer key column', process.env['RECON_KEY_COLUMN'])
  .action(async (options: CliOptions) => {
    let config: RunConfig;
    try {
      config = resolveConfig(options);
    } catch (error) {
      console.error(`[ERROR] ${describeError(error)}`);
      process.exitCode = 1;
      return;
    }

    const logger = createRunLogger({ logFile: config.logFile, verbose: config.verbose });
    logger.info(`bank-recon ${TOOL_VERSION}`);
    logger.info(`Base directory: ${config.baseDir}`);
    logger.info(`PAC file: ${config.lookupFile}`);
    logger.info(`Output directory: ${config.outputDir}`);

    const result = await runReconciliation(
      {
        baseDir: config.baseDir,
        lookupFile: config.lookupFile,
        outputDir: config.outputDir,
        ...(config.onlyBank !== undefined ? { onlyBank: config.onlyBank } : {}),
        skipPm: config.skipPm,
        skipBm: config.skipBm,
        keyColumn: config.keyColumn,
      },
      { logger }
    );

    if (result.status === 'fatal') {
      process.exitCode = 1;
      return;
    }

    logger.report(formatRunSummary(result.summary, result.flows));
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  console.error(`[ERROR] ${describeError(error)}`);
  process.exitCode = 1;
}
