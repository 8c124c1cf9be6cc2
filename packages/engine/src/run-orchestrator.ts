import { join } from 'path';
import {
  DEFAULT_KEY_COLUMN,
  FLOW_EXTENSIONS,
  DirectoryError,
  ShapeMismatchError,
  describeError,
  formatDateStamp,
} from '@bankrecon/types';
import type {
  FileOutcome,
  FileSetIndex,
  FlowKind,
  FlowOutcome,
  LookupRow,
  ReconciliationError,
  RunLogger,
  RunSummary,
  Table,
} from '@bankrecon/types';
import { formatList, writeTableXlsx } from '@bankrecon/output';
import { scanBankFiles, validateDirectory, listBankFilesByType } from './file-set-indexer.js';
import { checkConsistency } from './consistency-checker.js';
import { mergeCategoryFiles } from './category-merger.js';
import { readExtractFile } from './extract-reader.js';
import { reconcileDuplicates } from './duplicate-reconciler.js';
import { loadLookupTable } from './lookup-table.js';
import { enrichWithLookup } from './enricher.js';
import { summarizeDataset } from './dataset-summarizer.js';
import { RunSummaryRecorder } from './run-summary.js';

export interface RunOptions {
  baseDir: string;
  lookupFile: string;
  outputDir: string;
  onlyBank?: string;
  skipPm?: boolean;
  skipBm?: boolean;
  keyColumn?: string;
}

export type TableWriter = (table: Table, filePath: string) => Promise<void>;

export interface RunDependencies {
  logger: RunLogger;
  writeTable?: TableWriter;
  loadLookup?: (filePath: string) => Promise<LookupRow[]>;
  readExtract?: (filePath: string) => Promise<Table>;
  now?: () => Date;
}

export type RunResult =
  | { status: 'completed'; summary: RunSummary; flows: FlowOutcome[] }
  | { status: 'fatal'; summary: RunSummary; flows: FlowOutcome[]; error: ReconciliationError };

interface RunContext {
  options: RunOptions;
  index: FileSetIndex;
  logger: RunLogger;
  recorder: RunSummaryRecorder;
  writeTable: TableWriter;
  readExtract: (filePath: string) => Promise<Table>;
  lookup: () => Promise<LookupRow[]>;
  dateStamp: string;
  keyColumn: string;
}

const FLOW_LABELS: Record<FlowKind, string> = {
  pm: 'PM',
  bm: 'BM',
};

export function outputFileName(bankId: string, flow: FlowKind, dateStamp: string): string {
  return flow === 'pm' ? `${bankId}_${dateStamp}.xlsx` : `${bankId}_BM_${dateStamp}.xlsx`;
}

function logFileOutcome(logger: RunLogger, outcome: FileOutcome): void {
  switch (outcome.status) {
    case 'merged':
      logger.info(`Merged: ${outcome.fileName} as '${outcome.category}' (${outcome.rowCount} rows)`);
      break;
    case 'no-data':
      logger.warn(`Skipped: ${outcome.fileName} (no data: ${outcome.reason})`);
      break;
    case 'error':
      logger.warn(`Error in ${outcome.fileName}: ${outcome.error}`);
      break;
  }
}

async function executeFlow(ctx: RunContext, bankId: string, flow: FlowKind): Promise<FlowOutcome> {
  const { logger, recorder } = ctx;
  const label = FLOW_LABELS[flow];
  const extension = FLOW_EXTENSIONS[flow];

  recorder.entry(bankId);
  const files = listBankFilesByType(ctx.index, bankId, extension);
  if (files.length === 0) {
    logger.warn(`No ${label} (${extension}) files found for bank ${bankId}`);
    return { bankId, flow, status: 'skipped', reason: 'no-files' };
  }

  logger.info(`${label} flow for bank ${bankId}: ${files.length} file(s)`);
  const merge = await mergeCategoryFiles(ctx.options.baseDir, files, {
    readFile: ctx.readExtract,
    onFileOutcome: (outcome) => logFileOutcome(logger, outcome),
  });
  recorder.recordFileOutcomes(bankId, merge.outcomes);

  if (merge.table.rows.length === 0) {
    logger.warn(`No ${label} data merged for bank ${bankId}`);
    return { bankId, flow, status: 'skipped', reason: 'no-data' };
  }

  const reconciled = reconcileDuplicates(merge.table, {
    keyColumn: ctx.keyColumn,
    flagColumns: merge.categories.values(),
  });
  logger.info(
    `Reconciled ${merge.table.rows.length} rows into ${reconciled.groups} customers for bank ${bankId}`
  );
  if (reconciled.droppedWithoutKey > 0) {
    logger.warn(`Dropped ${reconciled.droppedWithoutKey} row(s) without ${ctx.keyColumn} for bank ${bankId}`);
  }

  let table = reconciled.table;
  if (flow === 'bm') {
    const lookup = await ctx.lookup();
    const enriched = enrichWithLookup(table, bankId, lookup, { keyColumn: ctx.keyColumn });
    if (!enriched.bankFound) {
      const note = `No lookup data found for bank ${bankId}`;
      recorder.addNote(bankId, note);
      logger.info(note);
    } else {
      logger.info(
        `Enriched BM data with PAC for bank ${bankId}: ${enriched.matched} matched, ${enriched.unmatched} unmatched`
      );
    }
    table = enriched.table;
  }

  const dataset = summarizeDataset(table);
  recorder.recordDataset(bankId, dataset.stats);

  const outputPath = join(ctx.options.outputDir, outputFileName(bankId, flow, ctx.dateStamp));
  await ctx.writeTable(dataset.table, outputPath);
  logger.info(`Saved ${label} workbook: ${outputPath}`);

  return {
    bankId,
    flow,
    status: 'completed',
    outputPath,
    rowCount: dataset.table.rows.length,
    stats: dataset.stats,
  };
}

/**
 * Runs one flow; any failure inside it becomes a `failed` outcome.
 */
async function runFlow(ctx: RunContext, bankId: string, flow: FlowKind): Promise<FlowOutcome> {
  try {
    return await executeFlow(ctx, bankId, flow);
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(`Error during ${FLOW_LABELS[flow]} flow for bank ${bankId}: ${message}`);
    return { bankId, flow, status: 'failed', error: message };
  }
}

function fatal(
  logger: RunLogger,
  recorder: RunSummaryRecorder,
  flows: FlowOutcome[],
  error: ReconciliationError
): RunResult {
  logger.error(`Critical error: ${error.message}`);
  return { status: 'fatal', summary: recorder.toSummary(), flows, error };
}

/**
 * Reconciles every bank in `baseDir`, one bank and one flow at a time.
 *
 * Only an unreadable directory, a directory without bank files, or a bank
 * whose file set differs from the reference are fatal. Everything else is
 * recorded per flow or per file and the run continues.
 */
export async function runReconciliation(options: RunOptions, deps: RunDependencies): Promise<RunResult> {
  const { logger } = deps;
  const recorder = new RunSummaryRecorder();
  const flows: FlowOutcome[] = [];

  const validation = await validateDirectory(options.baseDir);
  if (!validation.valid) {
    const reason = validation.error ?? `Cannot access directory: ${options.baseDir}`;
    return fatal(logger, recorder, flows, new DirectoryError(options.baseDir, reason));
  }

  let index: FileSetIndex;
  try {
    index = await scanBankFiles(options.baseDir);
  } catch (error) {
    return fatal(logger, recorder, flows, new DirectoryError(options.baseDir, describeError(error)));
  }
  logger.info(`Found ${index.size} bank(s) in ${options.baseDir}`);

  const consistency = checkConsistency(index, options.baseDir);
  if (!consistency.ok) {
    const error = consistency.error;
    if (error instanceof ShapeMismatchError) {
      logger.error(`Inconsistency detected for bank ${error.bankId}`);
      logger.error(`Expected (${error.referenceBank}):${formatList(error.expected)}`);
      logger.error(`Found (${error.bankId}):${formatList(error.found)}`);
      if (error.missing.length > 0) {
        logger.error(`Missing in bank ${error.bankId}:${formatList(error.missing)}`);
      }
      if (error.unexpected.length > 0) {
        logger.error(`Unexpected in bank ${error.bankId}:${formatList(error.unexpected)}`);
      }
    }
    return fatal(logger, recorder, flows, error);
  }
  logger.info(
    `Using bank ${consistency.referenceBank} as reference with ${consistency.shapes.length} file types.`
  );
  logger.info('All banks have consistent file sets.');

  let lookupRows: Promise<LookupRow[]> | undefined;
  const loadLookup = deps.loadLookup ?? loadLookupTable;
  const ctx: RunContext = {
    options,
    index,
    logger,
    recorder,
    writeTable: deps.writeTable ?? ((table, filePath) => writeTableXlsx(table, filePath)),
    readExtract: deps.readExtract ?? readExtractFile,
    lookup: () => {
      if (lookupRows === undefined) {
        lookupRows = loadLookup(options.lookupFile);
      }
      return lookupRows;
    },
    dateStamp: formatDateStamp((deps.now ?? (() => new Date()))()),
    keyColumn: options.keyColumn ?? DEFAULT_KEY_COLUMN,
  };

  if (options.onlyBank !== undefined && !index.has(options.onlyBank)) {
    logger.warn(`Bank ${options.onlyBank} has no files in ${options.baseDir}`);
  }

  const bankIds = [...index.keys()].sort((a, b) => a.localeCompare(b));
  for (const bankId of bankIds) {
    if (options.onlyBank !== undefined && bankId !== options.onlyBank) {
      continue;
    }
    if (options.skipPm !== true) {
      flows.push(await runFlow(ctx, bankId, 'pm'));
    }
    if (options.skipBm !== true) {
      flows.push(await runFlow(ctx, bankId, 'bm'));
    }
  }

  return { status: 'completed', summary: recorder.toSummary(), flows };
}
