// File set indexer
export {
  extractBankId,
  indexFileNames,
  scanBankFiles,
  validateDirectory,
  listBankFilesByType,
  type DirectoryValidation,
  type FileSelection,
} from './file-set-indexer.js';

// Consistency checker
export { toShapeKey, shapeKeysOf, checkConsistency, type ConsistencyResult } from './consistency-checker.js';

// Extract reader
export { parseExtractText, readExtractFile } from './extract-reader.js';

// Category merger
export {
  pivotCategory,
  appendWidened,
  mergeCategoryFiles,
  type CategoryMergeResult,
  type CategoryMergeOptions,
} from './category-merger.js';

// Column classifier
export {
  sampleRows,
  isFlagLike,
  classifyColumns,
  type ColumnClassification,
  type ClassifyOptions,
} from './column-classifier.js';

// Duplicate reconciler
export { reconcileDuplicates, type ReconcileOptions, type ReconcileResult } from './duplicate-reconciler.js';

// Lookup table and enricher
export {
  parseLookupRows,
  loadLookupTable,
  buildLookupIndex,
  type OrganizationRelations,
} from './lookup-table.js';
export { enrichWithLookup, type EnrichOptions, type EnrichResult } from './enricher.js';

// Dataset summarizer
export { summarizeDataset, type DatasetSummary } from './dataset-summarizer.js';

// Run summary and orchestrator
export { RunSummaryRecorder } from './run-summary.js';
export {
  runReconciliation,
  outputFileName,
  type RunOptions,
  type RunDependencies,
  type RunResult,
  type TableWriter,
} from './run-orchestrator.js';
