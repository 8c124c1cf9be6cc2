export { emptyTable } from './table.js';
export type { Row, Table, FileSetIndex, CategoryFlags, FlowKind } from './table.js';
export type { DatasetStats, BankSummary, RunSummary } from './summary.js';
export type { FileOutcome, FlowOutcome } from './outcome.js';
export type { LogLevel, RunLogger } from './logger.js';
