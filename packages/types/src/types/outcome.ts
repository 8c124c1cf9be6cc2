import type { DatasetStats } from './summary.js';
import type { FlowKind } from './table.js';

/** Result of merging one extract file into a bank's table. */
export type FileOutcome =
  | { fileName: string; status: 'merged'; category: string; rowCount: number }
  | { fileName: string; status: 'no-data'; reason: string }
  | { fileName: string; status: 'error'; error: string };

export type FlowOutcome =
  | {
      bankId: string;
      flow: FlowKind;
      status: 'completed';
      outputPath: string;
      rowCount: number;
      stats: DatasetStats;
    }
  | { bankId: string; flow: FlowKind; status: 'skipped'; reason: 'no-files' | 'no-data' }
  | { bankId: string; flow: FlowKind; status: 'failed'; error: string };
