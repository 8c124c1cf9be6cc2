import type { BankSummary, DatasetStats, FileOutcome, RunSummary } from '@bankrecon/types';

/**
 * Accumulates per-bank results over one run. Owned by a single orchestrator
 * run and handed back at its end.
 */
export class RunSummaryRecorder {
  private readonly banks = new Map<string, BankSummary>();

  entry(bankId: string): BankSummary {
    let info = this.banks.get(bankId);
    if (info === undefined) {
      info = { merged: [], missing: [], errors: [], columns: [], notes: [] };
      this.banks.set(bankId, info);
    }
    return info;
  }

  recordFileOutcomes(bankId: string, outcomes: readonly FileOutcome[]): void {
    const info = this.entry(bankId);
    for (const outcome of outcomes) {
      switch (outcome.status) {
        case 'merged':
          info.merged.push(outcome.category);
          break;
        case 'no-data':
          info.missing.push(outcome.fileName);
          break;
        case 'error':
          info.errors.push(outcome.fileName);
          break;
      }
    }
  }

  /** Overwrites the bank's columns and stats with the latest flow's dataset. */
  recordDataset(bankId: string, stats: DatasetStats): void {
    const info = this.entry(bankId);
    info.columns = [...stats.dynamicColumns, ...stats.staticColumns];
    info.stats = stats;
  }

  addNote(bankId: string, note: string): void {
    this.entry(bankId).notes.push(note);
  }

  toSummary(): RunSummary {
    return { banks: new Map(this.banks) };
  }
}
