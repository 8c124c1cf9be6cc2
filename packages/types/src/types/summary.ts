export interface DatasetStats {
  totalRows: number;
  totalColumns: number;
  staticColumns: string[];
  dynamicColumns: string[];
  /** Rows with more than one flag column set. */
  multiCategory: number;
}

/**
 * Per-bank record kept for the end-of-run report.
 *
 * `merged`, `missing` and `errors` accumulate across both flows of a bank.
 * `columns` and `stats` belong to whichever flow summarized last.
 */
export interface BankSummary {
  merged: string[];
  missing: string[];
  errors: string[];
  columns: string[];
  stats?: DatasetStats;
  notes: string[];
}

export interface RunSummary {
  banks: Map<string, BankSummary>;
}
