import { CATEGORY_COUNT_COLUMN, FLAG_PRESENT } from '@bankrecon/types';
import type { DatasetStats, Table } from '@bankrecon/types';
import { classifyColumns } from './column-classifier.js';

export interface DatasetSummary {
  /** Input table with the Category_Count column appended. */
  table: Table;
  stats: DatasetStats;
}

/**
 * Computes descriptive statistics over a finished table and appends a
 * per-row count of set flag columns.
 *
 * Counts are taken before the count column is added.
 */
export function summarizeDataset(table: Table): DatasetSummary {
  const { dynamic, fixed } = classifyColumns(table, { sampleSize: Infinity });

  let multiCategory = 0;
  const rows = table.rows.map((source) => {
    const count = dynamic.filter((column) => source[column] === FLAG_PRESENT).length;
    if (count > 1) multiCategory++;
    return { ...source, [CATEGORY_COUNT_COLUMN]: String(count) };
  });

  const columns = table.columns.filter((column) => column !== CATEGORY_COUNT_COLUMN);
  columns.push(CATEGORY_COUNT_COLUMN);

  return {
    table: { columns, rows },
    stats: {
      totalRows: table.rows.length,
      totalColumns: table.columns.length,
      staticColumns: fixed,
      dynamicColumns: dynamic,
      multiCategory,
    },
  };
}
