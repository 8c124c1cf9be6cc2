import { join } from 'path';
import {
  CATEGORY_COLUMN_INDEX,
  FLAG_ABSENT,
  FLAG_PRESENT,
  ExtractFileError,
  describeError,
  emptyTable,
} from '@bankrecon/types';
import type { CategoryFlags, FileOutcome, Row, Table } from '@bankrecon/types';
import { readExtractFile } from './extract-reader.js';

export interface CategoryMergeResult {
  /** One row per source record; deduplication happens later. */
  table: Table;
  categories: CategoryFlags;
  outcomes: FileOutcome[];
}

export interface CategoryMergeOptions {
  readFile?: (filePath: string) => Promise<Table>;
  onFileOutcome?: (outcome: FileOutcome) => void;
}

type PivotResult =
  | { status: 'pivoted'; category: string; table: Table }
  | { status: 'no-data'; reason: string };

/**
 * Replaces the category label column of one extract with a flag column named
 * after the label, set to "J" on every row.
 */
export function pivotCategory(contents: Table, fileName: string): PivotResult {
  if (contents.rows.length === 0) {
    return { status: 'no-data', reason: 'no data rows' };
  }

  const categoryColumn = contents.columns[CATEGORY_COLUMN_INDEX];
  if (categoryColumn === undefined) {
    return { status: 'no-data', reason: `only ${contents.columns.length} column(s)` };
  }

  const category = (contents.rows[0]?.[categoryColumn] ?? '').trim();
  if (category === '') {
    throw new ExtractFileError(fileName, `No category label in column "${categoryColumn}" of first row`);
  }

  const columns = contents.columns.filter((column) => column !== categoryColumn && column !== category);
  columns.push(category);

  const rows = contents.rows.map((source) => {
    const row: Row = {};
    for (const column of columns) {
      row[column] = source[column] ?? '';
    }
    row[category] = FLAG_PRESENT;
    return row;
  });

  return { status: 'pivoted', category, table: { columns, rows } };
}

/**
 * Appends `addition` to `merged` in place. Columns missing on either side are
 * filled with "N" so earlier rows gain absent flags for later categories and
 * vice versa.
 */
export function appendWidened(merged: Table, addition: Table): void {
  const mergedColumns = new Set(merged.columns);
  const additionColumns = new Set(addition.columns);

  const lacking = merged.columns.filter((column) => !additionColumns.has(column));
  for (const row of addition.rows) {
    for (const column of lacking) {
      row[column] = FLAG_ABSENT;
    }
  }

  for (const column of addition.columns) {
    if (mergedColumns.has(column)) continue;
    merged.columns.push(column);
    for (const row of merged.rows) {
      row[column] = FLAG_ABSENT;
    }
  }

  for (const row of addition.rows) {
    merged.rows.push(row);
  }
}

/**
 * Merges one bank's per-category extract files into a single wide table.
 *
 * Files are processed in list order and isolated from each other: an empty
 * file is recorded as `no-data`, any other failure as `error`, and the merge
 * carries on with the next file.
 */
export async function mergeCategoryFiles(
  directory: string,
  fileNames: readonly string[],
  options: CategoryMergeOptions = {}
): Promise<CategoryMergeResult> {
  const read = options.readFile ?? readExtractFile;
  const merged = emptyTable();
  const categories = new Map<string, string>();
  const outcomes: FileOutcome[] = [];

  const record = (outcome: FileOutcome): void => {
    outcomes.push(outcome);
    options.onFileOutcome?.(outcome);
  };

  for (const fileName of fileNames) {
    try {
      const contents = await read(join(directory, fileName));
      const pivot = pivotCategory(contents, fileName);

      if (pivot.status === 'no-data') {
        record({ fileName, status: 'no-data', reason: pivot.reason });
        continue;
      }

      appendWidened(merged, pivot.table);
      categories.set(pivot.category, pivot.category);
      record({ fileName, status: 'merged', category: pivot.category, rowCount: pivot.table.rows.length });
    } catch (error) {
      record({ fileName, status: 'error', error: describeError(error) });
    }
  }

  return { table: merged, categories, outcomes };
}
