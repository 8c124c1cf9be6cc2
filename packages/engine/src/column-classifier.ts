import { DEFAULT_SAMPLE_SIZE, FLAG_ABSENT, FLAG_PRESENT } from '@bankrecon/types';
import type { Row, Table } from '@bankrecon/types';

export interface ColumnClassification {
  /** Flag-like columns holding only "J"/"N" (blanks ignored). */
  dynamic: string[];
  fixed: string[];
}

export interface ClassifyOptions {
  /** Rows inspected per column; `Infinity` scans the whole table. */
  sampleSize?: number;
  /** Declared flag columns, classified dynamic regardless of sampled values. */
  flagColumns?: Iterable<string>;
  /** Never classified dynamic. */
  keyColumn?: string;
}

/**
 * Picks up to `size` rows at an even stride so every source file of a merged
 * table is represented.
 */
export function sampleRows(rows: readonly Row[], size: number = DEFAULT_SAMPLE_SIZE): Row[] {
  if (rows.length <= size) {
    return [...rows];
  }
  const stride = rows.length / size;
  const sample: Row[] = [];
  for (let i = 0; i < size; i++) {
    const row = rows[Math.floor(i * stride)];
    if (row !== undefined) sample.push(row);
  }
  return sample;
}

/**
 * True when every non-empty value is a flag value and at least one exists.
 */
export function isFlagLike(values: Iterable<string | undefined>): boolean {
  let seen = false;
  for (const value of values) {
    if (value === undefined || value === '') continue;
    if (value !== FLAG_PRESENT && value !== FLAG_ABSENT) return false;
    seen = true;
  }
  return seen;
}

/**
 * Splits columns into flag-like and fixed by inspecting a sample of rows.
 *
 * Sampling is a heuristic: a column with only J/N in the sample but other
 * values elsewhere is classified dynamic. Pass declared flag columns to avoid
 * relying on it for category flags.
 */
export function classifyColumns(table: Table, options: ClassifyOptions = {}): ColumnClassification {
  const sample = sampleRows(table.rows, options.sampleSize ?? DEFAULT_SAMPLE_SIZE);
  const declared = new Set(options.flagColumns ?? []);
  const dynamic: string[] = [];
  const fixed: string[] = [];

  for (const column of table.columns) {
    const isKey = column === options.keyColumn;
    if (!isKey && (declared.has(column) || isFlagLike(sample.map((row) => row[column])))) {
      dynamic.push(column);
    } else {
      fixed.push(column);
    }
  }

  return { dynamic, fixed };
}
