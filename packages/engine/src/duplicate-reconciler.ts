import {
  DEFAULT_KEY_COLUMN,
  FLAG_ABSENT,
  FLAG_PRESENT,
  MissingKeyColumnError,
} from '@bankrecon/types';
import type { Row, Table } from '@bankrecon/types';
import { classifyColumns } from './column-classifier.js';

export interface ReconcileOptions {
  keyColumn?: string;
  flagColumns?: Iterable<string>;
  sampleSize?: number;
}

export interface ReconcileResult {
  /** One row per distinct customer key, ordered by key. */
  table: Table;
  groups: number;
  duplicatesCollapsed: number;
  droppedWithoutKey: number;
}

function collapseGroup(group: readonly Row[], columns: readonly string[], dynamic: ReadonlySet<string>): Row {
  const row: Row = {};
  for (const column of columns) {
    if (dynamic.has(column)) {
      row[column] = group.some((member) => member[column] === FLAG_PRESENT) ? FLAG_PRESENT : FLAG_ABSENT;
    } else {
      const first = group.find((member) => (member[column] ?? '') !== '');
      row[column] = first?.[column] ?? '';
    }
  }
  return row;
}

/**
 * Collapses rows sharing a customer key into one row.
 *
 * Flag columns become "J" when any row in the group has "J", otherwise "N".
 * Other columns take the first non-empty value in key-sorted order. Rows with
 * an empty key are dropped.
 */
export function reconcileDuplicates(table: Table, options: ReconcileOptions = {}): ReconcileResult {
  const keyColumn = options.keyColumn ?? DEFAULT_KEY_COLUMN;
  if (table.rows.length > 0 && !table.columns.includes(keyColumn)) {
    throw new MissingKeyColumnError(keyColumn);
  }

  const classification = classifyColumns(table, {
    keyColumn,
    ...(options.flagColumns !== undefined ? { flagColumns: options.flagColumns } : {}),
    ...(options.sampleSize !== undefined ? { sampleSize: options.sampleSize } : {}),
  });
  const dynamic = new Set(classification.dynamic);

  const keyOf = (row: Row): string => row[keyColumn] ?? '';
  const keyed = table.rows.filter((row) => keyOf(row) !== '');
  // Stable sort: rows keep file order within a key
  const sortedRows = [...keyed].sort((a, b) => {
    const ka = keyOf(a);
    const kb = keyOf(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });

  const groups = new Map<string, Row[]>();
  for (const row of sortedRows) {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [row]);
    } else {
      group.push(row);
    }
  }

  const rows: Row[] = [];
  for (const group of groups.values()) {
    rows.push(collapseGroup(group, table.columns, dynamic));
  }

  return {
    table: { columns: [...table.columns], rows },
    groups: groups.size,
    duplicatesCollapsed: keyed.length - groups.size,
    droppedWithoutKey: table.rows.length - keyed.length,
  };
}
