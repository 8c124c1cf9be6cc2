import { DEFAULT_KEY_COLUMN, ENRICHMENT_COLUMNS } from '@bankrecon/types';
import type { LookupRow, Table } from '@bankrecon/types';
import { buildLookupIndex } from './lookup-table.js';

export interface EnrichOptions {
  keyColumn?: string;
}

export interface EnrichResult {
  table: Table;
  /** False when the lookup table has no rows for the bank. */
  bankFound: boolean;
  matched: number;
  unmatched: number;
}

/**
 * Attaches agreement ids and person roles from the PAC export to each
 * customer, joined on organization number.
 *
 * Customers without a match, and every customer of a bank absent from the
 * lookup table, get empty strings in both columns. Row count and order never
 * change.
 */
export function enrichWithLookup(
  table: Table,
  bankId: string,
  lookup: readonly LookupRow[],
  options: EnrichOptions = {}
): EnrichResult {
  const keyColumn = options.keyColumn ?? DEFAULT_KEY_COLUMN;
  const index = buildLookupIndex(lookup, bankId);
  const bankFound = index.size > 0;

  const added: string[] = [ENRICHMENT_COLUMNS.AGREEMENT_IDS, ENRICHMENT_COLUMNS.USERS];
  const columns = [...table.columns.filter((column) => !added.includes(column)), ...added];

  let matched = 0;
  const rows = table.rows.map((source) => {
    const relations = index.get(source[keyColumn] ?? '');
    if (relations !== undefined) matched++;
    return {
      ...source,
      [ENRICHMENT_COLUMNS.AGREEMENT_IDS]: relations?.agreementIds ?? '',
      [ENRICHMENT_COLUMNS.USERS]: relations?.users ?? '',
    };
  });

  return { table: { columns, rows }, bankFound, matched, unmatched: rows.length - matched };
}
