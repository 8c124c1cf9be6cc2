import { readFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import { LIST_SEPARATOR, LookupRowSchema, LookupTableError } from '@bankrecon/types';
import type { LookupRow } from '@bankrecon/types';

export interface OrganizationRelations {
  /** Sorted distinct agreement ids joined with "|". */
  agreementIds: string;
  /** "PERSONNR:BRUKERTYPE" entries in lookup row order joined with "|". */
  users: string;
}

/**
 * Validates spreadsheet records and normalizes every key to text.
 */
export function parseLookupRows(records: readonly unknown[]): LookupRow[] {
  return records.map((record, index) => {
    const parsed = LookupRowSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') ?? 'row';
      // +2: header row and 1-based sheet rows
      throw new LookupTableError(`Lookup row ${index + 2}: ${field}: ${issue?.message ?? 'invalid'}`);
    }
    return parsed.data;
  });
}

/**
 * Reads the first sheet of the PAC export workbook.
 */
export async function loadLookupTable(filePath: string): Promise<LookupRow[]> {
  const buffer = await readFile(filePath);
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (worksheet === undefined) {
    throw new LookupTableError(`Lookup workbook has no sheets: ${filePath}`);
  }

  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { raw: true, defval: '' });
  return parseLookupRows(records);
}

/**
 * Groups a bank's lookup rows by organization number.
 */
export function buildLookupIndex(rows: readonly LookupRow[], bankId: string): Map<string, OrganizationRelations> {
  const grouped = new Map<string, LookupRow[]>();
  for (const row of rows) {
    if (row.BANK_ID !== bankId) continue;
    const group = grouped.get(row.FORETAKSNR);
    if (group === undefined) {
      grouped.set(row.FORETAKSNR, [row]);
    } else {
      group.push(row);
    }
  }

  const index = new Map<string, OrganizationRelations>();
  for (const [orgNumber, group] of grouped) {
    const agreementIds = [...new Set(group.map((row) => row.AVTALE_ID))].sort();
    index.set(orgNumber, {
      agreementIds: agreementIds.join(LIST_SEPARATOR),
      users: group.map((row) => `${row.PERSONNR}:${row.BRUKERTYPE}`).join(LIST_SEPARATOR),
    });
  }
  return index;
}
