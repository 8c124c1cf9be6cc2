/**
 * XLSX Exporter Module
 *
 * Writes a reconciled table to a single-sheet workbook: header row from the
 * table's columns, one row per record, no index column.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import * as XLSX from 'xlsx';
import { CATEGORY_COUNT_COLUMN } from '@bankrecon/types';
import type { Table } from '@bankrecon/types';

/**
 * Options for XLSX export
 */
export interface XlsxExportOptions {
  /** Sheet name (default: 'Data') */
  sheetName?: string;
  /** Columns written as numbers when their text parses as one (default: Category_Count) */
  numericColumns?: readonly string[];
}

type CellValue = string | number;

function toCell(value: string, numeric: boolean): CellValue {
  if (!numeric || value === '') {
    return value;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}

/**
 * Builds the sheet as an array of arrays. Text cells stay text, so identifiers
 * keep their leading zeros.
 */
export function tableToRows(table: Table, options: XlsxExportOptions = {}): CellValue[][] {
  const numeric = new Set(options.numericColumns ?? [CATEGORY_COUNT_COLUMN]);
  const body = table.rows.map((row) =>
    table.columns.map((column) => toCell(row[column] ?? '', numeric.has(column)))
  );
  return [[...table.columns], ...body];
}

export function tableToWorkbook(table: Table, options: XlsxExportOptions = {}): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const worksheet = XLSX.utils.aoa_to_sheet(tableToRows(table, options));
  worksheet['!cols'] = table.columns.map((column) => ({ wch: Math.max(column.length + 2, 12) }));
  XLSX.utils.book_append_sheet(workbook, worksheet, options.sheetName ?? 'Data');
  return workbook;
}

export function tableToXlsxBuffer(table: Table, options: XlsxExportOptions = {}): Buffer {
  const buffer: Buffer = XLSX.write(tableToWorkbook(table, options), { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

/**
 * Writes the workbook to `filePath`, creating the parent directory first.
 */
export async function writeTableXlsx(
  table: Table,
  filePath: string,
  options: XlsxExportOptions = {}
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, tableToXlsxBuffer(table, options));
}
