import { readFile } from 'fs/promises';
import { basename } from 'path';
import Papa from 'papaparse';
import { EXTRACT_DELIMITER, EXTRACT_ENCODING, ExtractFileError } from '@bankrecon/types';
import type { Row, Table } from '@bankrecon/types';

// Papaparse pads short rows itself; these leave the row shape unknowable.
const FATAL_PARSE_CODES = new Set(['TooManyFields', 'MissingQuotes', 'InvalidQuotes']);

/**
 * Parses semicolon-separated extract text with a header row.
 *
 * No type inference: account and customer numbers keep their leading zeros.
 */
export function parseExtractText(content: string, fileName = 'extract'): Table {
  const result = Papa.parse<Record<string, string | undefined>>(content, {
    header: true,
    delimiter: EXTRACT_DELIMITER,
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const fatal = result.errors.find((error) => FATAL_PARSE_CODES.has(error.code));
  if (fatal !== undefined) {
    const line = fatal.row !== undefined ? ` (data row ${fatal.row + 1})` : '';
    throw new ExtractFileError(fileName, `${fatal.message}${line}`);
  }

  const columns = result.meta.fields ?? [];
  const rows: Row[] = result.data.map((record) => {
    const row: Row = {};
    for (const column of columns) {
      row[column] = record[column] ?? '';
    }
    return row;
  });

  return { columns, rows };
}

/**
 * Reads one extract file. Mainframe exports are single-byte ISO-8859-1.
 */
export async function readExtractFile(filePath: string): Promise<Table> {
  const buffer = await readFile(filePath);
  return parseExtractText(buffer.toString(EXTRACT_ENCODING), basename(filePath));
}
