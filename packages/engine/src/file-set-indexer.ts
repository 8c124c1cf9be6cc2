import { readdir, stat } from 'fs/promises';
import { normalize } from 'path';
import { BANK_ID_PATTERN, OBS_MARKER } from '@bankrecon/types';
import type { FileSetIndex } from '@bankrecon/types';

export interface DirectoryValidation {
  valid: boolean;
  error?: string;
}

/**
 * Extracts the 4-digit bank code from a name such as `X.B1234.A.CSV`.
 */
export function extractBankId(fileName: string): string | undefined {
  const match = BANK_ID_PATTERN.exec(fileName);
  return match?.[1];
}

/**
 * Groups filenames by embedded bank code. Names without a code are dropped.
 * Each bank's names are sorted ascending for deterministic processing.
 */
export function indexFileNames(fileNames: Iterable<string>): FileSetIndex {
  const index = new Map<string, string[]>();

  for (const fileName of fileNames) {
    const bankId = extractBankId(fileName);
    if (bankId === undefined) {
      continue;
    }
    const files = index.get(bankId);
    if (files === undefined) {
      index.set(bankId, [fileName]);
    } else {
      files.push(fileName);
    }
  }

  for (const files of index.values()) {
    files.sort((a, b) => a.localeCompare(b));
  }

  return index;
}

/**
 * Scans a directory (non-recursive) and indexes its files by bank code.
 */
export async function scanBankFiles(directoryPath: string): Promise<FileSetIndex> {
  const entries = await readdir(normalize(directoryPath), { withFileTypes: true });
  return indexFileNames(entries.filter((entry) => entry.isFile()).map((entry) => entry.name));
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<DirectoryValidation> {
  try {
    const normalizedPath = normalize(directoryPath);
    const dirStat = await stat(normalizedPath);

    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }

    return { valid: true };
  } catch (error) {
    if (error instanceof Error && 'code' in error) {
      if (error.code === 'ENOENT') {
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      }
      if (error.code === 'EACCES') {
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      }
    }
    return { valid: false, error: `Cannot access directory: ${directoryPath}` };
  }
}

export interface FileSelection {
  /** Skip files whose name contains the OBS marker (default: true). */
  excludeObs?: boolean;
}

/**
 * Picks a bank's files for one flow by extension.
 *
 * `.CSV` does not match `.CSV.BM`, so PM and BM selections never overlap.
 */
export function listBankFilesByType(
  index: FileSetIndex,
  bankId: string,
  extension: string,
  options: FileSelection = {}
): string[] {
  const excludeObs = options.excludeObs ?? true;
  const files = index.get(bankId) ?? [];
  return files.filter(
    (fileName) =>
      fileName.endsWith(extension) && (!excludeObs || !fileName.toUpperCase().includes(OBS_MARKER))
  );
}
