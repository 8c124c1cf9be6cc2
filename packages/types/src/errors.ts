export type ReconciliationErrorCode =
  | 'DIRECTORY_UNREADABLE'
  | 'NO_BANKS'
  | 'SHAPE_MISMATCH'
  | 'MISSING_KEY_COLUMN'
  | 'LOOKUP_TABLE_INVALID'
  | 'EXTRACT_UNREADABLE';

export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;

  constructor(code: ReconciliationErrorCode, message: string) {
    super(message);
    this.name = 'ReconciliationError';
    this.code = code;
  }
}

export class DirectoryError extends ReconciliationError {
  readonly directory: string;

  constructor(directory: string, reason: string) {
    super('DIRECTORY_UNREADABLE', reason);
    this.name = 'DirectoryError';
    this.directory = directory;
  }
}

export class NoBanksError extends ReconciliationError {
  constructor(directory: string) {
    super('NO_BANKS', `No bank files found in ${directory}`);
    this.name = 'NoBanksError';
  }
}

/**
 * A bank's file set does not have the same shape as the reference bank's.
 */
export class ShapeMismatchError extends ReconciliationError {
  readonly bankId: string;
  readonly referenceBank: string;
  readonly expected: string[];
  readonly found: string[];
  /** Shapes the reference has and this bank lacks. */
  readonly missing: string[];
  /** Shapes this bank has and the reference lacks. */
  readonly unexpected: string[];

  constructor(details: {
    bankId: string;
    referenceBank: string;
    expected: string[];
    found: string[];
  }) {
    super('SHAPE_MISMATCH', `Bank file inconsistency: ${details.bankId} ≠ ${details.referenceBank}`);
    this.name = 'ShapeMismatchError';
    this.bankId = details.bankId;
    this.referenceBank = details.referenceBank;
    this.expected = details.expected;
    this.found = details.found;
    const foundSet = new Set(details.found);
    const expectedSet = new Set(details.expected);
    this.missing = details.expected.filter((shape) => !foundSet.has(shape));
    this.unexpected = details.found.filter((shape) => !expectedSet.has(shape));
  }
}

export class MissingKeyColumnError extends ReconciliationError {
  constructor(keyColumn: string) {
    super('MISSING_KEY_COLUMN', `Key column "${keyColumn}" not found in merged table`);
    this.name = 'MissingKeyColumnError';
  }
}

export class LookupTableError extends ReconciliationError {
  constructor(message: string) {
    super('LOOKUP_TABLE_INVALID', message);
    this.name = 'LookupTableError';
  }
}

export class ExtractFileError extends ReconciliationError {
  readonly fileName: string;

  constructor(fileName: string, message: string) {
    super('EXTRACT_UNREADABLE', message);
    this.name = 'ExtractFileError';
    this.fileName = fileName;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
