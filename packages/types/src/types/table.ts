/**
 * A single record. Every cell is text; an empty string is the absent value.
 */
export type Row = Record<string, string>;

export interface Table {
  /** Column order as written to the output spreadsheet. */
  columns: string[];
  rows: Row[];
}

/** Bank identifier to the filenames exported for it. */
export type FileSetIndex = ReadonlyMap<string, readonly string[]>;

/** Category label to the flag column it produced. */
export type CategoryFlags = ReadonlyMap<string, string>;

export type FlowKind = 'pm' | 'bm';

export function emptyTable(): Table {
  return { columns: [], rows: [] };
}
