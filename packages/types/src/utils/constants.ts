export const TOOL_VERSION = '1.0.0';

/** Flag cell values written by the category pivot. */
export const FLAG_PRESENT = 'J';
export const FLAG_ABSENT = 'N';

export const BANK_ID_PATTERN = /\.B(\d{4})\./;
export const SHAPE_WILDCARD = '.B####.';
export const BANK_ID_LENGTH = 4;

export const EXTRACT_DELIMITER = ';';
export const EXTRACT_ENCODING = 'latin1';
export const CATEGORY_COLUMN_INDEX = 2;
export const OBS_MARKER = 'OBS';

export const FLOW_EXTENSIONS = {
  pm: '.CSV',
  bm: '.CSV.BM',
} as const;

export const DEFAULT_KEY_COLUMN = 'Kundenummer';
export const DEFAULT_SAMPLE_SIZE = 100;

export const ORG_NUMBER_LENGTH = 11;

export const LOOKUP_COLUMNS = {
  BANK_ID: 'BANK_ID',
  ORG_NUMBER: 'FORETAKSNR',
  PERSON_NUMBER: 'PERSONNR',
  AGREEMENT_ID: 'AVTALE_ID',
  ROLE: 'BRUKERTYPE',
} as const;

export const ENRICHMENT_COLUMNS = {
  AGREEMENT_IDS: 'AVTALE_IDs',
  USERS: 'Users_PERSONNR:BRUKERTYPE',
} as const;

export const CATEGORY_COUNT_COLUMN = 'Category_Count';
export const LIST_SEPARATOR = '|';
