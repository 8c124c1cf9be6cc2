export {
  TOOL_VERSION,
  FLAG_PRESENT,
  FLAG_ABSENT,
  BANK_ID_PATTERN,
  SHAPE_WILDCARD,
  BANK_ID_LENGTH,
  EXTRACT_DELIMITER,
  EXTRACT_ENCODING,
  CATEGORY_COLUMN_INDEX,
  OBS_MARKER,
  FLOW_EXTENSIONS,
  DEFAULT_KEY_COLUMN,
  DEFAULT_SAMPLE_SIZE,
  ORG_NUMBER_LENGTH,
  LOOKUP_COLUMNS,
  ENRICHMENT_COLUMNS,
  CATEGORY_COUNT_COLUMN,
  LIST_SEPARATOR,
} from './constants.js';
export { formatDateStamp, formatTimestamp } from './date.js';
export { zeroPad, cellToText } from './text.js';
