// XLSX exporter
export {
  tableToRows,
  tableToWorkbook,
  tableToXlsxBuffer,
  writeTableXlsx,
  type XlsxExportOptions,
} from './xlsx-exporter.js';

// Run log
export { FileRunLogger, createRunLogger, type RunLogOptions } from './run-log.js';

// Run summary report
export { formatRunSummary, formatList } from './summary-report.js';
