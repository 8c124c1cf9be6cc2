/**
 * Left-pads a value with zeros, leaving longer values untouched.
 */
export function zeroPad(value: string, width: number): string {
  return value.padStart(width, '0');
}

/**
 * Converts a spreadsheet cell value to text without reinterpreting it.
 * Integral numbers are written without a decimal part or exponent.
 */
export function cellToText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return value.toFixed(0);
    }
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
