function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats a date as YYYYMMDD in local time, as used in output and log file names.
 */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
}

/**
 * Formats a date as "YYYY-MM-DD HH:MM:SS" in local time for log lines.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}
