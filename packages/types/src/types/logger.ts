export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Sink for run events. Implementations append to the run log file;
 * errors are always echoed to the console.
 */
export interface RunLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Writes a multi-line block verbatim and always prints it. */
  report(text: string): void;
}
