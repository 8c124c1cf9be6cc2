import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { formatTimestamp } from '@bankrecon/types';
import type { LogLevel, RunLogger } from '@bankrecon/types';

export interface RunLogOptions {
  logFile: string;
  /** Echo info and warn lines to the console (errors always echo). */
  verbose?: boolean;
  console?: Pick<Console, 'error'>;
  now?: () => Date;
}

/**
 * Append-only run log, one timestamped line per event.
 */
export class FileRunLogger implements RunLogger {
  private readonly logFile: string;
  private readonly verbose: boolean;
  private readonly out: Pick<Console, 'error'>;
  private readonly now: () => Date;

  constructor(options: RunLogOptions) {
    this.logFile = options.logFile;
    this.verbose = options.verbose ?? false;
    this.out = options.console ?? console;
    this.now = options.now ?? (() => new Date());
    mkdirSync(dirname(this.logFile), { recursive: true });
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  error(message: string): void {
    this.write('ERROR', message);
  }

  report(text: string): void {
    appendFileSync(this.logFile, `${text}\n`, 'utf-8');
    this.out.error(text);
  }

  private write(level: LogLevel, message: string): void {
    const line = `[${formatTimestamp(this.now())}] [${level}] ${message}`;
    appendFileSync(this.logFile, `${line}\n`, 'utf-8');
    if (this.verbose || level === 'ERROR') {
      this.out.error(line);
    }
  }
}

export function createRunLogger(options: RunLogOptions): RunLogger {
  return new FileRunLogger(options);
}
