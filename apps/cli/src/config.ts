import { resolve } from 'path';
import { RunConfigSchema, formatDateStamp } from '@bankrecon/types';
import type { RunConfig } from '@bankrecon/types';

export interface CliOptions {
  baseDir?: string;
  pacFile?: string;
  verbose: boolean;
  onlyBank?: string;
  skipPm: boolean;
  skipBm: boolean;
  outputDir?: string;
  logFile?: string;
  keyColumn?: string;
}

// Helper to parse boolean env vars
export const envBool = (key: string, defaultVal: boolean, env: NodeJS.ProcessEnv = process.env): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Resolves CLI options into a validated run configuration. Relative paths are
 * resolved against the working directory; output directory and log file
 * default to dated names there.
 */
export function resolveConfig(options: CliOptions, now: Date = new Date(), cwd: string = process.cwd()): RunConfig {
  const stamp = formatDateStamp(now);
  const baseDir = nonEmpty(options.baseDir);
  const pacFile = nonEmpty(options.pacFile);

  const parsed = RunConfigSchema.safeParse({
    baseDir: baseDir !== undefined ? resolve(cwd, baseDir) : '',
    lookupFile: pacFile !== undefined ? resolve(cwd, pacFile) : '',
    outputDir: resolve(cwd, nonEmpty(options.outputDir) ?? `Out_Excel_Exports_${stamp}`),
    logFile: resolve(cwd, nonEmpty(options.logFile) ?? `reconcile_${stamp}.log`),
    onlyBank: nonEmpty(options.onlyBank),
    skipPm: options.skipPm,
    skipBm: options.skipBm,
    verbose: options.verbose,
    keyColumn: nonEmpty(options.keyColumn),
  });

  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${messages.join('; ')}`);
  }
  return parsed.data;
}
