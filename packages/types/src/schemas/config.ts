import { z } from 'zod';
import { DEFAULT_KEY_COLUMN } from '../utils/constants.js';

export const BankIdSchema = z.string().regex(/^\d{4}$/, 'Bank id must be 4 digits');

export const RunConfigSchema = z.object({
  baseDir: z.string().min(1, 'Base directory is required'),
  lookupFile: z.string().min(1, 'PAC lookup file is required'),
  outputDir: z.string().min(1),
  logFile: z.string().min(1),
  onlyBank: BankIdSchema.optional(),
  skipPm: z.boolean().default(false),
  skipBm: z.boolean().default(false),
  verbose: z.boolean().default(false),
  keyColumn: z.string().min(1).default(DEFAULT_KEY_COLUMN),
});
export type RunConfig = z.infer<typeof RunConfigSchema>;
