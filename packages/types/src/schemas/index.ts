export { LookupCellSchema, LookupRowSchema } from './lookup.js';
export type { LookupRow } from './lookup.js';

export { BankIdSchema, RunConfigSchema } from './config.js';
export type { RunConfig } from './config.js';
