import { z } from 'zod';
import { BANK_ID_LENGTH, LOOKUP_COLUMNS, ORG_NUMBER_LENGTH } from '../utils/constants.js';
import { cellToText, zeroPad } from '../utils/text.js';

export const LookupCellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.date()])
  .transform((value) => cellToText(value));

export const LookupRowSchema = z.object({
  // Excel drops leading zeros from numeric bank codes
  [LOOKUP_COLUMNS.BANK_ID]: LookupCellSchema.transform((value) =>
    /^\d+$/.test(value) ? zeroPad(value, BANK_ID_LENGTH) : value
  ),
  [LOOKUP_COLUMNS.ORG_NUMBER]: LookupCellSchema.transform((value) => zeroPad(value, ORG_NUMBER_LENGTH)),
  [LOOKUP_COLUMNS.PERSON_NUMBER]: LookupCellSchema,
  [LOOKUP_COLUMNS.AGREEMENT_ID]: LookupCellSchema,
  [LOOKUP_COLUMNS.ROLE]: LookupCellSchema,
});
export type LookupRow = z.infer<typeof LookupRowSchema>;
