/**
 * Shipment sync input schemas
 *
 * Validates the inputs of the targeted write-back and archive sweep
 * operations before any database or spreadsheet work starts.
 */

import { z } from 'zod';
import { normalizeTextInput } from '../domain/sheets/headers.js';
import { BUSINESS_FIELDS, isBusinessField, type ShipmentBusinessField } from '../domain/shipments/fields.js';

const DEFAULT_ARCHIVE_THRESHOLD_DAYS = 7;

const [firstBusinessField, ...otherBusinessFields] = BUSINESS_FIELDS;

export const shipmentBusinessFieldSchema = z.enum([firstBusinessField, ...otherBusinessFields]);

const trimmedRequired = (label: string) =>
  z.string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);

/** Field value to write: trimmed, empty string clears the cell */
const fieldValueSchema = z.string().trim().nullable();

export const writeBackOptionsSchema = z.object({
  skipRemote: z.boolean().default(false),
});

export const writeBackInputSchema = z.object({
  shipmentNo: trimmedRequired('shipmentNo'),
  fields: z
    .record(z.string(), fieldValueSchema)
    .superRefine((fields, ctx) => {
      const keys = Object.keys(fields);
      if (keys.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one field update is required' });
      }
      for (const key of keys) {
        if (!shipmentBusinessFieldSchema.safeParse(key).success) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown or read-only field: ${key}`, path: [key] });
        }
      }
    })
    .transform(fields => {
      const updates: Partial<Record<ShipmentBusinessField, string | null>> = {};
      for (const [key, value] of Object.entries(fields)) {
        if (isBusinessField(key)) updates[key] = normalizeTextInput(value);
      }
      return updates;
    }),
  options: writeBackOptionsSchema.default({}),
});

export const assignPmLocationInputSchema = z.object({
  orderName: trimmedRequired('orderName'),
  pmLocation: trimmedRequired('pmLocation'),
  options: writeBackOptionsSchema.default({}),
});

export const archiveSweepInputSchema = z.object({
  thresholdDays: z
    .number()
    .int('thresholdDays must be an integer')
    .min(0, 'thresholdDays must be non-negative')
    .default(DEFAULT_ARCHIVE_THRESHOLD_DAYS),
});

export type WriteBackInput = z.input<typeof writeBackInputSchema>;
export type AssignPmLocationInput = z.input<typeof assignPmLocationInputSchema>;
export type ArchiveSweepInput = z.input<typeof archiveSweepInputSchema>;
