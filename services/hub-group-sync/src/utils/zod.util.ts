import { Redacted } from '@hub-sync/utils';
import { z } from 'zod';

export const urlWithoutTrailingSlashSchema = (description: string, message: string) =>
  z
    .url()
    .describe(description)
    .refine((url) => !url.endsWith('/'), { message });

export const coercedPositiveIntSchema = z.coerce.number().int().positive();
// Node clamps timer delays above 2^31 - 1 ms to 1 ms
export const MAX_TIMER_SECONDS = 2_147_483;
export const coercedTimerSecondsSchema = coercedPositiveIntSchema.max(
  MAX_TIMER_SECONDS,
  `must be at most ${MAX_TIMER_SECONDS} seconds`,
);
export const coercedNonNegativeIntSchema = z.coerce.number().int().min(0);
export const requiredStringSchema = z.string().trim().nonempty();

export const redactedStringSchema = requiredStringSchema.transform((val) => new Redacted(val));

export const optionalStringSchema = z.preprocess(
  (val) => (typeof val === 'string' && val.trim() === '' ? undefined : val),
  z.string().trim().optional(),
);

export const commaSeparatedListSchema = z.string().transform((val) =>
  val
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean),
);
