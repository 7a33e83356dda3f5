import { z } from 'zod';

const OUT_OF_RANGE_MESSAGE = 'is outside the supported date range';

/**
 * Millisecond epoch to Date, reporting values a Date cannot represent
 * (beyond ±8.64e15 ms) as a validation issue.
 */
function toDate(epochMillis: number, ctx: z.RefinementCtx): Date {
  const date = new Date(epochMillis);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: OUT_OF_RANGE_MESSAGE });
    return z.NEVER;
  }
  return date;
}

/**
 * Wire timestamp: ISO-8601 with an explicit offset, or integer Unix epoch
 * seconds. Both parse to a UTC `Date`.
 */
const isoTimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'must be an ISO-8601 timestamp with offset' })
  .transform((value, ctx) => toDate(Date.parse(value), ctx));

const epochSecondsSchema = z
  .number()
  .int({ message: 'epoch seconds must be an integer' })
  .nonnegative()
  .transform((value, ctx) => toDate(value * 1000, ctx));

export const timestampSchema = z.union([isoTimestampSchema, epochSecondsSchema], {
  errorMap: () => ({
    message: 'must be an ISO-8601 timestamp with offset or integer epoch seconds',
  }),
});

/**
 * Query-string variant: digits are epoch seconds, anything else must be ISO.
 */
export const queryTimestampSchema = z
  .string()
  .trim()
  .transform((value) => (/^\d+$/.test(value) ? Number(value) : value))
  .pipe(timestampSchema);
