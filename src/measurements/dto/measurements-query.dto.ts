import { z } from 'zod';
import { AGGREGATIONS } from '../../common/measurement.types';
import { queryTimestampSchema } from '../../common/timestamp';

/**
 * Query parameters for GET /measurements
 *
 * - kind: required; repeat it to read several kinds (`kind=power&kind=flow`),
 *   duplicates are dropped and the first occurrence keeps its position
 * - from, to: ISO-8601 with offset, or epoch seconds; inclusive bounds
 * - agg: count | avg | min | max
 *
 * @example
 * GET /measurements?kind=power&from=2024-06-15T00:00:00Z&to=2024-06-16T00:00:00Z&agg=avg
 * GET /measurements?kind=power&kind=flow&agg=max
 */
export const measurementsQuerySchema = z.object({
  kind: z.preprocess(
    (value) => (typeof value === 'string' ? [value] : value),
    z
      .array(z.string().min(1, { message: 'must not be empty' }), {
        required_error: 'is required',
        invalid_type_error: 'must be a kind name',
      })
      .nonempty({ message: 'is required' })
      .transform((kinds) => [...new Set(kinds)]),
  ),
  from: queryTimestampSchema.optional(),
  to: queryTimestampSchema.optional(),
  agg: z
    .enum(AGGREGATIONS, {
      errorMap: () => ({ message: `must be one of ${AGGREGATIONS.join(', ')}` }),
    })
    .optional(),
});
