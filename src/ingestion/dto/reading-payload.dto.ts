import { z } from 'zod';
import { timestampSchema } from '../../common/timestamp';

/**
 * Maximum readings accepted in one batch request.
 */
const MAX_BATCH_SIZE = 1000;

/**
 * Body of a single reading as submitted by a client.
 *
 * `timestamp` is optional and defaults to the ingestion time; `source`
 * identifies the originating device or sensor. Other fields (notably
 * `kind` on POST /measurements) are ignored here.
 *
 * @example
 * { "kind": "flow", "value": 12.5, "timestamp": "2024-06-15T08:00:00Z", "source": "FM-07" }
 */
export const readingPayloadSchema = z.object(
  {
    value: z
      .number({
        required_error: 'is required',
        invalid_type_error: 'must be a number',
      })
      .finite({ message: 'must be finite' }),
    timestamp: timestampSchema.optional(),
    source: z
      .string({ invalid_type_error: 'must be a string' })
      .trim()
      .min(1, { message: 'must not be empty' })
      .max(128, { message: 'must be at most 128 characters' })
      .optional(),
  },
  { invalid_type_error: 'reading must be a JSON object' },
);

/**
 * Batch body for POST /measurements/:kind.
 *
 * @example
 * { "values": [{ "value": 1.2, "timestamp": 1718438400 }, { "value": 1.3 }] }
 */
export const batchPayloadSchema = z.object(
  {
    values: z
      .array(z.unknown(), {
        required_error: 'is required',
        invalid_type_error: 'must be an array',
      })
      .min(1, { message: 'must contain at least one reading' })
      .max(MAX_BATCH_SIZE, {
        message: `must contain at most ${MAX_BATCH_SIZE} readings`,
      }),
  },
  { invalid_type_error: 'body must be a JSON object' },
);

/**
 * Kind discriminator read from the body of POST /measurements.
 */
export const kindFieldSchema = z.object(
  {
    kind: z
      .string({
        required_error: 'is required',
        invalid_type_error: 'must be a string',
      })
      .min(1, { message: 'must not be empty' }),
  },
  { invalid_type_error: 'body must be a JSON object' },
);
