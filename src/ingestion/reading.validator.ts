import { Injectable } from '@nestjs/common';
import {
  KindNotEnabledError,
  MalformedPayloadError,
  OutOfRangeError,
} from '../common/measurement.errors';
import { MeasurementKindName, Reading } from '../common/measurement.types';
import { MeasurementKindRegistry } from '../measurement-kinds/measurement-kind.registry';
import { describeIssues } from '../common/zod-issues';
import { batchPayloadSchema, readingPayloadSchema } from './dto/reading-payload.dto';

/**
 * ReadingValidator - turns raw request payloads into Readings
 *
 * Checks run in a fixed order and stop at the first failing stage:
 * 1. Kind enabled for this process    -> KindNotEnabledError
 * 2. Payload shape and field types    -> MalformedPayloadError
 * 3. Kind-specific range/normalization -> OutOfRangeError
 *
 * No side effects.
 */
@Injectable()
export class ReadingValidator {
  constructor(private readonly registry: MeasurementKindRegistry) {}

  /**
   * Validate one reading.
   *
   * @param kind - Kind token from the request
   * @param rawPayload - Parsed JSON body (untrusted)
   * @param receivedAt - Timestamp used when the payload carries none
   */
  validate(
    kind: MeasurementKindName,
    rawPayload: unknown,
    receivedAt: Date = new Date(),
  ): Reading {
    this.assertEnabled(kind);
    return this.validateEntry(kind, rawPayload, receivedAt);
  }

  /**
   * Validate a batch body `{ values: [...] }`. The first invalid entry
   * rejects the whole batch; its index is part of the reported problem.
   */
  validateBatch(
    kind: MeasurementKindName,
    rawPayload: unknown,
    receivedAt: Date = new Date(),
  ): Reading[] {
    this.assertEnabled(kind);

    const parsed = batchPayloadSchema.safeParse(rawPayload);
    if (!parsed.success) {
      throw new MalformedPayloadError(describeIssues(parsed.error));
    }

    return parsed.data.values.map((entry, index) => {
      const path = `values[${index}]`;
      try {
        return this.validateEntry(kind, entry, receivedAt, path);
      } catch (error) {
        if (error instanceof OutOfRangeError) {
          throw new OutOfRangeError(error.kind, error.value, error.bound, path);
        }
        throw error;
      }
    });
  }

  private assertEnabled(kind: MeasurementKindName): void {
    if (!this.registry.isEnabled(kind)) {
      throw new KindNotEnabledError(kind, this.registry.enabledKinds());
    }
  }

  private validateEntry(
    kind: MeasurementKindName,
    rawEntry: unknown,
    receivedAt: Date,
    path = '',
  ): Reading {
    const parsed = readingPayloadSchema.safeParse(rawEntry);
    if (!parsed.success) {
      throw new MalformedPayloadError(describeIssues(parsed.error, path));
    }

    const validator = this.registry.resolve(kind);
    const value = validator.validate(parsed.data.value);

    return {
      kind,
      value,
      timestamp: parsed.data.timestamp ?? receivedAt,
      source: parsed.data.source ?? null,
    };
  }
}
