import { Injectable, Logger } from '@nestjs/common';
import { MalformedPayloadError } from '../common/measurement.errors';
import { MeasurementKindName, StoredRecord } from '../common/measurement.types';
import { MeasurementStore } from '../database/measurement.store';
import { describeIssues } from '../common/zod-issues';
import { kindFieldSchema } from './dto/reading-payload.dto';
import { ReadingValidator } from './reading.validator';

/**
 * Batch ingestion summary
 */
export interface BatchIngestionResult {
  kind: MeasurementKindName;
  inserted: number;
  ids: string[];
}

/**
 * IngestionService - validate, then append
 *
 * Each call is independent: validation is synchronous and the only
 * suspension point is the store. Concurrent calls for the same kind may
 * interleave; every successful call yields exactly one committed write.
 * Nothing is retried here; a StorageUnavailableError goes back to the
 * client, which may retry.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly validator: ReadingValidator,
    private readonly store: MeasurementStore,
  ) {}

  /**
   * Ingest a single reading whose kind is part of the body.
   *
   * @param body - `{ kind, value, timestamp?, source? }`
   */
  async ingest(body: unknown): Promise<StoredRecord> {
    const parsedKind = kindFieldSchema.safeParse(body);
    if (!parsedKind.success) {
      throw new MalformedPayloadError(describeIssues(parsedKind.error));
    }

    const reading = this.validator.validate(parsedKind.data.kind, body);
    const record = await this.store.append(reading);

    this.logger.debug(
      `Stored ${record.kind} reading #${record.id}: ${record.value} at ${record.timestamp.toISOString()}`,
    );
    return record;
  }

  /**
   * Ingest a batch of readings for one kind, atomically.
   *
   * @param kind - Kind token from the URL
   * @param body - `{ values: [{ value, timestamp?, source? }, ...] }`
   */
  async ingestBatch(
    kind: MeasurementKindName,
    body: unknown,
  ): Promise<BatchIngestionResult> {
    const readings = this.validator.validateBatch(kind, body);
    const records = await this.store.appendBatch(readings);

    this.logger.log(`Inserted ${records.length} '${kind}' reading(s)`);
    return {
      kind,
      inserted: records.length,
      ids: records.map((r) => r.id),
    };
  }
}
