import {
  AggregateResult,
  Aggregation,
  MeasurementKindName,
  Reading,
  StoredRecord,
  TimeRange,
} from '../common/measurement.types';

/**
 * MeasurementStore - storage contract for readings.
 *
 * Abstract class rather than interface so it can serve as the Nest
 * injection token. Implementations are append-only: there is no update or
 * delete. Every failure of the backend surfaces as StorageUnavailableError
 * and leaves nothing partially written.
 */
export abstract class MeasurementStore {
  /**
   * Persist one reading.
   * @returns The stored record, including its assigned id
   */
  abstract append(reading: Reading): Promise<StoredRecord>;

  /**
   * Persist several readings atomically (all or none).
   * @returns Stored records in input order
   */
  abstract appendBatch(readings: Reading[]): Promise<StoredRecord[]>;

  /**
   * Records of one kind within the (inclusive) range, ordered by timestamp
   * ascending with ties in insertion order.
   */
  abstract query(
    kind: MeasurementKindName,
    range: TimeRange,
  ): Promise<StoredRecord[]>;

  abstract aggregate(
    kind: MeasurementKindName,
    range: TimeRange,
    aggregation: Aggregation,
  ): Promise<AggregateResult>;
}
