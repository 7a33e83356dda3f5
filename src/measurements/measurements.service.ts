import { Injectable, Logger } from '@nestjs/common';
import {
  InvalidRangeError,
  KindNotEnabledError,
} from '../common/measurement.errors';
import {
  AggregateResult,
  Aggregation,
  MeasurementKindName,
  StoredRecord,
  TimeRange,
} from '../common/measurement.types';
import { MeasurementStore } from '../database/measurement.store';
import { MeasurementKindDescriptor } from '../measurement-kinds/interfaces/measurement-validator.interface';
import { MeasurementKindRegistry } from '../measurement-kinds/measurement-kind.registry';

/**
 * Result of a read: either the raw records or one aggregate.
 */
export type MeasurementQueryResult =
  | { type: 'records'; kind: MeasurementKindName; range: TimeRange; records: StoredRecord[] }
  | { type: 'aggregate'; kind: MeasurementKindName; range: TimeRange; result: AggregateResult };

/**
 * MeasurementsService - read path
 *
 * Never mutates stored data. A kind that was not enabled for this process
 * fails with the same KindNotEnabledError the ingestion path uses.
 */
@Injectable()
export class MeasurementsService {
  private readonly logger = new Logger(MeasurementsService.name);

  constructor(
    private readonly registry: MeasurementKindRegistry,
    private readonly store: MeasurementStore,
  ) {}

  /**
   * Get readings of one kind in a time window, optionally aggregated.
   *
   * @param kind - Kind token
   * @param from - Inclusive lower bound (open if omitted)
   * @param to - Inclusive upper bound (open if omitted)
   * @param aggregation - count | avg | min | max
   * @throws KindNotEnabledError, InvalidRangeError
   */
  async query(
    kind: MeasurementKindName,
    from?: Date,
    to?: Date,
    aggregation?: Aggregation,
  ): Promise<MeasurementQueryResult> {
    this.assertQueryable([kind], from, to);

    const range: TimeRange = { from, to };
    this.logger.debug(
      `Query ${kind} from ${from?.toISOString() ?? '-inf'} to ${to?.toISOString() ?? '+inf'}${aggregation ? ` (${aggregation})` : ''}`,
    );

    if (aggregation) {
      const result = await this.store.aggregate(kind, range, aggregation);
      return { type: 'aggregate', kind, range, result };
    }

    const records = await this.store.query(kind, range);
    return { type: 'records', kind, range, records };
  }

  /**
   * Query several kinds over the same window in one call.
   *
   * Every kind is checked before storage is touched, so one disabled kind
   * fails the whole request. Results follow the order of `kinds`.
   *
   * @throws KindNotEnabledError for the first kind that is not enabled
   */
  async queryMany(
    kinds: readonly MeasurementKindName[],
    from?: Date,
    to?: Date,
    aggregation?: Aggregation,
  ): Promise<MeasurementQueryResult[]> {
    this.assertQueryable(kinds, from, to);

    return Promise.all(
      kinds.map((kind) => this.query(kind, from, to, aggregation)),
    );
  }

  /**
   * Registered kinds with units, bounds and whether they are enabled
   */
  describeKinds(): MeasurementKindDescriptor[] {
    return this.registry.describe();
  }

  private assertQueryable(
    kinds: readonly MeasurementKindName[],
    from?: Date,
    to?: Date,
  ): void {
    const disabled = kinds.find((kind) => !this.registry.isEnabled(kind));
    if (disabled !== undefined) {
      throw new KindNotEnabledError(disabled, this.registry.enabledKinds());
    }
    if (from && to && from.getTime() > to.getTime()) {
      throw new InvalidRangeError(from, to);
    }
  }
}
