import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  ObjectLiteral,
  Repository,
} from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { Measurement } from './entities/measurement.entity';
import { MeasurementStore } from './measurement.store';
import { StorageUnavailableError } from '../common/measurement.errors';
import {
  AggregateResult,
  Aggregation,
  MeasurementKindName,
  Reading,
  StoredRecord,
  TimeRange,
} from '../common/measurement.types';

const AGGREGATE_EXPRESSIONS: Record<Exclude<Aggregation, 'count'>, string> = {
  avg: 'AVG(m.value)',
  min: 'MIN(m.value)',
  max: 'MAX(m.value)',
};

interface AggregateRow {
  count: string | number | null;
  value?: string | number | null;
}

/**
 * TypeOrmMeasurementStore - PostgreSQL-backed MeasurementStore
 *
 * Writes go through the partitioned parent table; PostgreSQL routes each
 * row to its kind's partition. A batch is a single multi-row INSERT, so it
 * either commits completely or not at all.
 */
@Injectable()
export class TypeOrmMeasurementStore extends MeasurementStore {
  private readonly logger = new Logger(TypeOrmMeasurementStore.name);

  constructor(
    @InjectRepository(Measurement)
    private readonly measurementRepository: Repository<Measurement>,
  ) {
    super();
  }

  async append(reading: Reading): Promise<StoredRecord> {
    const [record] = await this.appendBatch([reading]);
    return record;
  }

  async appendBatch(readings: Reading[]): Promise<StoredRecord[]> {
    if (readings.length === 0) return [];

    const values: QueryDeepPartialEntity<Measurement>[] = readings.map((r) => ({
      kind: r.kind,
      value: r.value,
      timestamp: r.timestamp,
      source: r.source,
    }));

    // RETURNING id, "createdAt" is added by TypeORM for generated columns
    const result = await this.withStorage('insert', () =>
      this.measurementRepository
        .createQueryBuilder()
        .insert()
        .into(Measurement)
        .values(values)
        .execute(),
    );

    this.logger.debug(
      `Inserted ${readings.length} reading(s) of kind(s) ${[...new Set(readings.map((r) => r.kind))].join(', ')}`,
    );

    // The rows are committed at this point; a mapping failure is not retryable
    return readings.map((reading, index) =>
      this.withGeneratedColumns(reading, result.generatedMaps[index]),
    );
  }

  async query(
    kind: MeasurementKindName,
    range: TimeRange,
  ): Promise<StoredRecord[]> {
    return this.withStorage('query', async () => {
      const rows = await this.measurementRepository.find({
        where: this.buildWhere(kind, range),
        order: { timestamp: 'ASC', id: 'ASC' },
      });

      this.logger.debug(`Found ${rows.length} '${kind}' record(s)`);
      return rows.map((row) => this.toStoredRecord(row));
    });
  }

  async aggregate(
    kind: MeasurementKindName,
    range: TimeRange,
    aggregation: Aggregation,
  ): Promise<AggregateResult> {
    return this.withStorage('aggregate', async () => {
      const qb = this.measurementRepository
        .createQueryBuilder('m')
        .select('COUNT(*)', 'count')
        .where('m.kind = :kind', { kind });

      if (aggregation !== 'count') {
        qb.addSelect(AGGREGATE_EXPRESSIONS[aggregation], 'value');
      }
      if (range.from) {
        qb.andWhere('m.timestamp >= :from', { from: range.from });
      }
      if (range.to) {
        qb.andWhere('m.timestamp <= :to', { to: range.to });
      }

      const row = await qb.getRawOne<AggregateRow>();
      const count = Number(row?.count ?? 0);

      if (aggregation === 'count') {
        return { aggregation, value: count, count };
      }

      const value = row?.value;
      return {
        aggregation,
        value: value === null || value === undefined ? null : Number(value),
        count,
      };
    });
  }

  private buildWhere(
    kind: MeasurementKindName,
    range: TimeRange,
  ): FindOptionsWhere<Measurement> {
    const where: FindOptionsWhere<Measurement> = { kind };

    if (range.from && range.to) {
      where.timestamp = Between(range.from, range.to);
    } else if (range.from) {
      where.timestamp = MoreThanOrEqual(range.from);
    } else if (range.to) {
      where.timestamp = LessThanOrEqual(range.to);
    }

    return where;
  }

  private withGeneratedColumns(
    reading: Reading,
    generated: ObjectLiteral | undefined,
  ): StoredRecord {
    const id: unknown = generated?.id;
    const createdAt: unknown = generated?.createdAt;

    if (
      (typeof id !== 'string' && typeof id !== 'number') ||
      !(createdAt instanceof Date)
    ) {
      throw new Error('Insert did not return the generated id and createdAt');
    }

    return { ...reading, id: String(id), createdAt };
  }

  private toStoredRecord(row: Measurement): StoredRecord {
    return {
      id: String(row.id),
      kind: row.kind,
      value: row.value,
      timestamp: row.timestamp,
      source: row.source,
      createdAt: row.createdAt,
    };
  }

  /**
   * Run a storage operation, translating any driver failure (connection
   * loss, pool timeout, constraint violation) into StorageUnavailableError.
   */
  private async withStorage<T>(
    operation: string,
    work: () => Promise<T>,
  ): Promise<T> {
    try {
      return await work();
    } catch (error) {
      this.logger.error(`Storage ${operation} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StorageUnavailableError(operation, error);
    }
  }
}
