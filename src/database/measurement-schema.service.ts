import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Measurement } from './entities/measurement.entity';
import { SERVICE_CONFIG, ServiceConfig } from '../config/service-config';
import { MeasurementKindRegistry } from '../measurement-kinds/measurement-kind.registry';

/**
 * MeasurementSchemaService - creates the partitioned storage schema
 *
 * Runs once when the module initializes, before the HTTP listener starts:
 * 1. Optionally drops both tables (`--reset-schema`)
 * 2. Creates `measurement_kinds` and the partitioned `measurements` parent
 * 3. Records each enabled kind and creates its partition `measurements_<kind>`
 *
 * Every statement is idempotent, so restarting with the same or additional
 * kinds keeps existing data.
 */
@Injectable()
export class MeasurementSchemaService implements OnModuleInit {
  private readonly logger = new Logger(MeasurementSchemaService.name);

  constructor(
    @InjectRepository(Measurement)
    private readonly measurementRepository: Repository<Measurement>,
    @Inject(SERVICE_CONFIG) private readonly config: ServiceConfig,
    private readonly registry: MeasurementKindRegistry,
  ) {}

  async onModuleInit(): Promise<void> {
    if (this.config.resetSchema) {
      await this.dropTables();
    }
    await this.createTables();
  }

  /** Partition table name for a kind; kind tokens are restricted to [a-z0-9_]. */
  static partitionName(kind: string): string {
    return `measurements_${kind}`;
  }

  private async dropTables(): Promise<void> {
    this.logger.warn("Dropping tables 'measurements' and 'measurement_kinds'");
    await this.measurementRepository.query(
      'DROP TABLE IF EXISTS measurements CASCADE',
    );
    await this.measurementRepository.query(
      'DROP TABLE IF EXISTS measurement_kinds CASCADE',
    );
  }

  private async createTables(): Promise<void> {
    await this.measurementRepository.query(
      `CREATE TABLE IF NOT EXISTS measurement_kinds (
        name VARCHAR(32) PRIMARY KEY,
        unit VARCHAR(16) NOT NULL,
        "enabledAt" TIMESTAMPTZ NOT NULL DEFAULT now()
      )`,
    );

    await this.measurementRepository.query(
      `CREATE TABLE IF NOT EXISTS measurements (
        id BIGSERIAL NOT NULL,
        kind VARCHAR(32) NOT NULL,
        value DOUBLE PRECISION NOT NULL,
        "timestamp" TIMESTAMPTZ NOT NULL,
        source VARCHAR(128),
        "createdAt" TIMESTAMPTZ NOT NULL DEFAULT now(),
        PRIMARY KEY (kind, id)
      ) PARTITION BY LIST (kind)`,
    );

    await this.measurementRepository.query(
      `CREATE INDEX IF NOT EXISTS idx_measurements_kind_timestamp
        ON measurements (kind, "timestamp", id)`,
    );

    for (const kind of this.config.enabledKinds) {
      const validator = this.registry.resolve(kind);
      const partition = MeasurementSchemaService.partitionName(validator.kind);

      await this.measurementRepository.query(
        `INSERT INTO measurement_kinds (name, unit) VALUES ($1, $2)
         ON CONFLICT (name) DO UPDATE SET unit = EXCLUDED.unit`,
        [validator.kind, validator.unit],
      );
      await this.measurementRepository.query(
        `CREATE TABLE IF NOT EXISTS ${partition}
         PARTITION OF measurements FOR VALUES IN ('${validator.kind}')`,
      );
      this.logger.debug(`Partition '${partition}' ready for '${kind}'`);
    }

    this.logger.log(
      `Measurement schema ready (${this.config.enabledKinds.length} partition(s))`,
    );
  }
}
