import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Measurement } from './entities/measurement.entity';
import { MeasurementStore } from './measurement.store';
import { TypeOrmMeasurementStore } from './typeorm-measurement.store';
import { MeasurementSchemaService } from './measurement-schema.service';

/**
 * DatabaseModule
 *
 * Storage adapter for readings:
 * - MeasurementStore: bound to the TypeORM/PostgreSQL implementation
 * - MeasurementSchemaService: per-kind partitions, created on startup
 */
@Module({
  imports: [TypeOrmModule.forFeature([Measurement])],
  providers: [
    MeasurementSchemaService,
    { provide: MeasurementStore, useClass: TypeOrmMeasurementStore },
  ],
  exports: [MeasurementStore],
})
export class DatabaseModule {}
