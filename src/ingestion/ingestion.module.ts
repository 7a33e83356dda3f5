import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';
import { ReadingValidator } from './reading.validator';

/**
 * IngestionModule
 *
 * Write path for readings.
 *
 * Components:
 * - IngestionController: POST /measurements and POST /measurements/:kind
 * - IngestionService: validate-then-append orchestration
 * - ReadingValidator: kind/shape/range checks via the kind registry
 *
 * Expects MeasurementKindsModule (global) to be registered by the root module.
 */
@Module({
  imports: [DatabaseModule],
  controllers: [IngestionController],
  providers: [IngestionService, ReadingValidator],
  exports: [IngestionService],
})
export class IngestionModule {}
