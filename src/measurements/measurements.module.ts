import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { MeasurementsController } from './measurements.controller';
import { MeasurementsService } from './measurements.service';

/**
 * MeasurementsModule
 *
 * Read path for stored readings: filtered by kind and time window,
 * optionally aggregated (count, avg, min, max).
 */
@Module({
  imports: [DatabaseModule],
  controllers: [MeasurementsController],
  providers: [MeasurementsService],
  exports: [MeasurementsService],
})
export class MeasurementsModule {}
