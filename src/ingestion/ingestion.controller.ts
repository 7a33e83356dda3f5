import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  UseFilters,
} from '@nestjs/common';
import { MeasurementExceptionFilter } from '../common/measurement-exception.filter';
import { StoredRecordResponse, toStoredRecordResponse } from '../common/stored-record.response';
import { BatchIngestionResult, IngestionService } from './ingestion.service';

/**
 * IngestionController
 *
 * Write endpoints for readings.
 *
 * Endpoints:
 * - POST /measurements        - Ingest one reading (kind in the body)
 * - POST /measurements/:kind  - Ingest a batch of readings for one kind
 *
 * Domain failures are mapped to HTTP by MeasurementExceptionFilter:
 * validation -> 400, storage -> 503.
 */
@Controller('measurements')
@UseFilters(MeasurementExceptionFilter)
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * @example
   * curl -X POST http://localhost:8080/measurements \
   *   -H 'Content-Type: application/json' \
   *   -d '{"kind":"power","value":42.0}'
   * Response (201): { "id": "1", "kind": "power", "value": 42, ... }
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async ingest(@Body() body: unknown): Promise<StoredRecordResponse> {
    const record = await this.ingestionService.ingest(body);
    return toStoredRecordResponse(record);
  }

  /**
   * @example
   * curl -X POST http://localhost:8080/measurements/flow \
   *   -H 'Content-Type: application/json' \
   *   -d '{"values":[{"value":1.5,"timestamp":1718438400},{"value":1.7}]}'
   * Response (201): { "kind": "flow", "inserted": 2, "ids": ["7", "8"] }
   */
  @Post(':kind')
  @HttpCode(HttpStatus.CREATED)
  async ingestBatch(
    @Param('kind') kind: string,
    @Body() body: unknown,
  ): Promise<BatchIngestionResult> {
    this.logger.debug(`POST /measurements/${kind}`);
    return this.ingestionService.ingestBatch(kind, body);
  }
}
