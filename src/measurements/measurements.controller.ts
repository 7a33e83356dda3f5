import { Controller, Get, Logger, Query, UseFilters } from '@nestjs/common';
import { MalformedPayloadError } from '../common/measurement.errors';
import { MeasurementExceptionFilter } from '../common/measurement-exception.filter';
import { Aggregation } from '../common/measurement.types';
import {
  StoredRecordResponse,
  toStoredRecordResponse,
} from '../common/stored-record.response';
import { describeIssues } from '../common/zod-issues';
import { MeasurementKindDescriptor } from '../measurement-kinds/interfaces/measurement-validator.interface';
import { measurementsQuerySchema } from './dto/measurements-query.dto';
import {
  MeasurementQueryResult,
  MeasurementsService,
} from './measurements.service';

interface WindowResponse {
  kind: string;
  from: string | null;
  to: string | null;
}

export interface RecordsResponse extends WindowResponse {
  count: number;
  records: StoredRecordResponse[];
}

export interface AggregateResponse extends WindowResponse {
  aggregation: Aggregation;
  value: number | null;
  count: number;
}

export type KindResponse = RecordsResponse | AggregateResponse;

/**
 * Response when `kind` is repeated: one entry per kind, in request order.
 */
export interface MultiKindResponse {
  from: string | null;
  to: string | null;
  results: KindResponse[];
}

/**
 * MeasurementsController
 *
 * Read endpoints for stored readings.
 *
 * Endpoints:
 * - GET /measurements?kind=&from=&to=&agg= - Records or one aggregate per kind
 * - GET /measurements/kinds                - Registered kinds and whether enabled
 */
@Controller('measurements')
@UseFilters(MeasurementExceptionFilter)
export class MeasurementsController {
  private readonly logger = new Logger(MeasurementsController.name);

  constructor(private readonly measurementsService: MeasurementsService) {}

  /**
   * List registered kinds
   *
   * @example
   * GET /measurements/kinds
   * Response: { kinds: [{ kind: "power", unit: "W", min: 0, max: 1000000000, enabled: true, ... }] }
   */
  @Get('kinds')
  getKinds(): { kinds: MeasurementKindDescriptor[] } {
    return { kinds: this.measurementsService.describeKinds() };
  }

  /**
   * Query readings of one or more kinds
   *
   * @example
   * GET /measurements?kind=power
   * GET /measurements?kind=flow&from=1718409600&to=1718496000
   * GET /measurements?kind=temperature&from=2024-06-15T00:00:00Z&agg=max
   * GET /measurements?kind=power&kind=flow
   */
  @Get()
  async getMeasurements(
    @Query() query: Record<string, unknown>,
  ): Promise<KindResponse | MultiKindResponse> {
    this.logger.debug(`GET /measurements with query: ${JSON.stringify(query)}`);

    const parsed = measurementsQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new MalformedPayloadError(describeIssues(parsed.error));
    }

    const { kind: kinds, from, to, agg } = parsed.data;

    if (kinds.length === 1) {
      const result = await this.measurementsService.query(kinds[0], from, to, agg);
      return this.toKindResponse(result);
    }

    const results = await this.measurementsService.queryMany(kinds, from, to, agg);
    return {
      from: from?.toISOString() ?? null,
      to: to?.toISOString() ?? null,
      results: results.map((result) => this.toKindResponse(result)),
    };
  }

  private toKindResponse(result: MeasurementQueryResult): KindResponse {
    const window: WindowResponse = {
      kind: result.kind,
      from: result.range.from?.toISOString() ?? null,
      to: result.range.to?.toISOString() ?? null,
    };

    if (result.type === 'aggregate') {
      return {
        ...window,
        aggregation: result.result.aggregation,
        value: result.result.value,
        count: result.result.count,
      };
    }

    this.logger.debug(`Returning ${result.records.length} records`);
    return {
      ...window,
      count: result.records.length,
      records: result.records.map(toStoredRecordResponse),
    };
  }
}
