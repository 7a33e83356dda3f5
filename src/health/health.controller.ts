import { Controller, Get } from '@nestjs/common';
import { MeasurementKindRegistry } from '../measurement-kinds/measurement-kind.registry';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  enabledKinds: string[];
}

/**
 * Liveness check
 *
 * @example
 * GET /health
 * Response: { status: "ok", timestamp: "2024-06-15T08:00:00.000Z", enabledKinds: ["power", "flow"] }
 */
@Controller('health')
export class HealthController {
  constructor(private readonly registry: MeasurementKindRegistry) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      enabledKinds: this.registry.enabledKinds(),
    };
  }
}
