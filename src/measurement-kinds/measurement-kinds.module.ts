import { DynamicModule, Module } from '@nestjs/common';
import { SERVICE_CONFIG, ServiceConfig } from '../config/service-config';
import { MeasurementKindRegistry } from './measurement-kind.registry';

/**
 * MeasurementKindsModule
 *
 * Provides the startup configuration and the kind registry to every other
 * module. Registry construction fails (and with it the application bootstrap)
 * when an unsupported kind is enabled.
 */
@Module({})
export class MeasurementKindsModule {
  static forRoot(config: ServiceConfig): DynamicModule {
    return {
      module: MeasurementKindsModule,
      global: true,
      providers: [
        { provide: SERVICE_CONFIG, useValue: config },
        {
          provide: MeasurementKindRegistry,
          useFactory: (serviceConfig: ServiceConfig) =>
            MeasurementKindRegistry.fromConfig(serviceConfig),
          inject: [SERVICE_CONFIG],
        },
      ],
      exports: [SERVICE_CONFIG, MeasurementKindRegistry],
    };
  }
}
