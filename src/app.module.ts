import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { validateEnvironment, Environment } from './config/environment';
import { ServiceConfig } from './config/service-config';
import { buildTypeOrmOptions } from './config/typeorm.config';
import { HealthController } from './health/health.controller';
import { IngestionModule } from './ingestion';
import { MeasurementKindsModule } from './measurement-kinds';
import { MeasurementsModule } from './measurements/measurements.module';

/**
 * Root module. Built per process from the startup configuration so the set
 * of enabled kinds flows into the container explicitly.
 */
@Module({})
export class AppModule {
  static forRoot(serviceConfig: ServiceConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          validate: validateEnvironment,
        }),
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule],
          useFactory: (configService: ConfigService<Environment, true>) =>
            buildTypeOrmOptions(configService, serviceConfig),
          inject: [ConfigService],
        }),
        MeasurementKindsModule.forRoot(serviceConfig),
        IngestionModule,
        MeasurementsModule,
      ],
      controllers: [HealthController],
    };
  }
}
