import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Measurement } from '../database/entities/measurement.entity';
import { Environment } from './environment';
import { ServiceConfig } from './service-config';

/**
 * TypeORM connection options.
 *
 * The schema is partitioned per enabled kind, which TypeORM cannot
 * synchronize; MeasurementSchemaService owns the DDL instead.
 *
 * The pg pool is bounded: requests beyond `poolSize` queue inside the pool
 * and fail after `connectionTimeoutMillis`.
 */
export function buildTypeOrmOptions(
  configService: ConfigService<Environment, true>,
  serviceConfig: ServiceConfig,
): TypeOrmModuleOptions {
  const poolSize =
    configService.get('DB_POOL_SIZE', { infer: true }) ??
    serviceConfig.enabledKinds.length + 2;

  return {
    type: 'postgres',
    host: configService.get('POSTGRES_HOST', { infer: true }),
    port: configService.get('POSTGRES_PORT', { infer: true }),
    username: configService.get('POSTGRES_USER', { infer: true }),
    password: configService.get('POSTGRES_PASSWORD', { infer: true }),
    database: configService.get('POSTGRES_DB', { infer: true }),
    entities: [Measurement],
    synchronize: false,
    poolSize,
    extra: {
      connectionTimeoutMillis: configService.get('DB_POOL_TIMEOUT_MS', {
        infer: true,
      }),
    },
    logging: configService.get('NODE_ENV', { infer: true }) !== 'production',
  };
}
