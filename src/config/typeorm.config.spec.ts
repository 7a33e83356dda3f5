import { ConfigService } from '@nestjs/config';
import { buildTypeOrmOptions } from './typeorm.config';
import { Environment, validateEnvironment } from './environment';
import { createServiceConfig } from './service-config';

describe('buildTypeOrmOptions', () => {
  // ConfigService prefers process.env over the values it was built with
  const isolated = ['NODE_ENV', 'DB_POOL_SIZE', 'DB_POOL_TIMEOUT_MS'] as const;
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of isolated) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  const configServiceFor = (
    env: Record<string, unknown>,
  ): ConfigService<Environment, true> =>
    new ConfigService<Environment, true>(
      validateEnvironment({
        POSTGRES_USER: 'measurements',
        POSTGRES_PASSWORD: 'test-password',
        POSTGRES_DB: 'measurements',
        ...env,
      }),
    );

  it('should size the pool from the enabled kinds by default', () => {
    const options = buildTypeOrmOptions(
      configServiceFor({}),
      createServiceConfig(['power', 'flow']),
    );

    expect(options).toMatchObject({
      type: 'postgres',
      host: 'localhost',
      port: 5432,
      username: 'measurements',
      database: 'measurements',
      synchronize: false,
      poolSize: 4,
      extra: { connectionTimeoutMillis: 30000 },
      logging: true,
    });
  });

  it('should honour DB_POOL_SIZE and disable SQL logging in production', () => {
    const options = buildTypeOrmOptions(
      configServiceFor({ DB_POOL_SIZE: '10', NODE_ENV: 'production' }),
      createServiceConfig(['power']),
    );

    expect(options).toMatchObject({ poolSize: 10, logging: false });
  });
});
