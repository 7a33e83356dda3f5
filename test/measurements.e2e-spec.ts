import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Measurement } from '../src/database/entities/measurement.entity';
import { MeasurementStore } from '../src/database/measurement.store';
import { HealthController } from '../src/health/health.controller';
import { IngestionModule } from '../src/ingestion';
import { MeasurementKindsModule } from '../src/measurement-kinds';
import { MeasurementsModule } from '../src/measurements/measurements.module';
import { InMemoryMeasurementStore } from './utils/in-memory-measurement.store';
import { createConfig } from './utils/test-helpers';

/**
 * E2E tests for the measurement HTTP API
 *
 * Uses the real modules (controllers, services, validators, schema service)
 * with kinds "power" and "flow" enabled. The store is replaced by an
 * in-memory one and the repository only absorbs the schema DDL.
 */
describe('Measurements API (e2e)', () => {
  let app: INestApplication<App>;
  let store: InMemoryMeasurementStore;
  let mockRepository: { query: jest.Mock };

  beforeEach(async () => {
    store = new InMemoryMeasurementStore();
    mockRepository = { query: jest.fn().mockResolvedValue([]) };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        MeasurementKindsModule.forRoot(createConfig('power', 'flow')),
        IngestionModule,
        MeasurementsModule,
      ],
      controllers: [HealthController],
    })
      .overrideProvider(getRepositoryToken(Measurement))
      .useValue(mockRepository)
      .overrideProvider(MeasurementStore)
      .useValue(store)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should create the partitions of the enabled kinds on startup', () => {
    const statements = mockRepository.query.mock.calls.map((call: unknown[]) =>
      String(call[0]).replace(/\s+/g, ' '),
    );

    expect(statements).toContain(
      "CREATE TABLE IF NOT EXISTS measurements_power PARTITION OF measurements FOR VALUES IN ('power')",
    );
    expect(statements).toContain(
      "CREATE TABLE IF NOT EXISTS measurements_flow PARTITION OF measurements FOR VALUES IN ('flow')",
    );
  });

  it('should store an enabled reading, reject a disabled one and read back', async () => {
    await request(app.getHttpServer())
      .post('/measurements')
      .send({ kind: 'power', value: 42.0 })
      .expect(201);

    const rejected = await request(app.getHttpServer())
      .post('/measurements')
      .send({ kind: 'temperature', value: 20 })
      .expect(400);
    expect(rejected.body.error).toBe('KIND_NOT_ENABLED');

    const response = await request(app.getHttpServer())
      .get('/measurements')
      .query({ kind: 'power' })
      .expect(200);

    expect(response.body.count).toBe(1);
    expect(response.body.records).toHaveLength(1);
    expect(response.body.records[0].value).toBe(42);
    expect(store.size).toBe(1);
  });

  describe('POST /measurements', () => {
    it('should return the stored record', async () => {
      const response = await request(app.getHttpServer())
        .post('/measurements')
        .send({
          kind: 'flow',
          value: 12.5,
          timestamp: '2024-06-15T10:00:00+02:00',
          source: 'FM-07',
        })
        .expect(201);

      expect(response.body).toMatchObject({
        id: '1',
        kind: 'flow',
        value: 12.5,
        timestamp: '2024-06-15T08:00:00.000Z',
        source: 'FM-07',
      });
      expect(typeof response.body.createdAt).toBe('string');
    });

    it('should reject an out-of-range value without storing it', async () => {
      const response = await request(app.getHttpServer())
        .post('/measurements')
        .send({ kind: 'flow', value: -1 })
        .expect(400);

      expect(response.body).toMatchObject({
        statusCode: 400,
        error: 'OUT_OF_RANGE',
        message: "Value -1 for 'flow' is below the minimum of 0",
        bound: { side: 'min', limit: 0 },
      });
      expect(store.size).toBe(0);
    });

    it('should reject a malformed body', async () => {
      const response = await request(app.getHttpServer())
        .post('/measurements')
        .send({ kind: 'power', value: 'high' })
        .expect(400);

      expect(response.body.error).toBe('MALFORMED_PAYLOAD');
      expect(response.body.problems).toEqual(['value: must be a number']);
    });

    it('should reject an epoch timestamp beyond the date range without storing it', async () => {
      const response = await request(app.getHttpServer())
        .post('/measurements')
        .send({ kind: 'power', value: 1, timestamp: 10000000000000 })
        .expect(400);

      expect(response.body.error).toBe('MALFORMED_PAYLOAD');
      expect(response.body.problems).toEqual([
        'timestamp: is outside the supported date range',
      ]);
      expect(store.size).toBe(0);
    });

    it('should reject a body without kind', async () => {
      const response = await request(app.getHttpServer())
        .post('/measurements')
        .send({ value: 1 })
        .expect(400);

      expect(response.body.problems).toEqual(['kind: is required']);
    });

    it('should answer 503 when storage is down', async () => {
      store.outage = new Error('Connection terminated');

      const response = await request(app.getHttpServer())
        .post('/measurements')
        .send({ kind: 'power', value: 1 })
        .expect(503);

      expect(response.body.error).toBe('STORAGE_UNAVAILABLE');
    });
  });

  describe('POST /measurements/:kind', () => {
    it('should insert a batch', async () => {
      const response = await request(app.getHttpServer())
        .post('/measurements/flow')
        .send({ values: [{ value: 1 }, { value: 2, timestamp: 1718438400 }] })
        .expect(201);

      expect(response.body).toEqual({ kind: 'flow', inserted: 2, ids: ['1', '2'] });
    });

    it('should store nothing when one entry is invalid', async () => {
      const response = await request(app.getHttpServer())
        .post('/measurements/flow')
        .send({ values: [{ value: 1 }, { value: -2 }] })
        .expect(400);

      expect(response.body.path).toBe('values[1]');
      expect(store.size).toBe(0);
    });

    it('should reject a disabled kind', async () => {
      await request(app.getHttpServer())
        .post('/measurements/humidity')
        .send({ values: [{ value: 50 }] })
        .expect(400);
    });
  });

  describe('GET /measurements', () => {
    beforeEach(async () => {
      await request(app.getHttpServer())
        .post('/measurements/power')
        .send({
          values: [
            { value: 30, timestamp: '2024-06-15T10:00:00Z' },
            { value: 10, timestamp: '2024-06-15T08:00:00Z' },
            { value: 20, timestamp: '2024-06-15T09:00:00Z' },
          ],
        })
        .expect(201);
    });

    it('should return records ordered by timestamp', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements?kind=power')
        .expect(200);

      expect(response.body.records.map((r: { value: number }) => r.value)).toEqual([
        10, 20, 30,
      ]);
      expect(response.body.from).toBeNull();
      expect(response.body.to).toBeNull();
    });

    it('should filter by an inclusive window', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements')
        .query({
          kind: 'power',
          from: '2024-06-15T09:00:00Z',
          to: '2024-06-15T10:00:00Z',
        })
        .expect(200);

      expect(response.body.count).toBe(2);
      expect(response.body.from).toBe('2024-06-15T09:00:00.000Z');
    });

    it('should aggregate', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements')
        .query({ kind: 'power', agg: 'avg' })
        .expect(200);

      expect(response.body).toEqual({
        kind: 'power',
        from: null,
        to: null,
        aggregation: 'avg',
        value: 20,
        count: 3,
      });
    });

    it('should reject an inverted window', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements')
        .query({
          kind: 'power',
          from: '2024-06-16T00:00:00Z',
          to: '2024-06-15T00:00:00Z',
        })
        .expect(400);

      expect(response.body.error).toBe('INVALID_RANGE');
    });

    it('should reject an epoch bound beyond the date range', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements?kind=power&from=99999999999999')
        .expect(400);

      expect(response.body.problems).toEqual([
        'from: is outside the supported date range',
      ]);
    });

    it('should answer every repeated kind in request order', async () => {
      await request(app.getHttpServer())
        .post('/measurements')
        .send({ kind: 'flow', value: 7.5, timestamp: '2024-06-15T08:30:00Z' })
        .expect(201);

      const response = await request(app.getHttpServer())
        .get('/measurements?kind=flow&kind=power&agg=max')
        .expect(200);

      expect(response.body).toEqual({
        from: null,
        to: null,
        results: [
          { kind: 'flow', from: null, to: null, aggregation: 'max', value: 7.5, count: 1 },
          { kind: 'power', from: null, to: null, aggregation: 'max', value: 30, count: 3 },
        ],
      });
    });

    it('should reject a multi-kind query when any kind is not enabled', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements?kind=power&kind=temperature')
        .expect(400);

      expect(response.body.error).toBe('KIND_NOT_ENABLED');
      expect(response.body.kind).toBe('temperature');
    });

    it('should reject a query without kind', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements')
        .expect(400);

      expect(response.body.problems).toEqual(['kind: is required']);
    });

    it('should reject a kind that is not enabled', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements?kind=temperature')
        .expect(400);

      expect(response.body.error).toBe('KIND_NOT_ENABLED');
    });
  });

  describe('GET /measurements/kinds', () => {
    it('should list every supported kind with its enabled flag', async () => {
      const response = await request(app.getHttpServer())
        .get('/measurements/kinds')
        .expect(200);

      const enabled = response.body.kinds
        .filter((k: { enabled: boolean }) => k.enabled)
        .map((k: { kind: string }) => k.kind);
      expect(response.body.kinds).toHaveLength(5);
      expect(enabled).toEqual(['power', 'flow']);
    });
  });

  describe('GET /health', () => {
    it('should report the enabled kinds', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.body).toMatchObject({
        status: 'ok',
        enabledKinds: ['power', 'flow'],
      });
    });
  });
});
