import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import type { App } from 'supertest/types';
import { ZodValidationPipe } from 'nestjs-zod';
import { AppModule } from '../src/app.module';
import { SampleStoreService } from '../src/samples/sample-store.service';

describe('ups-stats API (e2e)', () => {
  let app: INestApplication<App>;
  let store: SampleStoreService;

  beforeAll(async () => {
    process.env.NODE_ENV = 'test';

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    app.setGlobalPrefix('api');
    app.useGlobalPipes(new ZodValidationPipe());
    await app.init();

    store = app.get(SampleStoreService);
  });

  afterAll(async () => {
    await app.close();
  });

  it('responds with health status', async () => {
    await request(app.getHttpServer()).get('/api/health').expect(200).expect('ok');
  });

  it('rejects unknown aggregate windows', async () => {
    await request(app.getHttpServer()).get('/api/stats/aggregates/2h').expect(400);
  });

  it('exposes stored samples through the stats snapshot', async () => {
    const now = Date.now();
    await store.append({ timestamp: now - 1500, status: 'ON_LINE', chargePct: 100, loadPct: 30, runtimeEstimateSeconds: null });
    await store.append({ timestamp: now - 1000, status: 'ON_LINE', chargePct: 100, loadPct: 50, runtimeEstimateSeconds: null });

    const { body } = await request(app.getHttpServer()).get('/api/stats').expect(200);

    expect(body.type).toBe('ups-stats');
    expect(body.latest).toEqual({
      timestamp: new Date(now - 1000).toISOString(),
      status: 'ON_LINE',
      chargePct: 100,
      loadPct: 50,
      runtimeEstimateSeconds: null,
    });
    expect(Object.keys(body.aggregates)).toEqual(['1m', '1h', '24h', '7d', '30d']);
    expect(body.aggregates['1m'].sampleCount).toBe(2);
    expect(body.aggregates['1m'].avgLoadPct).toBe(40);
    expect(body.uptime.window).toBe('30d');
    expect(body.uptime.wallPowerPct).toBe(100);
    expect(body.predictedRuntimeSeconds).toBeNull();
    expect(body.shutdown).toEqual({ state: 'NORMAL', targets: 0, lastTriggeredAt: null, lastOutcome: null });

    const single = await request(app.getHttpServer()).get('/api/stats/aggregates/1h').expect(200);
    expect(single.body.window).toBe('1h');
    expect(single.body.sampleCount).toBe(2);
    expect(single.body.wallPowerUptimePct).toBe(100);
  });

  it('lists no active alerts when nothing has been evaluated', async () => {
    const { body } = await request(app.getHttpServer()).get('/api/alerts/active').expect(200);
    expect(body).toEqual([]);
  });
});
