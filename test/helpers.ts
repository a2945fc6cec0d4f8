import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { AlertEntity } from '../src/alerts/alert.entity';
import { loadUpsStatsConfig } from '../src/config/ups-stats.config';
import type { UpsStatsConfig } from '../src/config/ups-stats.config';
import { UpsSampleEntity } from '../src/persistence/ups-sample.entity';
import { SampleStoreService } from '../src/samples/sample-store.service';
import { ShutdownEventEntity } from '../src/shutdown/shutdown-event.entity';
import type { Sample } from '../src/ups/ups.types';

/** 테스트용 설정. 환경 변수 대신 명시한 값만으로 만든다. */
export function createTestConfig(env: Record<string, string> = {}): UpsStatsConfig {
  return loadUpsStatsConfig({ NODE_ENV: 'test', ...env });
}

export function createTestDataSource(database = ':memory:'): Promise<DataSource> {
  return new DataSource({
    type: 'sqlite',
    database,
    entities: [UpsSampleEntity, ShutdownEventEntity, AlertEntity],
    synchronize: true,
  }).initialize();
}

export function createSampleStore(dataSource: DataSource, config: UpsStatsConfig = createTestConfig()): SampleStoreService {
  return new SampleStoreService(dataSource.getRepository(UpsSampleEntity), config);
}

export function makeSample(timestamp: number, overrides: Partial<Omit<Sample, 'timestamp'>> = {}): Sample {
  return {
    timestamp,
    status: 'ON_LINE',
    chargePct: 100,
    loadPct: 20,
    runtimeEstimateSeconds: null,
    ...overrides,
  };
}
