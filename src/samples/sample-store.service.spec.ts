import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { DataSource } from 'typeorm';
import { createSampleStore, createTestDataSource, makeSample } from '../../test/helpers';
import type { Sample } from '../ups/ups.types';
import { SampleStoreService } from './sample-store.service';
import { StoreViolationError } from './store-violation.error';

const T0 = Date.UTC(2026, 0, 1);

async function collect(iterable: AsyncIterable<Sample>): Promise<number[]> {
  const timestamps: number[] = [];
  for await (const sample of iterable) {
    timestamps.push(sample.timestamp);
  }
  return timestamps;
}

describe('SampleStoreService', () => {
  let dataSource: DataSource;
  let store: SampleStoreService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    store = createSampleStore(dataSource);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('appends samples and publishes each stored sample', async () => {
    const published: Sample[] = [];
    const subscription = store.appended$.subscribe((sample) => published.push(sample));

    const stored = await store.append(makeSample(T0, { loadPct: 42 }));
    await store.append(makeSample(T0 + 1000));
    subscription.unsubscribe();

    expect(stored).toEqual(makeSample(T0, { loadPct: 42 }));
    expect(Object.isFrozen(stored)).toBe(true);
    expect(published.map((sample) => sample.timestamp)).toEqual([T0, T0 + 1000]);
    expect(await store.count()).toBe(2);
    expect(await store.latest()).toEqual(makeSample(T0 + 1000));
  });

  it('rejects a timestamp that is not after the last stored sample', async () => {
    await store.append(makeSample(T0));
    await store.append(makeSample(T0 + 1000));

    await expect(store.append(makeSample(T0 + 1000))).rejects.toMatchObject({ kind: 'non_monotonic' });
    await expect(store.append(makeSample(T0 + 500))).rejects.toBeInstanceOf(StoreViolationError);
    expect(await store.count()).toBe(2);
  });

  it('keeps order when appends race', async () => {
    const results = await Promise.allSettled([
      store.append(makeSample(T0 + 2000)),
      store.append(makeSample(T0 + 1000)),
      store.append(makeSample(T0 + 3000)),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect(await collect(store.range(0, T0 + 10_000))).toEqual([T0 + 2000, T0 + 3000]);
  });

  it('rejects invalid readings without storing them', async () => {
    await expect(store.append(makeSample(T0, { chargePct: 120 }))).rejects.toMatchObject({
      kind: 'invalid_sample',
      message: 'Invalid battery charge 120',
    });
    await expect(store.append(makeSample(T0, { runtimeEstimateSeconds: 600 }))).rejects.toMatchObject({
      kind: 'invalid_sample',
      message: 'Runtime estimate is only recorded on battery (status ON_LINE)',
    });
    expect(await store.count()).toBe(0);
  });

  it('reads an inclusive range across pages', async () => {
    for (let i = 0; i < 7; i += 1) {
      await store.append(makeSample(T0 + i * 1000));
    }

    expect(await collect(store.range(T0 + 1000, T0 + 5000, 2))).toEqual([
      T0 + 1000,
      T0 + 2000,
      T0 + 3000,
      T0 + 4000,
      T0 + 5000,
    ]);
    expect(await collect(store.range(T0 + 5000, T0 + 1000))).toEqual([]);
  });

  it('finds the anchor before a timestamp and the start of the battery run', async () => {
    await store.append(makeSample(T0));
    await store.append(makeSample(T0 + 1000, { status: 'ON_BATTERY', chargePct: 90 }));
    await store.append(makeSample(T0 + 2000, { status: 'ON_BATTERY', chargePct: 89 }));

    expect((await store.latestBefore(T0 + 1000))?.timestamp).toBe(T0);
    expect(await store.latestBefore(T0)).toBeNull();
    expect(await store.lastTimestampNotInStatus('ON_BATTERY')).toBe(T0);
  });

  it('stores running totals with every sample', async () => {
    await store.append(makeSample(T0, { loadPct: 10 }));
    await store.append(makeSample(T0 + 1000, { loadPct: 20.5 }));
    await store.append(makeSample(T0 + 6000, { status: 'ON_BATTERY', chargePct: 90, loadPct: 30 }));
    await store.append(makeSample(T0 + 7000, { status: 'ON_BATTERY', chargePct: 89, loadPct: 30 }));

    expect((await store.pointAtOrBefore(T0 + 7000))?.totals).toEqual({
      observedMs: 7000,
      systemUpMs: 2000,
      wallPowerMs: 6000,
      sampleCount: 4,
      loadMilliPct: 90_500,
    });
    expect(await store.pointAtOrBefore(T0 + 6500)).toEqual({
      sample: makeSample(T0 + 6000, { status: 'ON_BATTERY', chargePct: 90, loadPct: 30 }),
      totals: { observedMs: 6000, systemUpMs: 1000, wallPowerMs: 6000, sampleCount: 3, loadMilliPct: 60_500 },
    });
    expect((await store.pointBefore(T0 + 6000))?.sample.timestamp).toBe(T0 + 1000);
    expect((await store.earliestPoint())?.totals).toEqual({
      observedMs: 0,
      systemUpMs: 0,
      wallPowerMs: 0,
      sampleCount: 1,
      loadMilliPct: 10_000,
    });
    expect((await store.firstAfter(T0 + 1000))?.timestamp).toBe(T0 + 6000);
    expect(await store.firstAfter(T0 + 7000)).toBeNull();
  });

  it('prunes old samples but keeps the last one before the cutoff', async () => {
    for (const offset of [0, 1000, 2000, 3000, 4000]) {
      await store.append(makeSample(T0 + offset));
    }

    const removed = await store.prune(T0 + 2500);

    expect(removed).toBe(2);
    expect(await collect(store.range(0, T0 + 10_000))).toEqual([T0 + 2000, T0 + 3000, T0 + 4000]);
  });

  it('prunes nothing when no sample precedes the cutoff', async () => {
    await store.append(makeSample(T0));

    expect(await store.prune(T0)).toBe(0);
    expect(await store.count()).toBe(1);
  });
});

describe('SampleStoreService durability', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'ups-stats-store-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('keeps appended samples and the ordering guard across a restart', async () => {
    const database = join(directory, 'samples.db');

    const first = await createTestDataSource(database);
    const before = createSampleStore(first);
    await before.append(makeSample(T0));
    await before.append(makeSample(T0 + 1000, { status: 'ON_BATTERY', chargePct: 80, runtimeEstimateSeconds: 900 }));
    await first.destroy();

    const second = await createTestDataSource(database);
    const after = createSampleStore(second);
    try {
      expect(await after.latest()).toEqual(
        makeSample(T0 + 1000, { status: 'ON_BATTERY', chargePct: 80, runtimeEstimateSeconds: 900 }),
      );
      await expect(after.append(makeSample(T0 + 1000))).rejects.toMatchObject({ kind: 'non_monotonic' });
      expect(await after.count()).toBe(2);
    } finally {
      await second.destroy();
    }
  });

  it('continues running totals from the stored history after a restart', async () => {
    const database = join(directory, 'totals.db');

    const first = await createTestDataSource(database);
    const before = createSampleStore(first);
    await before.append(makeSample(T0, { loadPct: 10 }));
    await before.append(makeSample(T0 + 1000, { loadPct: 20 }));
    await first.destroy();

    const second = await createTestDataSource(database);
    const after = createSampleStore(second);
    try {
      await after.append(makeSample(T0 + 2000, { loadPct: 30 }));
      expect((await after.pointAtOrBefore(T0 + 2000))?.totals).toEqual({
        observedMs: 2000,
        systemUpMs: 2000,
        wallPowerMs: 2000,
        sampleCount: 3,
        loadMilliPct: 60_000,
      });
    } finally {
      await second.destroy();
    }
  });
});
