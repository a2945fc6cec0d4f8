import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import type { Cache } from 'cache-manager';
import { CACHE_TOKEN } from '../cache/cache.module';
import { upsStatsConfig } from '../config/ups-stats.config';
import { ZERO_TOTALS, addInterval, subtractTotals, withoutSample } from '../samples/running-totals';
import type { RunningTotals } from '../samples/running-totals';
import { SampleStoreService } from '../samples/sample-store.service';
import type { Sample } from '../ups/ups.types';
import { AGGREGATE_WINDOW_KEYS, AGGREGATE_WINDOWS } from './aggregation.types';
import type { Aggregate, AggregateSet, AggregateWindow } from './aggregation.types';
import { predictRuntimeSeconds } from './runtime-prediction';
import { buildAggregate } from './window-aggregate';

/** 윈도우 끝(now) 지점의 합계. 모든 윈도우가 공유한다. */
interface WindowEnd {
  at: number;
  time: RunningTotals;
  load: RunningTotals | null;
}

/**
 * 다섯 개 고정 윈도우의 통계를 계산한다.
 *
 * 샘플마다 저장된 누적 합계의 차이로 계산하므로 윈도우 길이와 무관하게
 * 윈도우당 몇 번의 키 조회만 한다. 캐시 키에 최신 샘플 timestamp 를 넣어
 * 새 샘플이 들어오면 자연히 무효화되고, 같은 키의 동시 요청은 한 계산을 공유한다.
 */
@Injectable()
export class AggregationService {
  private readonly logger = new Logger(AggregationService.name);
  private readonly pendingAggregates = new Map<string, Promise<Aggregate>>();
  private readonly pendingSets = new Map<string, Promise<AggregateSet>>();

  constructor(
    private readonly store: SampleStoreService,
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
    @Optional() @Inject(CACHE_TOKEN) private readonly cache?: Cache,
  ) {}

  async compute(window: AggregateWindow): Promise<Aggregate> {
    const latest = await this.store.lastTimestamp();
    const key = `aggregate:${window}:${latest ?? 'none'}`;
    return this.share(this.pendingAggregates, key, () => this.cached(key, () => this.computeAt(window, Date.now())));
  }

  async computeAll(): Promise<AggregateSet> {
    const latest = await this.store.lastTimestamp();
    const key = `aggregates:${latest ?? 'none'}`;
    return this.share(this.pendingSets, key, () => this.cached(key, () => this.computeAllAt(Date.now())));
  }

  /** 캐시 없이 now 기준으로 한 윈도우를 계산한다. */
  async computeAt(window: AggregateWindow, now: number): Promise<Aggregate> {
    return this.computeWindow(window, await this.windowEnd(now));
  }

  async computeAllAt(now: number): Promise<AggregateSet> {
    const end = await this.windowEnd(now);
    const aggregates: Aggregate[] = [];
    for (const window of AGGREGATE_WINDOW_KEYS) {
      aggregates.push(await this.computeWindow(window, end));
    }
    const [minute, hour, day, week, month] = aggregates;
    return { '1m': minute, '1h': hour, '24h': day, '7d': week, '30d': month };
  }

  /**
   * 배터리 사용 중일 때, 종료 임계치까지 남은 시간(초)을 예측한다.
   * 배터리 구간이 아니거나 하락 이력이 부족하면 null.
   */
  async predictRuntime(): Promise<number | null> {
    const latest = await this.store.latest();
    if (!latest || latest.status !== 'ON_BATTERY') {
      return null;
    }
    const lastOtherStatus = await this.store.lastTimestampNotInStatus('ON_BATTERY');
    const runStart = lastOtherStatus === null ? 0 : lastOtherStatus + 1;
    const samples: Sample[] = [];
    for await (const sample of this.store.range(runStart, latest.timestamp)) {
      samples.push(sample);
    }
    return predictRuntimeSeconds(samples, this.config.shutdown.thresholdPct);
  }

  private async windowEnd(now: number): Promise<WindowEnd> {
    const point = await this.store.pointAtOrBefore(now);
    return { at: now, time: await this.timeTotalsAt(now, now), load: point ? point.totals : null };
  }

  private async computeWindow(window: AggregateWindow, end: WindowEnd): Promise<Aggregate> {
    const from = end.at - AGGREGATE_WINDOWS[window];
    const timeStart = await this.timeTotalsAt(from, end.at);
    const loadStart = await this.loadTotalsBefore(from);
    return buildAggregate(
      window,
      from,
      end.at,
      subtractTotals(end.time, timeStart),
      subtractTotals(end.load ?? loadStart, loadStart),
    );
  }

  /**
   * at 시점까지 귀속된 누적 시간.
   * at 을 품은 구간이 아직 열려 있으면 windowEnd 에 닫힌 것으로 분류한다.
   * at 시점까지의 샘플이 없으면 관측은 남아 있는 첫 샘플에서 시작한다.
   */
  private async timeTotalsAt(at: number, windowEnd: number): Promise<RunningTotals> {
    const owner = await this.store.pointAtOrBefore(at);
    if (!owner) {
      const earliest = await this.store.earliestPoint();
      return earliest ? earliest.totals : ZERO_TOTALS;
    }
    const next = await this.store.firstAfter(owner.sample.timestamp);
    return addInterval(
      owner.totals,
      owner.sample,
      at,
      next ? next.timestamp : windowEnd,
      this.config.aggregation.downGapMs,
    );
  }

  /** from 이전까지 쌓인 부하 합계. */
  private async loadTotalsBefore(from: number): Promise<RunningTotals> {
    const anchor = await this.store.pointBefore(from);
    if (anchor) {
      return anchor.totals;
    }
    const earliest = await this.store.earliestPoint();
    return earliest ? withoutSample(earliest.totals, earliest.sample) : ZERO_TOTALS;
  }

  private share<T>(pending: Map<string, Promise<T>>, key: string, compute: () => Promise<T>): Promise<T> {
    const running = pending.get(key);
    if (running) {
      return running;
    }
    const task = compute().finally(() => pending.delete(key));
    pending.set(key, task);
    return task;
  }

  private async cached<T>(key: string, compute: () => Promise<T>): Promise<T> {
    const ttl = this.config.aggregation.cacheTtlMs;
    if (!this.cache || ttl <= 0) {
      return compute();
    }
    try {
      const hit = await this.cache.get<T>(key);
      if (hit !== undefined && hit !== null) {
        return hit;
      }
    } catch (error) {
      this.logger.warn(`Failed to read aggregate cache: ${error}`);
    }

    const value = await compute();
    try {
      await this.cache.set(key, value, ttl);
    } catch (error) {
      this.logger.warn(`Failed to cache aggregates: ${error}`);
    }
    return value;
  }
}
