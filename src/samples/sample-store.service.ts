import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { And, Between, LessThan, LessThanOrEqual, MoreThan, Not, Repository } from 'typeorm';
import type { FindOptionsWhere } from 'typeorm';
import { Subject } from 'rxjs';
import { upsStatsConfig } from '../config/ups-stats.config';
import { UpsSampleEntity } from '../persistence/ups-sample.entity';
import { UPS_STATUSES } from '../ups/ups.types';
import type { Sample, UpsStatus } from '../ups/ups.types';
import { ZERO_TOTALS, addInterval, addSample } from './running-totals';
import type { RunningTotals } from './running-totals';
import { StoreViolationError } from './store-violation.error';

const RANGE_BATCH_SIZE = 5_000;

/** 저장된 샘플과, 그 샘플까지의 누적 합계. */
export interface TotalsPoint {
  sample: Sample;
  totals: RunningTotals;
}

/**
 * UPS 샘플의 append-only 저장소.
 * - 쓰기(append/prune)는 하나의 promise 체인으로 직렬화된다
 * - timestamp 는 엄격하게 증가해야 하며, 위반 시 StoreViolationError
 * - 저장된 샘플은 appended$ 로 흘려보낸다
 * - 샘플마다 누적 합계를 함께 기록해 윈도우 통계가 원시 이력을 다시 읽지 않게 한다
 */
@Injectable()
export class SampleStoreService {
  private readonly logger = new Logger(SampleStoreService.name);
  private readonly appendedSubject = new Subject<Sample>();
  private writeChain: Promise<void> = Promise.resolve();
  private last: TotalsPoint | null | undefined;

  readonly appended$ = this.appendedSubject.asObservable();

  constructor(
    @InjectRepository(UpsSampleEntity)
    private readonly samplesRepository: Repository<UpsSampleEntity>,
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
  ) {}

  /** 샘플을 검증 후 기록한다. 거부된 샘플은 저장소를 변경하지 않는다. */
  append(sample: Sample): Promise<Sample> {
    return this.enqueueWrite(async () => {
      const problem = this.validate(sample);
      if (problem) {
        throw new StoreViolationError('invalid_sample', problem);
      }

      const previous = await this.lastPoint();
      if (previous && sample.timestamp <= previous.sample.timestamp) {
        throw new StoreViolationError(
          'non_monotonic',
          `Sample at ${new Date(sample.timestamp).toISOString()} is not after last stored sample at ${new Date(previous.sample.timestamp).toISOString()}`,
        );
      }

      const stored: Sample = Object.freeze({
        timestamp: sample.timestamp,
        status: sample.status,
        chargePct: sample.chargePct,
        loadPct: sample.loadPct,
        runtimeEstimateSeconds: sample.runtimeEstimateSeconds,
      });
      const base = previous
        ? addInterval(
            previous.totals,
            previous.sample,
            stored.timestamp,
            stored.timestamp,
            this.config.aggregation.downGapMs,
          )
        : ZERO_TOTALS;
      const totals = addSample(base, stored);
      await this.samplesRepository.insert(this.toEntity(stored, totals));
      this.last = { sample: stored, totals };
      this.appendedSubject.next(stored);
      return stored;
    });
  }

  /** timestamp ∈ [from, to] 인 샘플을 오름차순으로 페이지 단위로 읽는다. */
  async *range(from: number, to: number, batchSize = RANGE_BATCH_SIZE): AsyncGenerator<Sample> {
    if (to < from) {
      return;
    }
    let cursor = from;
    let firstPage = true;
    for (;;) {
      const rows = await this.samplesRepository.find({
        where: { timestampMs: firstPage ? Between(cursor, to) : And(MoreThan(cursor), LessThanOrEqual(to)) },
        order: { timestampMs: 'ASC' },
        take: batchSize,
      });
      for (const row of rows) {
        yield this.toSample(row);
      }
      if (rows.length < batchSize) {
        return;
      }
      cursor = rows[rows.length - 1].timestampMs;
      firstPage = false;
    }
  }

  async latest(): Promise<Sample | null> {
    const point = await this.findPoint({}, 'DESC');
    return point ? point.sample : null;
  }

  /** timestamp 보다 엄격히 이전인 마지막 샘플 (윈도우 앞부분을 덮는 anchor). */
  async latestBefore(timestamp: number): Promise<Sample | null> {
    const point = await this.pointBefore(timestamp);
    return point ? point.sample : null;
  }

  pointBefore(timestamp: number): Promise<TotalsPoint | null> {
    return this.findPoint({ timestampMs: LessThan(timestamp) }, 'DESC');
  }

  pointAtOrBefore(timestamp: number): Promise<TotalsPoint | null> {
    return this.findPoint({ timestampMs: LessThanOrEqual(timestamp) }, 'DESC');
  }

  /** 남아 있는 가장 오래된 샘플. prune 이후에는 anchor 가 된다. */
  earliestPoint(): Promise<TotalsPoint | null> {
    return this.findPoint({}, 'ASC');
  }

  /** timestamp 바로 다음 샘플. 구간이 닫혔는지, 언제 닫혔는지 판단하는 데 쓴다. */
  async firstAfter(timestamp: number): Promise<Sample | null> {
    const point = await this.findPoint({ timestampMs: MoreThan(timestamp) }, 'ASC');
    return point ? point.sample : null;
  }

  /** 해당 상태가 아닌 마지막 샘플의 timestamp. 현재 배터리 구간의 시작점을 찾는 데 쓴다. */
  async lastTimestampNotInStatus(status: UpsStatus): Promise<number | null> {
    const [row] = await this.samplesRepository.find({
      where: { status: Not(status) },
      order: { timestampMs: 'DESC' },
      take: 1,
    });
    return row ? row.timestampMs : null;
  }

  async lastTimestamp(): Promise<number | null> {
    const last = await this.lastPoint();
    return last ? last.sample.timestamp : null;
  }

  count(): Promise<number> {
    return this.samplesRepository.count();
  }

  /**
   * cutoff 이전 샘플을 삭제한다. cutoff 직전의 마지막 샘플 하나는 남겨
   * 가장 긴 윈도우의 시작 구간 상태를 계속 알 수 있게 한다.
   */
  prune(cutoff: number): Promise<number> {
    return this.enqueueWrite(async () => {
      const anchor = await this.latestBefore(cutoff);
      if (!anchor) {
        return 0;
      }
      const result = await this.samplesRepository.delete({ timestampMs: LessThan(anchor.timestamp) });
      const removed = result.affected ?? 0;
      if (removed > 0) {
        this.logger.log(`Pruned ${removed} samples older than ${new Date(anchor.timestamp).toISOString()}`);
      }
      return removed;
    });
  }

  private async lastPoint(): Promise<TotalsPoint | null> {
    if (this.last === undefined) {
      this.last = await this.findPoint({}, 'DESC');
    }
    return this.last;
  }

  private async findPoint(
    where: FindOptionsWhere<UpsSampleEntity>,
    direction: 'ASC' | 'DESC',
  ): Promise<TotalsPoint | null> {
    const [row] = await this.samplesRepository.find({ where, order: { timestampMs: direction }, take: 1 });
    return row ? { sample: this.toSample(row), totals: this.toTotals(row) } : null;
  }

  /** 쓰기 작업을 직렬화한다. 실패는 반환된 promise 로만 전달되고 체인은 계속된다. */
  private enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
    const result = this.writeChain.then(task);
    this.writeChain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private validate(sample: Sample): string | null {
    if (!Number.isSafeInteger(sample.timestamp) || sample.timestamp <= 0) {
      return `Invalid timestamp ${sample.timestamp}`;
    }
    if (!UPS_STATUSES.includes(sample.status)) {
      return `Invalid status ${String(sample.status)}`;
    }
    if (!Number.isFinite(sample.chargePct) || sample.chargePct < 0 || sample.chargePct > 100) {
      return `Invalid battery charge ${sample.chargePct}`;
    }
    if (!Number.isFinite(sample.loadPct) || sample.loadPct < 0) {
      return `Invalid load ${sample.loadPct}`;
    }
    const runtime = sample.runtimeEstimateSeconds;
    if (runtime !== null) {
      if (sample.status !== 'ON_BATTERY') {
        return `Runtime estimate is only recorded on battery (status ${sample.status})`;
      }
      if (!Number.isFinite(runtime) || runtime < 0) {
        return `Invalid runtime estimate ${runtime}`;
      }
    }
    return null;
  }

  private toEntity(sample: Sample, totals: RunningTotals): UpsSampleEntity {
    return this.samplesRepository.create({
      timestampMs: sample.timestamp,
      status: sample.status,
      chargePct: sample.chargePct,
      loadPct: sample.loadPct,
      runtimeSeconds: sample.runtimeEstimateSeconds,
      totalObservedMs: totals.observedMs,
      totalSystemUpMs: totals.systemUpMs,
      totalWallPowerMs: totals.wallPowerMs,
      totalSampleCount: totals.sampleCount,
      totalLoadMilliPct: totals.loadMilliPct,
    });
  }

  private toTotals(row: UpsSampleEntity): RunningTotals {
    return {
      observedMs: Number(row.totalObservedMs),
      systemUpMs: Number(row.totalSystemUpMs),
      wallPowerMs: Number(row.totalWallPowerMs),
      sampleCount: Number(row.totalSampleCount),
      loadMilliPct: Number(row.totalLoadMilliPct),
    };
  }

  private toSample(row: UpsSampleEntity): Sample {
    return {
      timestamp: Number(row.timestampMs),
      status: row.status,
      chargePct: row.chargePct,
      loadPct: row.loadPct,
      runtimeEstimateSeconds: row.runtimeSeconds ?? null,
    };
  }
}
