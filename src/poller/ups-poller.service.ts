import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AlertsService } from '../alerts/alerts.service';
import type { AlertMetric } from '../alerts/alerts.service';
import { errorTrace } from '../common/error-trace';
import { upsStatsConfig } from '../config/ups-stats.config';
import { SampleStoreService } from '../samples/sample-store.service';
import { StoreViolationError } from '../samples/store-violation.error';
import { UpsSourceService } from '../ups/ups-source.service';
import type { PollFailure, Sample } from '../ups/ups.types';

const POLL_INTERVAL_NAME = 'ups-poller';
const PRUNE_INTERVAL_NAME = 'ups-retention';
const DAY_MS = 24 * 60 * 60 * 1000;

const UPS_SOURCE = 'ups';
const STORE_SOURCE = 'store';

/**
 * 샘플 저장소의 유일한 writer.
 * 주기적으로 UPS 를 조회해 append 하고, 보존 기간이 지난 샘플을 정리한다.
 */
@Injectable()
export class UpsPollerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(UpsPollerService.name);
  private running = false;
  private polling = false;
  private pruning = false;
  private consecutiveFailures = 0;
  /** 재시작 이전에 남았을 수 있는 운영 경보. 첫 성공 시 한 번 정리한다. */
  private readonly openOperationalAlerts = new Set<AlertMetric>(['ups_unreachable', 'store_violation']);

  constructor(
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
    private readonly source: UpsSourceService,
    private readonly store: SampleStoreService,
    private readonly alertsService: AlertsService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.poller.enabled) {
      this.logger.warn('UPS poller disabled (UPS_STATS_POLLER_ENABLED=false or test environment)');
      return;
    }
    await this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  isRunning(): boolean {
    return this.running;
  }

  /** poll/prune 타이머를 등록하고 즉시 한 번 조회한다. */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    await this.logCollectionGap();

    const { intervalMs, pruneIntervalMs } = this.config.poller;
    this.schedulerRegistry.addInterval(
      POLL_INTERVAL_NAME,
      setInterval(() => this.tick(), intervalMs),
    );
    this.schedulerRegistry.addInterval(
      PRUNE_INTERVAL_NAME,
      setInterval(() => this.pruneTick(), pruneIntervalMs),
    );
    this.logger.log(`UPS poller started for ${this.config.ups.name} (interval ${intervalMs} ms)`);
    this.tick();
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    for (const name of [POLL_INTERVAL_NAME, PRUNE_INTERVAL_NAME]) {
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
      }
    }
    this.logger.log('UPS poller stopped');
  }

  /**
   * 한 주기: 조회 → append → 경보 평가.
   * 저장된 샘플을 돌려주고, 실패/거부 시 null.
   */
  async pollOnce(): Promise<Sample | null> {
    const result = await this.source.poll();
    if (!result.ok) {
      await this.handleFailure(result.failure);
      return null;
    }

    if (this.consecutiveFailures > 0) {
      this.logger.log(`UPS reachable again after ${this.consecutiveFailures} failed poll(s)`);
      this.consecutiveFailures = 0;
    }
    await this.resolveOperational(UPS_SOURCE, 'ups_unreachable');

    let stored: Sample;
    try {
      stored = await this.store.append(result.sample);
    } catch (error) {
      if (!(error instanceof StoreViolationError)) {
        throw error;
      }
      this.logger.error(`Sample rejected by store (${error.kind}): ${error.message}`);
      await this.raiseOperational(STORE_SOURCE, 'store_violation', error.message);
      return null;
    }
    await this.resolveOperational(STORE_SOURCE, 'store_violation');

    try {
      await this.alertsService.evaluateSample(stored);
    } catch (error) {
      this.logger.error('Failed to evaluate alerts for sample', errorTrace(error));
    }
    return stored;
  }

  /** 보존 기간보다 오래된 샘플을 정리한다. */
  prune(now = Date.now()): Promise<number> {
    return this.store.prune(now - this.config.aggregation.retentionDays * DAY_MS);
  }

  private tick(): void {
    if (this.polling) {
      this.logger.debug('Previous poll still in flight; skipping tick');
      return;
    }
    this.polling = true;
    this.pollOnce()
      .catch((error: unknown) => this.logger.error('Poll cycle failed', errorTrace(error)))
      .finally(() => {
        this.polling = false;
      });
  }

  private pruneTick(): void {
    if (this.pruning) {
      return;
    }
    this.pruning = true;
    this.prune()
      .catch((error: unknown) => this.logger.error('Failed to prune samples', errorTrace(error)))
      .finally(() => {
        this.pruning = false;
      });
  }

  private async handleFailure(failure: PollFailure): Promise<void> {
    this.consecutiveFailures += 1;
    const { failureAlertCount } = this.config.poller;
    if (this.consecutiveFailures === 1) {
      this.logger.warn(`UPS poll failed (${failure.reason}): ${failure.message}`);
    } else {
      this.logger.debug(`UPS poll failed again (${failure.reason}, ${this.consecutiveFailures} in a row)`);
    }
    if (this.consecutiveFailures === failureAlertCount) {
      await this.raiseOperational(
        UPS_SOURCE,
        'ups_unreachable',
        `No UPS data for ${failureAlertCount} consecutive polls (${failure.reason}): ${failure.message}`,
        failureAlertCount,
      );
    }
  }

  private async raiseOperational(
    source: string,
    metric: AlertMetric,
    message: string,
    currentValue: number | null = null,
  ): Promise<void> {
    this.openOperationalAlerts.add(metric);
    try {
      await this.alertsService.raiseOperational(source, metric, 'critical', message, currentValue);
    } catch (error) {
      this.logger.error(`Failed to raise ${metric} alert`, errorTrace(error));
    }
  }

  private async resolveOperational(source: string, metric: AlertMetric): Promise<void> {
    if (!this.openOperationalAlerts.has(metric)) {
      return;
    }
    try {
      await this.alertsService.resolveOperational(source, metric);
      this.openOperationalAlerts.delete(metric);
    } catch (error) {
      this.logger.error(`Failed to resolve ${metric} alert`, errorTrace(error));
    }
  }

  /** 이전 실행의 마지막 샘플 이후 수집 공백이 있었으면 기록한다. 공백은 downtime 으로 집계된다. */
  private async logCollectionGap(): Promise<void> {
    try {
      const last = await this.store.lastTimestamp();
      if (last === null) {
        this.logger.log('Sample store is empty; starting fresh');
        return;
      }
      const gapMs = Date.now() - last;
      if (gapMs > this.config.aggregation.downGapMs) {
        this.logger.warn(
          `Resuming collection after a ${Math.round(gapMs / 1000)} s gap (last sample ${new Date(last).toISOString()})`,
        );
      }
    } catch (error) {
      this.logger.error('Failed to read last sample timestamp', errorTrace(error));
    }
  }
}
