import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Repository } from 'typeorm';
import { Subscription } from 'rxjs';
import { setTimeout as sleep } from 'timers/promises';
import { AlertsService } from '../alerts/alerts.service';
import { errorTrace } from '../common/error-trace';
import { upsStatsConfig } from '../config/ups-stats.config';
import type { ShutdownTarget } from '../config/ups-stats.config';
import { SampleStoreService } from '../samples/sample-store.service';
import { isWallPower } from '../ups/ups.types';
import type { Sample } from '../ups/ups.types';
import { ShutdownEventEntity, ShutdownOutcome } from './shutdown-event.entity';
import { SHUTDOWN_TRANSPORT, ShutdownActionError } from './shutdown.types';
import type { ShutdownState, ShutdownStatusSummary, ShutdownTransport } from './shutdown.types';

/** 대상 호스트 하나의 상태 머신. */
interface TargetController {
  target: ShutdownTarget;
  /** 경보 출처. 호스트 대신 설정 순서로 대상을 가리킨다. */
  alertSource: string;
  state: ShutdownState;
  eventId: string | null;
  stopRetries: boolean;
  powerRecovered: boolean;
}

interface AttemptResult {
  outcome: ShutdownOutcome;
  attempts: number;
  lastError: string | null;
}

const STATE_PRIORITY: Record<ShutdownState, number> = {
  NORMAL: 0,
  COOLDOWN: 1,
  ARMED: 2,
  TRIGGERING: 3,
};

/**
 * 배터리 잔량을 감시하다가 임계치 아래로 내려가면 대상 호스트들을 원격 종료한다.
 * - 호스트별 NORMAL → ARMED → TRIGGERING → COOLDOWN → NORMAL
 * - 에피소드당 한 번만 트리거, 시도 횟수는 maxAttempts 로 제한
 * - 원격 실행은 poll 루프와 분리되어 호스트마다 병렬로 진행된다
 */
@Injectable()
export class ShutdownService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ShutdownService.name);
  private readonly controllers: TargetController[];
  private readonly inFlight = new Set<Promise<void>>();
  private subscription?: Subscription;
  private lastTriggeredAt: Date | null = null;
  private lastOutcome: ShutdownOutcome | null = null;

  constructor(
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
    @InjectRepository(ShutdownEventEntity)
    private readonly eventsRepository: Repository<ShutdownEventEntity>,
    private readonly store: SampleStoreService,
    private readonly alertsService: AlertsService,
    @Inject(SHUTDOWN_TRANSPORT)
    private readonly transport: ShutdownTransport,
  ) {
    this.controllers = config.shutdown.targets.map((target, index) => ({
      target,
      alertSource: `shutdown-target-${index + 1}`,
      state: 'NORMAL',
      eventId: null,
      stopRetries: false,
      powerRecovered: false,
    }));
  }

  /** 재시작 전 열린 에피소드를 복원한 뒤 샘플 스트림을 구독한다. */
  async onModuleInit(): Promise<void> {
    await this.restore();
    this.subscription = this.store.appended$.subscribe((sample) => this.evaluate(sample));
    if (this.controllers.length === 0) {
      this.logger.warn('No shutdown targets configured (UPS_STATS_SHUTDOWN_TARGETS)');
    } else {
      this.logger.log(
        `Watching ${this.controllers.length} shutdown target(s), threshold ${this.config.shutdown.thresholdPct}%`,
      );
    }
  }

  /** 종료 시 재시도를 멈추고 진행 중인 시도가 끝나길 기다린다. */
  async onModuleDestroy(): Promise<void> {
    this.subscription?.unsubscribe();
    for (const controller of this.controllers) {
      controller.stopRetries = true;
    }
    await this.whenIdle();
  }

  /** 새 샘플로 모든 대상의 상태를 한 단계 진행시킨다. */
  evaluate(sample: Sample): void {
    for (const controller of this.controllers) {
      try {
        this.step(controller, sample);
      } catch (error) {
        this.logger.error(`Failed to evaluate shutdown state for ${controller.target.label}`, errorTrace(error));
      }
    }
  }

  getTargetState(label: string): ShutdownState | undefined {
    return this.controllers.find((controller) => controller.target.label === label)?.state;
  }

  getStatusSummary(): ShutdownStatusSummary {
    const state = this.controllers.reduce<ShutdownState>(
      (current, controller) => (STATE_PRIORITY[controller.state] > STATE_PRIORITY[current] ? controller.state : current),
      'NORMAL',
    );
    return {
      state,
      targets: this.controllers.length,
      lastTriggeredAt: this.lastTriggeredAt ? this.lastTriggeredAt.toISOString() : null,
      lastOutcome: this.lastOutcome,
    };
  }

  /** 진행 중인 종료 작업이 모두 끝날 때까지 기다린다. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private step(controller: TargetController, sample: Sample): void {
    switch (controller.state) {
      case 'NORMAL':
        if (this.isCritical(sample)) {
          controller.state = 'ARMED';
          this.logger.warn(
            `Battery at ${sample.chargePct}% on battery power; arming shutdown of ${controller.target.label}`,
          );
          this.track(this.trigger(controller, sample));
        }
        return;
      case 'TRIGGERING':
        if (!controller.powerRecovered && this.hasRecovered(sample)) {
          controller.powerRecovered = true;
          controller.stopRetries = true;
          this.logger.warn(`Power recovered while shutting down ${controller.target.label}; no further retries`);
        }
        return;
      case 'COOLDOWN':
        if (this.hasRecovered(sample)) {
          controller.state = 'NORMAL';
          this.logger.log(`Shutdown episode for ${controller.target.label} ended; re-armed`);
          this.track(this.closeEpisode(controller));
        }
        return;
      case 'ARMED':
        return;
    }
  }

  private isCritical(sample: Sample): boolean {
    return sample.status === 'ON_BATTERY' && sample.chargePct <= this.config.shutdown.thresholdPct;
  }

  private hasRecovered(sample: Sample): boolean {
    const { thresholdPct, hysteresisPct } = this.config.shutdown;
    return isWallPower(sample.status) || sample.chargePct > thresholdPct + hysteresisPct;
  }

  /** ARMED → TRIGGERING. 상태 전환은 첫 await 이전에 동기적으로 일어난다. */
  private async trigger(controller: TargetController, sample: Sample): Promise<void> {
    controller.state = 'TRIGGERING';
    controller.stopRetries = false;
    controller.powerRecovered = false;
    const triggeredAt = new Date();
    this.lastTriggeredAt = triggeredAt;
    this.lastOutcome = null;

    const eventId = await this.recordTrigger(controller.target, triggeredAt, sample.chargePct);
    controller.eventId = eventId;

    const result = await this.executeWithRetry(controller, eventId);
    controller.state = 'COOLDOWN';
    this.lastOutcome = result.outcome;
    await this.updateEvent(eventId, {
      attempts: result.attempts,
      outcome: result.outcome,
      lastError: result.lastError,
      finalizedAt: new Date(),
    });

    const label = controller.target.label;
    if (result.outcome === 'success') {
      this.logger.log(`Remote shutdown of ${label} succeeded after ${result.attempts} attempt(s)`);
      return;
    }
    if (controller.powerRecovered) {
      this.logger.warn(
        `Remote shutdown of ${label} not confirmed (${result.outcome}) after ${result.attempts} attempt(s), but power recovered; no alert raised`,
      );
      return;
    }
    this.logger.error(
      `Remote shutdown of ${label} ended with outcome "${result.outcome}" after ${result.attempts} attempt(s): ${result.lastError}`,
    );
    try {
      await this.alertsService.raiseOperational(
        controller.alertSource,
        'shutdown_failed',
        'critical',
        `Remote shutdown not confirmed (${result.outcome}); manual intervention needed before the battery runs out`,
        result.attempts,
        `Target: ${label}`,
      );
    } catch (error) {
      this.logger.error('Failed to raise shutdown alert', errorTrace(error));
    }
  }

  /** 최대 maxAttempts 번, 지수 백오프로 시도한다. 회복이 관측되면 남은 재시도는 건너뛴다. */
  private async executeWithRetry(controller: TargetController, eventId: string | null): Promise<AttemptResult> {
    const { maxAttempts, backoffMs, attemptTimeoutMs, command } = this.config.shutdown;
    const { target } = controller;
    let attempts = 0;
    let timeouts = 0;
    let lastError: string | null = null;

    while (attempts < maxAttempts) {
      if (attempts > 0) {
        if (controller.stopRetries) break;
        await sleep(backoffMs * 2 ** (attempts - 1));
        if (controller.stopRetries) break;
      }
      attempts += 1;
      try {
        await this.withTimeout(this.transport.execute(target, command, attemptTimeoutMs), attemptTimeoutMs, target);
        return { outcome: 'success', attempts, lastError: null };
      } catch (error) {
        const failure =
          error instanceof ShutdownActionError
            ? error
            : new ShutdownActionError('command', error instanceof Error ? error.message : String(error));
        if (failure.kind === 'timeout') {
          timeouts += 1;
        }
        lastError = failure.message;
        this.logger.warn(
          `Shutdown attempt ${attempts}/${maxAttempts} for ${target.label} failed (${failure.kind}): ${failure.message}`,
        );
        await this.updateEvent(eventId, { attempts, lastError });
      }
    }

    if (controller.stopRetries && attempts < maxAttempts) {
      this.logger.warn(`Retries for ${target.label} cancelled after ${attempts} attempt(s)`);
    }
    return { outcome: timeouts === attempts ? 'unknown' : 'failure', attempts, lastError };
  }

  private withTimeout(action: Promise<void>, timeoutMs: number, target: ShutdownTarget): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ShutdownActionError('timeout', `Shutdown of ${target.label} timed out after ${timeoutMs} ms`)),
        timeoutMs,
      );
    });
    return Promise.race([action, timeout]).finally(() => clearTimeout(timer));
  }

  /** COOLDOWN → NORMAL 시 에피소드를 닫고 종료 실패 경보를 해제한다. */
  private async closeEpisode(controller: TargetController): Promise<void> {
    const eventId = controller.eventId;
    controller.eventId = null;
    await this.updateEvent(eventId, { episodeEndedAt: new Date() });
    try {
      await this.alertsService.resolveOperational(controller.alertSource, 'shutdown_failed');
    } catch (error) {
      this.logger.error('Failed to resolve shutdown alert', errorTrace(error));
    }
  }

  /** 이벤트 기록. 저장 실패가 종료 동작을 막지 않도록 null 을 돌려준다. */
  private async recordTrigger(target: ShutdownTarget, triggeredAt: Date, chargePct: number): Promise<string | null> {
    try {
      const saved = await this.eventsRepository.save(
        this.eventsRepository.create({
          targetLabel: target.label,
          targetHost: target.host,
          triggeredAt,
          chargeAtTrigger: chargePct,
          attempts: 0,
          outcome: null,
          lastError: null,
          finalizedAt: null,
          episodeEndedAt: null,
        }),
      );
      return saved.id;
    } catch (error) {
      this.logger.error(`Failed to record shutdown event for ${target.label}`, errorTrace(error));
      return null;
    }
  }

  private async updateEvent(
    eventId: string | null,
    changes: Partial<Pick<ShutdownEventEntity, 'attempts' | 'outcome' | 'lastError' | 'finalizedAt' | 'episodeEndedAt'>>,
  ): Promise<void> {
    if (!eventId) {
      return;
    }
    try {
      await this.eventsRepository.update({ id: eventId }, changes);
    } catch (error) {
      this.logger.error(`Failed to update shutdown event ${eventId}`, errorTrace(error));
    }
  }

  /**
   * 재시작 이전에 닫히지 않은 에피소드가 있으면 COOLDOWN 으로 복원한다.
   * 결과 없이 남은 이벤트는 unknown 으로 확정한다.
   */
  private async restore(): Promise<void> {
    try {
      for (const controller of this.controllers) {
        const open = await this.eventsRepository.findOne({
          where: { targetLabel: controller.target.label, episodeEndedAt: IsNull() },
          order: { triggeredAt: 'DESC' },
        });
        if (!open) {
          continue;
        }
        controller.state = 'COOLDOWN';
        controller.eventId = open.id;
        if (open.outcome === null) {
          await this.eventsRepository.update(
            { id: open.id },
            { outcome: 'unknown', finalizedAt: new Date(), lastError: open.lastError ?? 'Interrupted by restart' },
          );
          this.logger.warn(`Shutdown of ${controller.target.label} was interrupted by a restart; outcome unknown`);
        } else {
          this.logger.log(`Resuming shutdown cooldown for ${controller.target.label}`);
        }
      }

      const [last] = await this.eventsRepository.find({ order: { triggeredAt: 'DESC' }, take: 1 });
      if (last) {
        this.lastTriggeredAt = last.triggeredAt;
        this.lastOutcome = last.outcome ?? 'unknown';
      }
    } catch (error) {
      this.logger.error('Failed to restore shutdown episodes', errorTrace(error));
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.error('Shutdown task failed', errorTrace(error));
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
