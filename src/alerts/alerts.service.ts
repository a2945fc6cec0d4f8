import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { upsStatsConfig } from '../config/ups-stats.config';
import type { Sample } from '../ups/ups.types';
import { AlertEntity, AlertSeverity } from './alert.entity';
import { AlertNotifierService } from './alert-notifier.service';
import { toAlertView } from './alerts.types';
import type { AlertView } from './alerts.types';

export type AlertMetric =
  | 'on_battery'
  | 'battery_low'
  | 'load_high'
  | 'ups_unreachable'
  | 'store_violation'
  | 'shutdown_failed';

type ThresholdDirection = 'above' | 'below';

/** 경보 발생/해제 시 통지 제목. */
const NOTIFICATION_SUBJECTS: Record<AlertMetric, { raised: string; resolved: string }> = {
  on_battery: { raised: 'Power supply interrupted', resolved: 'Power supply restored' },
  battery_low: { raised: 'UPS battery low | shutting down', resolved: 'UPS battery charge recovered' },
  load_high: { raised: 'UPS load high', resolved: 'UPS load back to normal' },
  ups_unreachable: { raised: 'UPS daemon unreachable', resolved: 'UPS daemon reachable again' },
  store_violation: { raised: 'Sample store rejected a write', resolved: 'Sample store accepting writes' },
  shutdown_failed: { raised: 'ACTION NEEDED: remote shutdown failed', resolved: 'Remote shutdown alert cleared' },
};

const UPS_SOURCE = 'ups';

/**
 * UPS 샘플과 운영 이벤트를 기반으로 경보를 생성/해제하는 서비스.
 * 새로 생기거나 해제된 경보마다 통지를 한 번 보낸다.
 */
@Injectable()
export class AlertsService {
  constructor(
    @InjectRepository(AlertEntity)
    private readonly alertRepository: Repository<AlertEntity>,
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
    private readonly notifier: AlertNotifierService,
  ) {}

  /**
   * 저장된 샘플로 전원, 배터리, 부하 규칙을 차례로 평가한다.
   */
  async evaluateSample(sample: Sample): Promise<void> {
    const { thresholdPct, hysteresisPct } = this.config.shutdown;
    const loadHighPct = this.config.alerts.loadHighPct;
    const onBattery = sample.status === 'ON_BATTERY';

    if (onBattery) {
      await this.raiseAlert(UPS_SOURCE, 'on_battery', 'warning', 'Running on battery power', null, sample.chargePct);
    } else {
      await this.resolveMetricAlert(UPS_SOURCE, 'on_battery', sample.chargePct);
    }
    await this.handleThreshold(
      'battery_low',
      'critical',
      `Battery charge at ${sample.chargePct}% while on battery`,
      onBattery ? sample.chargePct : null,
      'below',
      thresholdPct,
      thresholdPct + hysteresisPct,
    );
    await this.handleThreshold(
      'load_high',
      'warning',
      `UPS load at ${sample.loadPct}%`,
      sample.loadPct,
      'above',
      loadHighPct,
      loadHighPct - 10,
    );
  }

  /**
   * 운영 경보(폴링 실패, 저장소 위반, 종료 실패)를 올린다.
   * detail 은 통지 본문에만 붙고 저장되거나 조회 API 로 나가지 않는다.
   */
  raiseOperational(
    source: string,
    metric: AlertMetric,
    severity: AlertSeverity,
    message: string,
    currentValue: number | null = null,
    detail: string | null = null,
  ): Promise<void> {
    return this.raiseAlert(source, metric, severity, message, null, currentValue, detail);
  }

  resolveOperational(source: string, metric: AlertMetric): Promise<void> {
    return this.resolveMetricAlert(source, metric, null);
  }

  /** 현재 활성(alert) 상태인 항목만 조회한다. */
  async getActiveAlerts(): Promise<AlertEntity[]> {
    return this.alertRepository.find({
      where: { status: 'active' },
      order: { createdAt: 'DESC' },
    });
  }

  async getActiveAlertViews(): Promise<AlertView[]> {
    return (await this.getActiveAlerts()).map(toAlertView);
  }

  /**
   * 단일 임계치 기반 경고를 평가한다.
   * trigger 를 넘으면 raise, clear 를 지나 되돌아오면 resolve, 그 사이면 값만 갱신.
   */
  private async handleThreshold(
    metric: AlertMetric,
    severity: AlertSeverity,
    message: string,
    value: number | null,
    direction: ThresholdDirection,
    trigger: number,
    clear: number,
  ): Promise<void> {
    if (value == null || !Number.isFinite(value)) {
      await this.resolveMetricAlert(UPS_SOURCE, metric, null);
      return;
    }

    const breached = direction === 'above' ? value >= trigger : value <= trigger;
    const cleared = direction === 'above' ? value <= clear : value > clear;
    if (breached) {
      await this.raiseAlert(UPS_SOURCE, metric, severity, message, trigger, value);
    } else if (cleared) {
      await this.resolveMetricAlert(UPS_SOURCE, metric, value);
    } else {
      await this.updateActiveAlert(UPS_SOURCE, metric, value);
    }
  }

  /** 새로운 경보를 만들거나, 이미 활성화된 항목의 값을 갱신한다. */
  private async raiseAlert(
    source: string,
    metric: AlertMetric,
    severity: AlertSeverity,
    message: string,
    threshold: number | null,
    currentValue: number | null,
    detail: string | null = null,
  ): Promise<void> {
    const existing = await this.alertRepository.findOne({ where: { source, metric, status: 'active' } });
    if (existing) {
      existing.currentValue = currentValue;
      existing.message = message;
      await this.alertRepository.save(existing);
      return;
    }

    const alert = this.alertRepository.create({
      source,
      metric,
      severity,
      message,
      threshold,
      currentValue,
      status: 'active',
    });
    await this.alertRepository.save(alert);
    await this.notifier.notify({
      subject: NOTIFICATION_SUBJECTS[metric].raised,
      body: this.describe(source, message, currentValue, detail),
    });
  }

  /** 해당 metric 의 활성 경보를 resolved 상태로 변경한다. */
  private async resolveMetricAlert(source: string, metric: AlertMetric, currentValue: number | null): Promise<void> {
    const existing = await this.alertRepository.findOne({ where: { source, metric, status: 'active' } });
    if (!existing) {
      return;
    }
    existing.status = 'resolved';
    existing.resolvedAt = new Date();
    if (currentValue !== null) {
      existing.currentValue = currentValue;
    }
    await this.alertRepository.save(existing);
    await this.notifier.notify({
      subject: NOTIFICATION_SUBJECTS[metric].resolved,
      body: this.describe(source, `Resolved: ${existing.message}`, currentValue),
    });
  }

  /** 경보는 유지하되 현재 값만 갱신한다. */
  private async updateActiveAlert(source: string, metric: AlertMetric, currentValue: number): Promise<void> {
    const existing = await this.alertRepository.findOne({ where: { source, metric, status: 'active' } });
    if (!existing) {
      return;
    }
    existing.currentValue = currentValue;
    await this.alertRepository.save(existing);
  }

  private describe(source: string, message: string, currentValue: number | null, detail: string | null = null): string {
    const lines = [message, `Source: ${source}`];
    if (currentValue !== null) {
      lines.push(`Current value: ${currentValue}`);
    }
    if (detail) {
      lines.push(detail);
    }
    return lines.join('\n');
  }
}
