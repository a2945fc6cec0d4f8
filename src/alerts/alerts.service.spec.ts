import type { DataSource } from 'typeorm';
import { createTestConfig, createTestDataSource, makeSample } from '../../test/helpers';
import { startWebhookServer } from '../../test/webhook-server';
import type { WebhookServer } from '../../test/webhook-server';
import { AlertEntity } from './alert.entity';
import { AlertNotifierService } from './alert-notifier.service';
import { AlertsService } from './alerts.service';

describe('AlertsService', () => {
  let dataSource: DataSource;
  let webhook: WebhookServer;
  let service: AlertsService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    webhook = await startWebhookServer();
    const config = createTestConfig({ UPS_STATS_ALERT_WEBHOOK_URL: webhook.url });
    service = new AlertsService(dataSource.getRepository(AlertEntity), config, new AlertNotifierService(config));
  });

  afterEach(async () => {
    await webhook.close();
    await dataSource.destroy();
  });

  async function activeMetrics(): Promise<string[]> {
    return (await service.getActiveAlerts()).map((alert) => alert.metric).sort();
  }

  it('raises and resolves the on-battery alert with one notification each', async () => {
    await service.evaluateSample(makeSample(1000, { status: 'ON_BATTERY', chargePct: 80 }));
    await service.evaluateSample(makeSample(2000, { status: 'ON_BATTERY', chargePct: 79 }));

    expect(await activeMetrics()).toEqual(['on_battery']);

    await service.evaluateSample(makeSample(3000, { chargePct: 79 }));

    expect(await activeMetrics()).toEqual([]);
    expect(webhook.received).toEqual([
      { subject: 'Power supply interrupted', body: 'Running on battery power\nSource: ups\nCurrent value: 80' },
      { subject: 'Power supply restored', body: 'Resolved: Running on battery power\nSource: ups\nCurrent value: 79' },
    ]);
  });

  it('keeps the low battery alert until charge clears the hysteresis band', async () => {
    await service.evaluateSample(makeSample(1000, { status: 'ON_BATTERY', chargePct: 19 }));
    expect(await activeMetrics()).toEqual(['battery_low', 'on_battery']);

    await service.evaluateSample(makeSample(2000, { status: 'ON_BATTERY', chargePct: 24 }));
    const [lowBattery] = (await service.getActiveAlerts()).filter((alert) => alert.metric === 'battery_low');
    expect(lowBattery.currentValue).toBe(24);
    expect(lowBattery.threshold).toBe(20);
    expect(lowBattery.severity).toBe('critical');

    await service.evaluateSample(makeSample(3000, { status: 'ON_BATTERY', chargePct: 26 }));
    expect(await activeMetrics()).toEqual(['on_battery']);
  });

  it('resolves the low battery alert as soon as wall power returns', async () => {
    await service.evaluateSample(makeSample(1000, { status: 'ON_BATTERY', chargePct: 15 }));
    await service.evaluateSample(makeSample(2000, { chargePct: 15 }));

    expect(await activeMetrics()).toEqual([]);
  });

  it('raises a load alert at the limit and clears it ten points below', async () => {
    await service.evaluateSample(makeSample(1000, { loadPct: 90 }));
    await service.evaluateSample(makeSample(2000, { loadPct: 85 }));
    expect(await activeMetrics()).toEqual(['load_high']);

    await service.evaluateSample(makeSample(3000, { loadPct: 80 }));
    expect(await activeMetrics()).toEqual([]);
  });

  it('notifies once for a repeated operational alert', async () => {
    const raise = () =>
      service.raiseOperational(
        'shutdown-target-1',
        'shutdown_failed',
        'critical',
        'Remote shutdown not confirmed (failure)',
        3,
        'Target: root@nas',
      );
    await raise();
    await raise();
    await service.resolveOperational('shutdown-target-1', 'shutdown_failed');

    expect(webhook.received).toEqual([
      {
        subject: 'ACTION NEEDED: remote shutdown failed',
        body: 'Remote shutdown not confirmed (failure)\nSource: shutdown-target-1\nCurrent value: 3\nTarget: root@nas',
      },
      {
        subject: 'Remote shutdown alert cleared',
        body: 'Resolved: Remote shutdown not confirmed (failure)\nSource: shutdown-target-1',
      },
    ]);
  });

  it('lists active alerts without the notification detail', async () => {
    await service.raiseOperational(
      'shutdown-target-1',
      'shutdown_failed',
      'critical',
      'Remote shutdown not confirmed (unknown)',
      2,
      'Target: root@nas',
    );

    const [view] = await service.getActiveAlertViews();

    expect(view).toEqual({
      id: expect.any(String),
      source: 'shutdown-target-1',
      metric: 'shutdown_failed',
      severity: 'critical',
      message: 'Remote shutdown not confirmed (unknown)',
      threshold: null,
      currentValue: 2,
      createdAt: expect.any(String),
    });
  });
});

describe('AlertNotifierService', () => {
  it('does nothing without a webhook', async () => {
    await expect(new AlertNotifierService(createTestConfig()).notify({ subject: 's', body: 'b' })).resolves.toBe(false);
  });

  it('reports a rejected delivery without throwing', async () => {
    const webhook = await startWebhookServer(500);
    try {
      const notifier = new AlertNotifierService(createTestConfig({ UPS_STATS_ALERT_WEBHOOK_URL: webhook.url }));

      await expect(notifier.notify({ subject: 'Power supply interrupted', body: 'test' })).resolves.toBe(false);
      expect(webhook.received).toEqual([{ subject: 'Power supply interrupted', body: 'test' }]);
    } finally {
      await webhook.close();
    }
  });
});
