import { SchedulerRegistry } from '@nestjs/schedule';
import type { DataSource } from 'typeorm';
import { createSampleStore, createTestConfig, createTestDataSource, makeSample } from '../../test/helpers';
import { AlertEntity } from '../alerts/alert.entity';
import { AlertNotifierService } from '../alerts/alert-notifier.service';
import { AlertsService } from '../alerts/alerts.service';
import { CommandFailedError } from '../common/command-runner';
import type { CommandOutput, CommandRunner } from '../common/command-runner';
import { SampleStoreService } from '../samples/sample-store.service';
import { UpsSourceService } from '../ups/ups-source.service';
import { UpsPollerService } from './ups-poller.service';

const DAY_MS = 24 * 60 * 60 * 1000;
const ON_BATTERY_OUTPUT = 'battery.charge: 64\nbattery.runtime: 900\nups.load: 22\nups.status: OB DISCHRG\n';
const ON_LINE_OUTPUT = 'battery.charge: 100\nups.load: 18\nups.status: OL\n';

describe('UpsPollerService', () => {
  let dataSource: DataSource;
  let store: SampleStoreService;
  let alerts: AlertsService;
  let registry: SchedulerRegistry;
  let respond: () => Promise<CommandOutput>;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    store = createSampleStore(dataSource);
    registry = new SchedulerRegistry();
    respond = async () => ({ stdout: ON_LINE_OUTPUT, stderr: '' });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await dataSource.destroy();
  });

  function createPoller(env: Record<string, string> = {}): UpsPollerService {
    const config = createTestConfig(env);
    const runner: CommandRunner = () => respond();
    alerts = new AlertsService(dataSource.getRepository(AlertEntity), config, new AlertNotifierService(config));
    return new UpsPollerService(config, new UpsSourceService(config, runner), store, alerts, registry);
  }

  async function activeAlerts(): Promise<Array<[string, string]>> {
    return (await alerts.getActiveAlerts()).map((alert): [string, string] => [alert.source, alert.metric]).sort();
  }

  it('appends each reading and evaluates alerts on it', async () => {
    const poller = createPoller();
    respond = async () => ({ stdout: ON_BATTERY_OUTPUT, stderr: '' });

    const stored = await poller.pollOnce();

    expect(stored).toMatchObject({ status: 'ON_BATTERY', chargePct: 64, loadPct: 22, runtimeEstimateSeconds: 900 });
    expect(await store.latest()).toEqual(stored);
    expect(await activeAlerts()).toEqual([['ups', 'on_battery']]);
  });

  it('raises an unreachable alert after consecutive failures and clears it on recovery', async () => {
    const poller = createPoller({ UPS_STATS_POLL_FAILURE_ALERT_COUNT: '2' });
    respond = async () => {
      throw new CommandFailedError('upsc', 1, 'Error: Connection failure', 'Connection refused');
    };

    expect(await poller.pollOnce()).toBeNull();
    expect(await activeAlerts()).toEqual([]);
    expect(await poller.pollOnce()).toBeNull();
    expect(await activeAlerts()).toEqual([['ups', 'ups_unreachable']]);
    expect(await store.count()).toBe(0);

    respond = async () => ({ stdout: ON_LINE_OUTPUT, stderr: '' });
    await poller.pollOnce();

    expect(await activeAlerts()).toEqual([]);
    expect(await store.count()).toBe(1);
  });

  it('keeps polling after the store rejects a reading', async () => {
    const poller = createPoller();
    const now = jest.spyOn(Date, 'now').mockReturnValue(Date.UTC(2026, 3, 1));

    expect(await poller.pollOnce()).not.toBeNull();
    expect(await poller.pollOnce()).toBeNull();
    expect(await activeAlerts()).toEqual([['store', 'store_violation']]);

    now.mockReturnValue(Date.UTC(2026, 3, 1) + 1000);
    expect(await poller.pollOnce()).not.toBeNull();
    expect(await activeAlerts()).toEqual([]);
    expect(await store.count()).toBe(2);
  });

  it('prunes samples beyond the retention period', async () => {
    const poller = createPoller();
    const now = Date.UTC(2026, 6, 1);
    for (const age of [40, 35, 31, 1]) {
      await store.append(makeSample(now - age * DAY_MS));
    }

    expect(await poller.prune(now)).toBe(2);
    expect((await store.latestBefore(now - 30 * DAY_MS))?.timestamp).toBe(now - 31 * DAY_MS);
  });

  it('registers its timers on start and removes them on stop', async () => {
    const poller = createPoller();
    respond = async () => ({ stdout: '', stderr: '' });

    await poller.start();
    expect(poller.isRunning()).toBe(true);
    expect(registry.getIntervals().sort()).toEqual(['ups-poller', 'ups-retention']);

    poller.stop();
    expect(poller.isRunning()).toBe(false);
    expect(registry.getIntervals()).toEqual([]);
  });
});
