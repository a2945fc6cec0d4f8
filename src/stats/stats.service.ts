import { Injectable, Logger } from '@nestjs/common';
import { AggregationService } from '../aggregation/aggregation.service';
import type { Aggregate, AggregateSet, AggregateWindow } from '../aggregation/aggregation.types';
import { errorTrace } from '../common/error-trace';
import { SampleStoreService } from '../samples/sample-store.service';
import { ShutdownService } from '../shutdown/shutdown.service';
import { toSampleView } from './stats.types';
import type { SampleView, UpsStatsSnapshot } from './stats.types';

/**
 * 프레젠테이션 계층을 위한 읽기 전용 파사드.
 * 저장소/집계/종료 상태를 하나의 스냅샷으로 묶는다.
 */
@Injectable()
export class StatsService {
  private readonly logger = new Logger(StatsService.name);

  constructor(
    private readonly store: SampleStoreService,
    private readonly aggregationService: AggregationService,
    private readonly shutdownService: ShutdownService,
  ) {}

  async getSnapshot(): Promise<UpsStatsSnapshot> {
    const [latest, aggregates, predictedRuntimeSeconds] = await Promise.all([
      this.degrade('latest sample', async (): Promise<SampleView | null> => {
        const sample = await this.store.latest();
        return sample ? toSampleView(sample) : null;
      }),
      this.degrade('aggregates', (): Promise<AggregateSet> => this.aggregationService.computeAll()),
      this.degrade('runtime prediction', () => this.aggregationService.predictRuntime()),
    ]);

    const month = aggregates ? aggregates['30d'] : null;
    return {
      type: 'ups-stats',
      generatedAt: new Date().toISOString(),
      latest,
      aggregates,
      uptime: month
        ? { window: '30d', systemPct: month.systemUptimePct, wallPowerPct: month.wallPowerUptimePct }
        : null,
      predictedRuntimeSeconds,
      shutdown: this.shutdownService.getStatusSummary(),
    };
  }

  getAggregate(window: AggregateWindow): Promise<Aggregate> {
    return this.aggregationService.compute(window);
  }

  getAggregates(): Promise<AggregateSet> {
    return this.aggregationService.computeAll();
  }

  /** 한 부분의 실패가 스냅샷 전체를 막지 않도록 null 로 낮춘다. */
  private async degrade<T>(label: string, read: () => Promise<T | null>): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      this.logger.error(`Failed to read ${label}`, errorTrace(error));
      return null;
    }
  }
}
