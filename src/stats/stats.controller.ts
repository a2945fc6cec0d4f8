import { Controller, Get, Param } from '@nestjs/common';
import { ZodValidationPipe } from 'nestjs-zod';
import { AggregateWindowSchema, type AggregateWindow } from '../aggregation/aggregation.types';
import { StatsService } from './stats.service';

/** UPS 통계 조회 REST 엔드포인트 */
@Controller('stats')
export class StatsController {
  constructor(private readonly statsService: StatsService) {}

  /** GET /stats → 최신 샘플, 집계, 가동률, 종료 상태 */
  @Get()
  getSnapshot() {
    return this.statsService.getSnapshot();
  }

  @Get('aggregates')
  getAggregates() {
    return this.statsService.getAggregates();
  }

  /** GET /stats/aggregates/:window (1m, 1h, 24h, 7d, 30d) */
  @Get('aggregates/:window')
  getAggregate(@Param('window', new ZodValidationPipe(AggregateWindowSchema)) window: AggregateWindow) {
    return this.statsService.getAggregate(window);
  }
}
