import { Module } from '@nestjs/common';
import { AggregationModule } from '../aggregation/aggregation.module';
import { SamplesModule } from '../samples/samples.module';
import { ShutdownModule } from '../shutdown/shutdown.module';
import { StatsController } from './stats.controller';
import { StatsGateway } from './stats.gateway';
import { StatsService } from './stats.service';

/** UPS 통계 REST/WebSocket 조회를 제공하는 Nest 모듈 */
@Module({
  imports: [SamplesModule, AggregationModule, ShutdownModule],
  controllers: [StatsController],
  providers: [StatsService, StatsGateway],
})
export class StatsModule {}
