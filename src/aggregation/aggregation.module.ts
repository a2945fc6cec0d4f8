import { Module } from '@nestjs/common';
import { SamplesModule } from '../samples/samples.module';
import { AggregationService } from './aggregation.service';

/** 윈도우 통계 계산을 제공하는 Nest 모듈 */
@Module({
  imports: [SamplesModule],
  providers: [AggregationService],
  exports: [AggregationService],
})
export class AggregationModule {}
