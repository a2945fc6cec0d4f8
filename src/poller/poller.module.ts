import { Module } from '@nestjs/common';
import { AlertsModule } from '../alerts/alerts.module';
import { SamplesModule } from '../samples/samples.module';
import { UpsModule } from '../ups/ups.module';
import { UpsPollerService } from './ups-poller.service';

/** UPS 조회 루프와 보존 기간 정리를 담당하는 Nest 모듈 */
@Module({
  imports: [UpsModule, SamplesModule, AlertsModule],
  providers: [UpsPollerService],
  exports: [UpsPollerService],
})
export class PollerModule {}
