import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AlertsModule } from '../alerts/alerts.module';
import { SamplesModule } from '../samples/samples.module';
import { UpsModule } from '../ups/ups.module';
import { ShutdownEventEntity } from './shutdown-event.entity';
import { ShutdownService } from './shutdown.service';
import { SHUTDOWN_TRANSPORT } from './shutdown.types';
import { SshShutdownTransport } from './ssh-shutdown.transport';

/** 저전압 시 원격 호스트 종료를 담당하는 Nest 모듈 */
@Module({
  imports: [TypeOrmModule.forFeature([ShutdownEventEntity]), SamplesModule, AlertsModule, UpsModule],
  providers: [ShutdownService, { provide: SHUTDOWN_TRANSPORT, useClass: SshShutdownTransport }],
  exports: [ShutdownService],
})
export class ShutdownModule {}
