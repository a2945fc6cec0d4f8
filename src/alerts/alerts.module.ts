import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AlertEntity } from './alert.entity';
import { AlertsService } from './alerts.service';
import { AlertsController } from './alerts.controller';
import { AlertNotifierService } from './alert-notifier.service';

/** 경보 생성/조회 및 외부 통지를 제공하는 Nest 모듈 */
@Module({
  imports: [TypeOrmModule.forFeature([AlertEntity])],
  providers: [AlertsService, AlertNotifierService],
  controllers: [AlertsController],
  exports: [AlertsService],
})
export class AlertsModule {}
