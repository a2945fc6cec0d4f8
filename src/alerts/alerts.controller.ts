import { Controller, Get } from '@nestjs/common';
import { AlertsService } from './alerts.service';
import type { AlertView } from './alerts.types';

/** 활성 경보 조회. 종료 대상은 번호로만 드러나고 호스트 정보는 싣지 않는다. */
@Controller('alerts')
export class AlertsController {
  constructor(private readonly alertsService: AlertsService) {}

  @Get('active')
  getActiveAlerts(): Promise<AlertView[]> {
    return this.alertsService.getActiveAlertViews();
  }
}
