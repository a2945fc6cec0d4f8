import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import axios from 'axios';
import { upsStatsConfig } from '../config/ups-stats.config';

export interface AlertNotification {
  subject: string;
  body: string;
}

/**
 * 경보 상태 변화를 웹훅(JSON `{ subject, body }`)으로 전달한다.
 * 웹훅이 설정되지 않았으면 아무것도 하지 않는다. 실패는 로그로만 남긴다.
 */
@Injectable()
export class AlertNotifierService {
  private readonly logger = new Logger(AlertNotifierService.name);

  constructor(
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
  ) {}

  async notify(notification: AlertNotification): Promise<boolean> {
    const url = this.config.alerts.webhookUrl;
    if (!url) {
      return false;
    }
    try {
      await axios.post(url, notification, {
        timeout: 10_000,
        headers: { 'Content-Type': 'application/json' },
      });
      this.logger.log(`Sent notification "${notification.subject}"`);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to send notification "${notification.subject}": ${error}`);
      return false;
    }
  }
}
