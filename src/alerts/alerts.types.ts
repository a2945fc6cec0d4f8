import type { AlertEntity, AlertSeverity } from './alert.entity';

/** GET /alerts/active 응답 항목. 저장된 엔티티 중 조회에 필요한 필드만 싣는다. */
export interface AlertView {
  id: string;
  source: string;
  metric: string;
  severity: AlertSeverity;
  message: string;
  threshold: number | null;
  currentValue: number | null;
  createdAt: string;
}

export function toAlertView(alert: AlertEntity): AlertView {
  return {
    id: alert.id,
    source: alert.source,
    metric: alert.metric,
    severity: alert.severity,
    message: alert.message,
    threshold: alert.threshold,
    currentValue: alert.currentValue,
    createdAt: alert.createdAt.toISOString(),
  };
}
