/**
 * UPS 샘플/폴링 결과 타입 모음.
 * Store, Aggregation, Shutdown 경계를 넘나드는 도메인 값이다.
 */
export const UPS_STATUSES = ['ON_LINE', 'ON_BATTERY', 'OVERLOADED', 'UNKNOWN'] as const;

export type UpsStatus = (typeof UPS_STATUSES)[number];

/** 한 번의 UPS 판독값. timestamp 는 epoch milliseconds. */
export interface Sample {
  timestamp: number;
  status: UpsStatus;
  chargePct: number;
  loadPct: number;
  runtimeEstimateSeconds: number | null;
}

export type PollFailureReason = 'timeout' | 'unreachable' | 'malformed';

export interface PollFailure {
  reason: PollFailureReason;
  message: string;
  at: number;
}

export type PollResult = { ok: true; sample: Sample } | { ok: false; failure: PollFailure };

/** 벽 전원으로 동작 중인 상태인지. 과부하도 전원 자체는 상용 전원이다. */
export function isWallPower(status: UpsStatus): boolean {
  return status === 'ON_LINE' || status === 'OVERLOADED';
}

/** UPS 데몬이 정상 상태를 보고하는 동안만 서비스가 살아있는 것으로 본다. */
export function isServiceUp(status: UpsStatus): boolean {
  return status !== 'UNKNOWN';
}
