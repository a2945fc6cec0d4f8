import type { ShutdownTarget } from '../config/ups-stats.config';
import type { ShutdownOutcome } from './shutdown-event.entity';

export type ShutdownState = 'NORMAL' | 'ARMED' | 'TRIGGERING' | 'COOLDOWN';

export type ShutdownFailureKind = 'transport' | 'command' | 'timeout';

/** 원격 종료 시도 한 번의 실패. */
export class ShutdownActionError extends Error {
  constructor(
    readonly kind: ShutdownFailureKind,
    message: string,
  ) {
    super(message);
    this.name = 'ShutdownActionError';
  }
}

/**
 * 원격 명령 실행 채널. execute 는 명령이 성공하면 resolve,
 * 그 외에는 ShutdownActionError 로 reject 한다.
 */
export interface ShutdownTransport {
  execute(target: ShutdownTarget, command: string, timeoutMs: number): Promise<void>;
}

export const SHUTDOWN_TRANSPORT = Symbol('UPS_STATS_SHUTDOWN_TRANSPORT');

/**
 * Query Facade 로 노출되는 종료 상태 요약. 호스트 정보는 포함하지 않는다.
 */
export interface ShutdownStatusSummary {
  state: ShutdownState;
  targets: number;
  lastTriggeredAt: string | null;
  lastOutcome: ShutdownOutcome | null;
}
