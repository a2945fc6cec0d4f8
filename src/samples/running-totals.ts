import { isServiceUp, isWallPower } from '../ups/ups.types';
import type { Sample } from '../ups/ups.types';

/**
 * 첫 샘플부터 누적한 합계. 샘플마다 함께 저장되며, 윈도우 통계는
 * 윈도우 양 끝 지점의 합계 차이로 구한다.
 *
 * 시간은 정수 ms, 부하는 0.001% 단위 정수로 더하므로 차이를 구해도 오차가 쌓이지 않는다.
 */
export interface RunningTotals {
  observedMs: number;
  systemUpMs: number;
  wallPowerMs: number;
  sampleCount: number;
  loadMilliPct: number;
}

export const ZERO_TOTALS: Readonly<RunningTotals> = Object.freeze({
  observedMs: 0,
  systemUpMs: 0,
  wallPowerMs: 0,
  sampleCount: 0,
  loadMilliPct: 0,
});

export function toMilliPct(loadPct: number): number {
  return Math.round(loadPct * 1000);
}

/**
 * owner 가 여는 구간 중 [owner, end) 부분을 더한다.
 * 구간은 until 에 닫힌 것으로 분류하며, 길이가 downGapMs 를 넘으면 시스템 다운이다.
 */
export function addInterval(
  totals: Readonly<RunningTotals>,
  owner: Sample,
  end: number,
  until: number,
  downGapMs: number,
): RunningTotals {
  const duration = Math.max(0, end - owner.timestamp);
  const systemUp = until - owner.timestamp <= downGapMs && isServiceUp(owner.status);
  return {
    ...totals,
    observedMs: totals.observedMs + duration,
    systemUpMs: totals.systemUpMs + (systemUp ? duration : 0),
    wallPowerMs: totals.wallPowerMs + (isWallPower(owner.status) ? duration : 0),
  };
}

export function addSample(totals: Readonly<RunningTotals>, sample: Sample): RunningTotals {
  return {
    ...totals,
    sampleCount: totals.sampleCount + 1,
    loadMilliPct: totals.loadMilliPct + toMilliPct(sample.loadPct),
  };
}

/** 해당 샘플을 더하기 직전의 부하 합계. */
export function withoutSample(totals: Readonly<RunningTotals>, sample: Sample): RunningTotals {
  return {
    ...totals,
    sampleCount: totals.sampleCount - 1,
    loadMilliPct: totals.loadMilliPct - toMilliPct(sample.loadPct),
  };
}

export function subtractTotals(end: Readonly<RunningTotals>, start: Readonly<RunningTotals>): RunningTotals {
  return {
    observedMs: end.observedMs - start.observedMs,
    systemUpMs: end.systemUpMs - start.systemUpMs,
    wallPowerMs: end.wallPowerMs - start.wallPowerMs,
    sampleCount: end.sampleCount - start.sampleCount,
    loadMilliPct: end.loadMilliPct - start.loadMilliPct,
  };
}
