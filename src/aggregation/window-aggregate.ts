import type { RunningTotals } from '../samples/running-totals';
import type { Aggregate, AggregateWindow } from './aggregation.types';

/**
 * 윈도우 [from, to] 안에서 쌓인 합계로 통계를 만든다.
 * time 은 시간 귀속 합계의 차이, load 는 윈도우 안 샘플의 부하 합계 차이다.
 */
export function buildAggregate(
  window: AggregateWindow,
  from: number,
  to: number,
  time: RunningTotals,
  load: RunningTotals,
): Aggregate {
  return {
    window,
    from: new Date(from).toISOString(),
    to: new Date(to).toISOString(),
    sampleCount: load.sampleCount,
    avgLoadPct: load.sampleCount > 0 ? load.loadMilliPct / load.sampleCount / 1000 : null,
    systemUptimePct: percentOf(time.systemUpMs, time.observedMs),
    wallPowerUptimePct: percentOf(time.wallPowerMs, time.observedMs),
    observedMs: time.observedMs,
  };
}

function percentOf(valueMs: number, observedMs: number): number | null {
  if (observedMs === 0) {
    return null;
  }
  if (valueMs === observedMs) {
    return 100;
  }
  return (valueMs / observedMs) * 100;
}
