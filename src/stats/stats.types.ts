import type { AggregateSet } from '../aggregation/aggregation.types';
import type { ShutdownStatusSummary } from '../shutdown/shutdown.types';
import type { Sample, UpsStatus } from '../ups/ups.types';

/** 외부로 노출되는 샘플 표현. timestamp 는 ISO 문자열. */
export interface SampleView {
  timestamp: string;
  status: UpsStatus;
  chargePct: number;
  loadPct: number;
  runtimeEstimateSeconds: number | null;
}

export interface UptimeSummary {
  window: '30d';
  systemPct: number | null;
  wallPowerPct: number | null;
}

/**
 * GET /api/stats 와 WebSocket 접속 시 전달되는 전체 스냅샷.
 * 계산에 실패한 부분은 null 로 내려간다.
 */
export interface UpsStatsSnapshot {
  type: 'ups-stats';
  generatedAt: string;
  latest: SampleView | null;
  aggregates: AggregateSet | null;
  uptime: UptimeSummary | null;
  predictedRuntimeSeconds: number | null;
  shutdown: ShutdownStatusSummary;
}

export function toSampleView(sample: Sample): SampleView {
  return {
    timestamp: new Date(sample.timestamp).toISOString(),
    status: sample.status,
    chargePct: sample.chargePct,
    loadPct: sample.loadPct,
    runtimeEstimateSeconds: sample.runtimeEstimateSeconds,
  };
}
