import { z } from 'zod';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export const AggregateWindowSchema = z.enum(['1m', '1h', '24h', '7d', '30d']);

export type AggregateWindow = z.infer<typeof AggregateWindowSchema>;

export const AGGREGATE_WINDOW_KEYS = AggregateWindowSchema.options;

/** 지원하는 고정 윈도우와 그 길이(ms). */
export const AGGREGATE_WINDOWS: Readonly<Record<AggregateWindow, number>> = {
  '1m': MINUTE_MS,
  '1h': HOUR_MS,
  '24h': DAY_MS,
  '7d': 7 * DAY_MS,
  '30d': 30 * DAY_MS,
};

/**
 * 한 윈도우의 파생 통계. 값이 null 이면 데이터가 부족하다는 뜻이다.
 */
export interface Aggregate {
  window: AggregateWindow;
  from: string;
  to: string;
  sampleCount: number;
  avgLoadPct: number | null;
  systemUptimePct: number | null;
  wallPowerUptimePct: number | null;
  observedMs: number;
}

export type AggregateSet = Record<AggregateWindow, Aggregate>;
