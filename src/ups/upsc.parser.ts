import { z } from 'zod';
import type { UpsStatus } from './ups.types';

const numeric = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric value')
  .transform(Number);

/** upsc 응답에서 필요한 필드만 골라 검증한다. 나머지 키는 무시한다. */
export const UpscVariablesSchema = z.object({
  'ups.status': z.string().trim().min(1),
  'battery.charge': numeric.pipe(z.number().min(0).max(100)),
  'ups.load': numeric.pipe(z.number().min(0)),
  'battery.runtime': numeric.pipe(z.number().min(0)).optional(),
});

export type UpscVariables = z.infer<typeof UpscVariablesSchema>;

/** `key: value` 줄 목록을 레코드로 변환한다. 형식이 맞지 않는 줄은 건너뛴다. */
export function parseUpscLines(output: string): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const line of output.split(/\r?\n/)) {
    const separator = line.indexOf(':');
    if (separator <= 0) continue;
    const key = line.slice(0, separator).trim();
    if (!/^[a-z0-9_.]+$/i.test(key)) continue;
    variables[key] = line.slice(separator + 1).trim();
  }
  return variables;
}

/**
 * NUT 상태 토큰(OL, OB, LB, OVER, CHRG ...)을 UpsStatus 로 정규화한다.
 * OB 는 OVER 와 함께 와도 ON_BATTERY 로 본다.
 */
export function parseUpsStatus(raw: string): UpsStatus {
  const tokens = new Set(raw.trim().toUpperCase().split(/\s+/));
  if (tokens.has('OB')) return 'ON_BATTERY';
  if (tokens.has('OVER')) return 'OVERLOADED';
  if (tokens.has('OL')) return 'ON_LINE';
  return 'UNKNOWN';
}
