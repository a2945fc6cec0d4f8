import type { Sample } from '../ups/ups.types';

export const MAX_PREDICTED_RUNTIME_SECONDS = 86_400;

/**
 * 현재 배터리 구간의 방전 속도로 threshold 까지 남은 시간을 추정한다.
 *
 * 충전량은 정수 단위로 떨어지므로, 각 충전량이 처음 관측된 시각만 사용해
 * 1% 당 평균 소요 시간을 구한다. 하락이 두 번 이상 관측되지 않으면 null.
 */
export function predictRuntimeSeconds(samples: readonly Sample[], thresholdPct: number): number | null {
  const drops: Array<{ timestamp: number; chargePct: number }> = [];
  for (const sample of samples) {
    const previous = drops[drops.length - 1];
    if (!previous || sample.chargePct < previous.chargePct) {
      drops.push({ timestamp: sample.timestamp, chargePct: sample.chargePct });
    }
  }
  if (drops.length < 2) {
    return null;
  }

  const first = drops[0];
  const last = drops[drops.length - 1];
  const droppedPct = first.chargePct - last.chargePct;
  const elapsedSeconds = (last.timestamp - first.timestamp) / 1000;
  const secondsPerPct = elapsedSeconds / droppedPct;
  const remainingPct = last.chargePct - thresholdPct;
  if (remainingPct <= 0) {
    return 0;
  }
  return Math.min(Math.round(remainingPct * secondsPerPct), MAX_PREDICTED_RUNTIME_SECONDS);
}
