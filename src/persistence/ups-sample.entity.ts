import { Column, Entity, PrimaryColumn } from 'typeorm';
import type { UpsStatus } from '../ups/ups.types';

/**
 * UPS 판독 이력. timestamp(ms) 가 곧 기본 키이므로 append 순서가 보장된다.
 * total* 컬럼은 첫 샘플부터 이 샘플까지의 누적 합계(RunningTotals)다.
 */
@Entity({ name: 'ups_samples' })
export class UpsSampleEntity {
  @PrimaryColumn({ type: 'integer' })
  timestampMs!: number;

  @Column({ type: 'varchar', length: 16 })
  status!: UpsStatus;

  @Column({ type: 'float' })
  chargePct!: number;

  @Column({ type: 'float' })
  loadPct!: number;

  @Column({ type: 'float', nullable: true })
  runtimeSeconds!: number | null;

  @Column({ type: 'integer', default: 0 })
  totalObservedMs!: number;

  @Column({ type: 'integer', default: 0 })
  totalSystemUpMs!: number;

  @Column({ type: 'integer', default: 0 })
  totalWallPowerMs!: number;

  @Column({ type: 'integer', default: 0 })
  totalSampleCount!: number;

  @Column({ type: 'integer', default: 0 })
  totalLoadMilliPct!: number;
}
