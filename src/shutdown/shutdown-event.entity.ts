import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

export type ShutdownOutcome = 'success' | 'failure' | 'unknown';

/** 저전압 에피소드마다 한 건씩 생성되는 원격 종료 기록 */
@Entity({ name: 'shutdown_events' })
@Index(['targetLabel', 'triggeredAt'])
export class ShutdownEventEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /** 설정에 적힌 대상 그대로(user@host:port). 재시작 후 에피소드를 이 값으로 찾는다. */
  @Column({ type: 'varchar', length: 255 })
  targetLabel!: string;

  @Column({ type: 'varchar', length: 255 })
  targetHost!: string;

  @Column({ type: 'datetime' })
  triggeredAt!: Date;

  @Column({ type: 'float' })
  chargeAtTrigger!: number;

  @Column({ type: 'integer', default: 0 })
  attempts!: number;

  /** 진행 중이면 null */
  @Column({ type: 'varchar', length: 16, nullable: true })
  outcome!: ShutdownOutcome | null;

  @Column({ type: 'text', nullable: true })
  lastError!: string | null;

  @Column({ type: 'datetime', nullable: true })
  finalizedAt!: Date | null;

  /** COOLDOWN → NORMAL 로 에피소드가 끝난 시각 */
  @Column({ type: 'datetime', nullable: true })
  episodeEndedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
