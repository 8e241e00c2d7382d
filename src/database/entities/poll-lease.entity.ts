import { Entity, PrimaryColumn, Column, Index, VersionColumn } from 'typeorm';

/**
 * Short-TTL claim on a run id: the holder is the only process allowed to poll it.
 * A lease whose expires_at has passed can be taken over by anyone.
 */
@Entity('poll_leases')
@Index(['expires_at'])
export class PollLease {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  run_id!: string;

  @Column({ type: 'varchar', length: 100 })
  holder!: string;

  @Column({ type: Date })
  expires_at!: Date;

  @VersionColumn()
  version!: number;
}
