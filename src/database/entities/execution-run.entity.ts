import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { ExecutionKind, ExecutionStatus, TriggerType } from 'src/executions/execution-status';
import { Pipeline } from './pipeline.entity';

/**
 * One attempt to execute a pipeline, either a local sandbox dry run or a remote CI run.
 * Terminal rows are never updated again; rollback is a new row pointing at the superseded one.
 * completed_at is set exactly when status is SUCCESS or FAILED.
 */
@Entity('execution_runs')
@Index(['pipeline_id', 'created_at'])
@Index(['status'])
export class ExecutionRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.runs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ type: 'int', default: 1 })
  pipeline_version!: number;

  @Column({ type: 'varchar', length: 20, default: ExecutionKind.REMOTE })
  kind!: ExecutionKind;

  @Column({ type: 'varchar', length: 50 })
  status!: ExecutionStatus;

  @Column({ type: 'varchar', length: 50, default: TriggerType.MANUAL })
  trigger_type!: TriggerType;

  @Column({ type: 'varchar', length: 255, nullable: true })
  branch!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  remote_run_uuid!: string | null;

  @Column({ type: 'int', nullable: true })
  remote_build_number!: number | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  commit_hash!: string | null;

  @Column({ type: 'text', nullable: true })
  logs!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  /** Trigger attempts made before this row was written. */
  @Column({ type: 'int', default: 1 })
  attempts!: number;

  @Column({ type: 'boolean', default: false })
  rolled_back!: boolean;

  @Column({ type: 'text', nullable: true })
  rollback_reason!: string | null;

  @Column({ type: 'uuid', nullable: true })
  previous_execution_id!: string | null;

  @ManyToOne(() => ExecutionRun, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'previous_execution_id' })
  previous_execution!: ExecutionRun | null;

  @Column({ type: Date })
  started_at!: Date;

  @Column({ type: Date, nullable: true })
  completed_at!: Date | null;

  @Column({ type: 'int', nullable: true })
  duration_seconds!: number | null;

  @CreateDateColumn()
  created_at!: Date;
}
