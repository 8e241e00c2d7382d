import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { ExecutionStatus } from 'src/executions/execution-status';
import { ExecutionRun } from './execution-run.entity';
import { PipelineVersion } from './pipeline-version.entity';

/**
 * Pipeline: the deployment configuration of a repository.
 * `config` holds the current YAML document; every edit appends a PipelineVersion.
 * Only one pipeline per repository is active: PipelinesService switches the others off in
 * the same transaction, and the partial unique index rejects a concurrent second activation.
 */
@Entity('pipelines')
@Index('uq_pipelines_active_repository', ['repository'], { unique: true, where: '"is_active" = true' })
export class Pipeline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  /** Remote CI identifier, `workspace/slug`. Used for webhook matching and triggers. */
  @Column({ type: 'varchar', length: 500 })
  repository!: string;

  /** Clonable source used by sandbox dry runs. */
  @Column({ type: 'varchar', length: 500, nullable: true })
  repository_url!: string | null;

  @Column({ type: 'int', default: 1 })
  version!: number;

  @Column('text')
  config!: string;

  @Column({ type: 'varchar', length: 50, default: ExecutionStatus.PLANNED })
  status!: ExecutionStatus;

  @Column({ type: 'boolean', default: true })
  is_active!: boolean;

  @Column({ type: 'text', nullable: true })
  test_output!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  deployment_server!: string | null;

  @Column({ type: 'simple-json', nullable: true })
  environment_variables!: Record<string, string> | null;

  @Column({ type: Date, nullable: true })
  last_execution_timestamp!: Date | null;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;

  @OneToMany(() => ExecutionRun, (run) => run.pipeline)
  runs!: ExecutionRun[];

  @OneToMany(() => PipelineVersion, (v) => v.pipeline)
  versions!: PipelineVersion[];
}
