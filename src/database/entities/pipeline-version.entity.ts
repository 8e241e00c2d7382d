import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Pipeline } from './pipeline.entity';

/** Immutable snapshot of a pipeline config. Rows are only ever inserted. */
@Entity('pipeline_versions')
@Index(['pipeline_id', 'version'], { unique: true })
export class PipelineVersion {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.versions, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ type: 'int' })
  version!: number;

  @Column('text')
  config!: string;

  @CreateDateColumn()
  created_at!: Date;
}
