import { DataSource } from 'typeorm';
import { ENTITIES } from 'src/database/entities';
import { Pipeline } from 'src/database/entities/pipeline.entity';
import { ExecutionRun } from 'src/database/entities/execution-run.entity';
import { ExecutionKind, ExecutionStatus, TriggerType } from 'src/executions/execution-status';

/** Fresh in-memory SQLite schema per call; same entities as production. */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: ENTITIES,
    synchronize: true,
  });
  return dataSource.initialize();
}

export const SAMPLE_CONFIG = [
  'image: node:20',
  'pipelines:',
  '  default:',
  '    - step:',
  '        name: build',
  '        script:',
  '          - npm ci',
  '          - npm run build',
  '',
].join('\n');

export async function seedPipeline(dataSource: DataSource, overrides: Partial<Pipeline> = {}): Promise<Pipeline> {
  const repo = dataSource.getRepository(Pipeline);
  return repo.save(
    repo.create({
      name: 'web-app',
      repository: 'acme/web-app',
      repository_url: null,
      config: SAMPLE_CONFIG,
      status: ExecutionStatus.PLANNED,
      is_active: true,
      ...overrides,
    }),
  );
}

export async function seedRun(
  dataSource: DataSource,
  pipeline: Pipeline,
  overrides: Partial<ExecutionRun> = {},
): Promise<ExecutionRun> {
  const repo = dataSource.getRepository(ExecutionRun);
  return repo.save(
    repo.create({
      pipeline_id: pipeline.id,
      pipeline_version: pipeline.version,
      kind: ExecutionKind.REMOTE,
      status: ExecutionStatus.BUILDING,
      trigger_type: TriggerType.MANUAL,
      branch: 'main',
      remote_run_uuid: '{remote-1}',
      started_at: new Date('2026-03-01T10:00:00.000Z'),
      ...overrides,
    }),
  );
}
