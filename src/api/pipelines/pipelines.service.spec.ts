import { DataSource, QueryFailedError, Repository, UpdateResult } from 'typeorm';
import { ExecutionRun } from 'src/database/entities/execution-run.entity';
import { Pipeline } from 'src/database/entities/pipeline.entity';
import { ExecutionStateService } from 'src/executions/execution-state.service';
import { ExecutionKind, ExecutionStatus } from 'src/executions/execution-status';
import { PipelineNotFoundError } from 'src/executions/execution.errors';
import { PollerRegistry } from 'src/monitor/poller-registry.service';
import { SandboxRunnerService } from 'src/sandbox/sandbox-runner.service';
import { testEngineConfig } from 'src/testing/engine-config';
import { FakeEnvironmentProvider, FakeWorkspaceProvider, type ScriptedStep } from 'src/testing/fake-sandbox';
import { SAMPLE_CONFIG, createTestDataSource, seedRun } from 'src/testing/test-data-source';
import { ActivePipelineConflictError } from './pipeline-conflict.error';
import { PipelineInputError } from './pipeline-input.error';
import { PipelinesService } from './pipelines.service';

const TWO_STEPS = [
  'pipelines:',
  '  default:',
  '    - step:',
  '        name: build',
  '        script:',
  '          - make',
  '    - step:',
  '        name: test',
  '        script:',
  '          - make test',
  '',
].join('\n');

describe('PipelinesService', () => {
  let dataSource: DataSource;
  let registry: PollerRegistry;
  let environments: FakeEnvironmentProvider;
  let workspaces: FakeWorkspaceProvider;
  let service: PipelinesService;

  function build(steps: ScriptedStep[] = []) {
    const config = testEngineConfig();
    environments = new FakeEnvironmentProvider(steps);
    workspaces = new FakeWorkspaceProvider();
    const sandbox = new SandboxRunnerService(environments, workspaces, config);
    service = new PipelinesService(dataSource, new ExecutionStateService(dataSource), sandbox, registry, config);
  }

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    registry = new PollerRegistry();
    build();
  });

  afterEach(async () => {
    await registry.onModuleDestroy();
    await dataSource.destroy();
  });

  describe('create', () => {
    it('stores the definition as version 1 in PLANNED', async () => {
      const pipeline = await service.create({ name: 'web', repository: 'acme/web-app', config: SAMPLE_CONFIG });

      expect(pipeline).toEqual(
        expect.objectContaining({ version: 1, status: ExecutionStatus.PLANNED, is_active: true }),
      );
      const versions = await service.listVersions(pipeline.id);
      expect(versions.map((v) => [v.version, v.config])).toEqual([[1, SAMPLE_CONFIG]]);
    });

    it('supersedes the active pipeline of the same repository', async () => {
      const first = await service.create({ name: 'v1', repository: 'acme/web-app', config: SAMPLE_CONFIG });
      const other = await service.create({ name: 'api', repository: 'acme/api', config: SAMPLE_CONFIG });
      const second = await service.create({ name: 'v2', repository: 'acme/web-app', config: SAMPLE_CONFIG });

      expect((await service.findOne(first.id)).is_active).toBe(false);
      expect((await service.findOne(other.id)).is_active).toBe(true);
      expect((await service.findActiveByRepository('acme/web-app'))?.id).toBe(second.id);
    });

    it('rejects missing fields, a malformed repository and an invalid definition together', async () => {
      const error = await service
        .create({ name: '', repository: 'not-a-slug', config: 'pipelines:\n  default: []\n' })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PipelineInputError);
      expect(error).toEqual(
        expect.objectContaining({
          errors: [
            'name is required',
            'Repository "not-a-slug" is not of the form workspace/slug',
            'No default pipeline defined',
          ],
        }),
      );
      expect(await dataSource.getRepository(Pipeline).count()).toBe(0);
    });
  });

  describe('one active pipeline per repository', () => {
    it('is also enforced by the store', async () => {
      await service.create({ name: 'v1', repository: 'acme/web-app', config: SAMPLE_CONFIG });
      const repo = dataSource.getRepository(Pipeline);
      const row = { repository: 'acme/web-app', config: SAMPLE_CONFIG, version: 1, status: ExecutionStatus.PLANNED };

      await expect(repo.insert({ ...row, name: 'v2', is_active: true })).rejects.toBeInstanceOf(QueryFailedError);
      await repo.insert({ ...row, name: 'v3', is_active: false });
      expect(await repo.countBy({ repository: 'acme/web-app' })).toBe(2);
    });

    it('reports an activation that raced with another one as a conflict', async () => {
      const first = await service.create({ name: 'v1', repository: 'acme/web-app', config: SAMPLE_CONFIG });
      // the other activation commits after this one looked for active siblings
      const missedSibling = jest.spyOn(Repository.prototype, 'update').mockResolvedValueOnce(new UpdateResult());

      const error = await service
        .create({ name: 'v2', repository: 'acme/web-app', config: SAMPLE_CONFIG })
        .catch((err: unknown) => err);
      missedSibling.mockRestore();

      expect(error).toBeInstanceOf(ActivePipelineConflictError);
      expect(error).toEqual(expect.objectContaining({ repository: 'acme/web-app' }));
      expect(await dataSource.getRepository(Pipeline).count()).toBe(1);
      expect((await service.findOne(first.id)).is_active).toBe(true);
    });
  });

  it('appends a version when the definition changes and goes back to PLANNED', async () => {
    const pipeline = await service.create({ name: 'web', repository: 'acme/web-app', config: SAMPLE_CONFIG });
    await dataSource
      .getRepository(Pipeline)
      .update({ id: pipeline.id }, { status: ExecutionStatus.FAILED, test_output: 'old', error_message: 'boom' });

    const updated = await service.updateConfig(pipeline.id, TWO_STEPS);

    expect(updated).toEqual(
      expect.objectContaining({
        version: 2,
        config: TWO_STEPS,
        status: ExecutionStatus.PLANNED,
        test_output: null,
        error_message: null,
      }),
    );
    const versions = await service.listVersions(pipeline.id);
    expect(versions.map((v) => v.version)).toEqual([2, 1]);
    expect(versions[1].config).toBe(SAMPLE_CONFIG);
  });

  it('updates deployment parameters without touching the definition', async () => {
    const pipeline = await service.create({ name: 'web', repository: 'acme/web-app', config: SAMPLE_CONFIG });

    const updated = await service.updateParameters(pipeline.id, {
      deployment_server: 'deploy@10.0.0.5',
      environment_variables: { NODE_ENV: 'production' },
    });

    expect(updated.deployment_server).toBe('deploy@10.0.0.5');
    expect(updated.environment_variables).toEqual({ NODE_ENV: 'production' });
    expect(updated.version).toBe(1);
  });

  it('activates one pipeline and deactivates its siblings', async () => {
    const first = await service.create({ name: 'v1', repository: 'acme/web-app', config: SAMPLE_CONFIG });
    await service.create({ name: 'v2', repository: 'acme/web-app', config: SAMPLE_CONFIG });

    await service.activate(first.id);

    const rows = await dataSource.getRepository(Pipeline).find({ order: { name: 'ASC' } });
    expect(rows.map((p) => [p.name, p.is_active])).toEqual([
      ['v1', true],
      ['v2', false],
    ]);
  });

  it('stops pollers and deletes the pipeline with its runs', async () => {
    const pipeline = await service.create({ name: 'web', repository: 'acme/web-app', config: SAMPLE_CONFIG });
    const run = await seedRun(dataSource, pipeline);
    let aborted = false;
    registry.start(run.id, pipeline.id, (signal) => new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => {
        aborted = true;
        resolve();
      });
    }));

    await service.remove(pipeline.id);

    expect(aborted).toBe(true);
    await expect(service.findOne(pipeline.id)).rejects.toBeInstanceOf(PipelineNotFoundError);
    expect(await dataSource.getRepository(ExecutionRun).count()).toBe(0);
  });

  describe('test', () => {
    it('records a successful dry run on a local execution and the pipeline', async () => {
      build([
        { exitCode: 0, output: 'built' },
        { exitCode: 0, output: 'tested' },
      ]);
      const pipeline = await service.create({
        name: 'web',
        repository: 'acme/web-app',
        config: TWO_STEPS,
        repository_url: '/srv/checkouts/web-app',
      });

      const report = await service.test(pipeline.id);

      expect(report).toEqual(
        expect.objectContaining({
          success: true,
          output: '=== build ===\nbuilt\n=== test ===\ntested',
          error: null,
          failing_step: null,
        }),
      );
      expect(report.execution).toEqual(
        expect.objectContaining({ kind: ExecutionKind.LOCAL, status: ExecutionStatus.SUCCESS }),
      );
      expect(workspaces.acquired).toEqual(['/srv/checkouts/web-app']);
      const stored = await service.findOne(pipeline.id);
      expect(stored.test_output).toBe('=== build ===\nbuilt\n=== test ===\ntested');
      expect(stored.status).toBe(ExecutionStatus.SUCCESS);
    });

    it('records the failing step of a dry run', async () => {
      build([{ exitCode: 2, output: 'make: *** [all] Error 2' }]);
      const pipeline = await service.create({ name: 'web', repository: 'acme/web-app', config: TWO_STEPS });

      const report = await service.test(pipeline.id);

      expect(report.success).toBe(false);
      expect(report.failing_step).toBe('build');
      expect(report.error).toBe('Step "build" failed with exit code 2');
      expect(report.execution.status).toBe(ExecutionStatus.FAILED);
      expect(report.execution.error_message).toBe('Step "build" failed with exit code 2');
      expect(environments.provisioned).toHaveLength(1);
      expect((await service.findOne(pipeline.id)).error_message).toBe('Step "build" failed with exit code 2');
    });
  });
});
