import { DataSource } from 'typeorm';
import { ExecutionStateService } from 'src/executions/execution-state.service';
import { ExecutionStatus } from 'src/executions/execution-status';
import { ExecutionNotFoundError } from 'src/executions/execution.errors';
import { PollLeaseService } from 'src/monitor/poll-lease.service';
import { PollerRegistry } from 'src/monitor/poller-registry.service';
import { StatusPollerService } from 'src/monitor/status-poller.service';
import { RunEventsService } from 'src/streaming/run-events.service';
import { testEngineConfig } from 'src/testing/engine-config';
import { FakeRemoteCiClient, remoteStatus } from 'src/testing/fake-remote-ci';
import { createTestDataSource, seedPipeline, seedRun } from 'src/testing/test-data-source';
import { TriggerService } from 'src/triggers/trigger.service';
import { RunsService } from './runs.service';

const TRANSCRIPT = [
  '=== build ===',
  'npm WARN old lockfile',
  'built in 3s',
  '=== test ===',
  'Error: 1 test failed',
].join('\n');

describe('RunsService', () => {
  let dataSource: DataSource;
  let registry: PollerRegistry;
  let client: FakeRemoteCiClient;
  let service: RunsService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    const config = testEngineConfig({ poll: { intervalMs: 60_000 } });
    registry = new PollerRegistry();
    client = new FakeRemoteCiClient();
    const state = new ExecutionStateService(dataSource);
    const poller = new StatusPollerService(
      dataSource,
      state,
      client,
      new RunEventsService(),
      registry,
      new PollLeaseService(dataSource, config),
      config,
    );
    const triggers = new TriggerService(dataSource, state, poller, client, config);
    service = new RunsService(state, poller, registry, triggers);
  });

  afterEach(async () => {
    await registry.onModuleDestroy();
    await dataSource.destroy();
  });

  describe('getLogs', () => {
    it('filters, paginates and summarises the stored transcript', async () => {
      const pipeline = await seedPipeline(dataSource);
      const run = await seedRun(dataSource, pipeline, {
        status: ExecutionStatus.FAILED,
        logs: TRANSCRIPT,
        completed_at: new Date('2026-03-01T10:02:00.000Z'),
      });

      const logs = await service.getLogs(run.id, { search: 'e', level: 'error', page: 1, perPage: 10 });

      expect(logs.execution_id).toBe(run.id);
      expect(logs.status).toBe(ExecutionStatus.FAILED);
      expect(logs.lines).toEqual(['Error: 1 test failed']);
      expect(logs.pagination.total_lines).toBe(1);
      expect(logs.summary).toEqual({
        total_lines: 5,
        total_steps: 2,
        step_names: ['build', 'test'],
        error_lines: 1,
        warning_lines: 1,
      });
    });

    it('returns an empty page for a run without logs', async () => {
      const pipeline = await seedPipeline(dataSource);
      const run = await seedRun(dataSource, pipeline);

      const logs = await service.getLogs(run.id);

      expect(logs.lines).toEqual([]);
      expect(logs.pagination.total_pages).toBe(0);
    });

    it('reports an unknown run', async () => {
      await expect(service.getLogs('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(
        ExecutionNotFoundError,
      );
    });
  });

  it('starts and stops monitoring without touching the stored status', async () => {
    const pipeline = await seedPipeline(dataSource);
    const run = await seedRun(dataSource, pipeline);
    client.statuses = [remoteStatus('IN_PROGRESS')];

    expect(await service.startMonitor(run.id)).toEqual({ execution_id: run.id, monitoring: true });
    expect(await service.stopMonitor(run.id)).toEqual({ execution_id: run.id, monitoring: false });

    expect(registry.isActive(run.id)).toBe(false);
    expect((await service.findOne(run.id)).status).toBe(ExecutionStatus.BUILDING);
  });
});
