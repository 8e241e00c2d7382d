import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { engineConfig } from 'src/config/engine.config';
import { ExecutionRun } from 'src/database/entities/execution-run.entity';
import { Pipeline } from 'src/database/entities/pipeline.entity';
import { ExecutionStateService } from 'src/executions/execution-state.service';
import { ExecutionKind, ExecutionStatus, isTerminal } from 'src/executions/execution-status';
import { ExecutionNotFoundError, PipelineNotFoundError } from 'src/executions/execution.errors';
import { REMOTE_CI_CLIENT, type RemoteCiClient, type RemoteRunRef, type RemoteRunStatus } from 'src/remote/remote-ci.client';
import { errorMessage } from 'src/remote/remote.errors';
import { isTerminalRemoteState, mapRemoteState } from 'src/remote/remote-state';
import { parseRepositoryRef } from 'src/remote/repository-ref';
import { RunEventsService } from 'src/streaming/run-events.service';
import { PollLeaseService } from './poll-lease.service';
import { PollerRegistry } from './poller-registry.service';
import { assembleTranscript, diffSteps, settledSteps, type SeenStep } from './step-diff';

export type PollOutcome = 'completed' | 'timeout' | 'error' | 'cancelled' | 'lease_lost';

/** Everything one poll loop needs, resolved before it starts. */
export interface MonitorTarget {
  runId: string;
  pipelineId: string;
  /** Status persisted when monitoring began. */
  status: ExecutionStatus;
  ref: RemoteRunRef;
}

export class RunNotMonitorableError extends Error {
  constructor(readonly executionId: string, reason: string) {
    super(`Execution ${executionId} cannot be monitored: ${reason}`);
    this.name = 'RunNotMonitorableError';
  }
}

function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done);
  });
}

function parseCompletedOn(value: string | null): Date {
  const parsed = value ? new Date(value) : null;
  return parsed && !Number.isNaN(parsed.getTime()) ? parsed : new Date();
}

/**
 * Watches a remote run until it reaches a terminal state. Each iteration fetches the
 * run, emits what changed, and persists status changes before moving on.
 */
@Injectable()
export class StatusPollerService {
  private readonly logger = new Logger(StatusPollerService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly state: ExecutionStateService,
    @Inject(REMOTE_CI_CLIENT)
    private readonly client: RemoteCiClient,
    private readonly events: RunEventsService,
    private readonly registry: PollerRegistry,
    private readonly leases: PollLeaseService,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  /**
   * Start monitoring a run in the background. Returns false when the run is already
   * watched by this process or is already finished.
   */
  async start(runId: string): Promise<boolean> {
    const run = await this.state.findRun(runId);
    if (!run) throw new ExecutionNotFoundError(runId);
    const pipeline = await this.dataSource.getRepository(Pipeline).findOne({ where: { id: run.pipeline_id } });
    if (!pipeline) throw new PipelineNotFoundError(run.pipeline_id);
    return this.monitor(run, pipeline);
  }

  /** Synchronous variant for callers that already hold the rows. */
  monitor(run: ExecutionRun, pipeline: Pipeline): boolean {
    if (run.kind !== ExecutionKind.REMOTE || !run.remote_run_uuid) {
      throw new RunNotMonitorableError(run.id, 'it has no remote run');
    }
    if (isTerminal(run.status)) return false;

    const target: MonitorTarget = {
      runId: run.id,
      pipelineId: pipeline.id,
      status: run.status,
      ref: { ...parseRepositoryRef(pipeline.repository), runId: run.remote_run_uuid },
    };
    const started = this.registry.start(run.id, pipeline.id, (signal) => this.poll(target, signal));
    if (started) this.logger.log(`Monitoring run ${run.id} (remote ${run.remote_run_uuid})`);
    return started;
  }

  stop(runId: string): boolean {
    return this.registry.cancel(runId);
  }

  /**
   * The poll loop. Ends on a terminal remote state, after maxIterations fetches,
   * on a fetch error the retry policy does not absorb, on cancellation, or when the
   * lease goes to another process.
   */
  async poll(target: MonitorTarget, signal: AbortSignal): Promise<PollOutcome> {
    const { runId } = target;
    if (!(await this.leases.acquire(runId))) {
      this.logger.log(`Run ${runId} is polled elsewhere`);
      return 'lease_lost';
    }

    try {
      return await this.loop(target, signal);
    } finally {
      await this.leases.release(runId);
    }
  }

  private async loop(target: MonitorTarget, signal: AbortSignal): Promise<PollOutcome> {
    const { runId, pipelineId, ref } = target;
    const { intervalMs, maxIterations, fetchErrorRetries } = this.config.poll;

    let seen = new Map<string, SeenStep>();
    let status = target.status;
    let fetched = false;
    let consecutiveErrors = 0;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      if (signal.aborted) return 'cancelled';
      if (iteration > 1 && !(await this.leases.renew(runId))) {
        this.logger.warn(`Lost lease on run ${runId}; stopping`);
        return 'lease_lost';
      }

      let remote: RemoteRunStatus;
      try {
        remote = await this.client.fetchStatus(ref, { settledSteps: settledSteps(seen) });
      } catch (err) {
        if (signal.aborted) return 'cancelled';
        consecutiveErrors += 1;
        const message = errorMessage(err);
        this.logger.warn(`Status fetch for run ${runId} failed: ${message}`);
        this.events.emit({ type: 'poll_error', run_id: runId, pipeline_id: pipelineId, error: message });
        await this.state.recordError(runId, `Status poll failed: ${message}`);
        if (consecutiveErrors > fetchErrorRetries) return 'error';
        await waitOrAbort(intervalMs, signal);
        continue;
      }
      consecutiveErrors = 0;
      if (signal.aborted) return 'cancelled';

      const isFirst = !fetched;
      fetched = true;
      const diff = diffSteps(seen, remote.steps, isFirst);
      seen = diff.seen;

      const terminal = isTerminalRemoteState(remote.state);
      const next = mapRemoteState(remote.state) ?? status;
      if (isFirst || next !== status) {
        if (!terminal && next !== status) await this.state.transition(runId, next);
        this.events.emit({
          type: 'status_changed',
          run_id: runId,
          pipeline_id: pipelineId,
          status: next,
          previous_status: status,
          remote_state: remote.state,
        });
        status = next;
      }

      if (isFirst || diff.changed.length > 0) {
        this.events.emit({
          type: 'log_update',
          run_id: runId,
          pipeline_id: pipelineId,
          steps: diff.changed,
          overall_status: status,
        });
      }

      if (terminal) {
        await this.finish(target, remote, seen, status);
        return 'completed';
      }

      if (iteration < maxIterations) await waitOrAbort(intervalMs, signal);
    }

    this.logger.warn(`Gave up polling run ${runId} after ${maxIterations} fetches`);
    this.events.emit({ type: 'poll_timeout', run_id: runId, pipeline_id: pipelineId, iterations: maxIterations });
    return 'timeout';
  }

  private async finish(
    target: MonitorTarget,
    remote: RemoteRunStatus,
    seen: ReadonlyMap<string, SeenStep>,
    status: ExecutionStatus,
  ): Promise<void> {
    const outcome = status === ExecutionStatus.SUCCESS ? ExecutionStatus.SUCCESS : ExecutionStatus.FAILED;
    const run = await this.state.complete(target.runId, {
      status: outcome,
      logs: assembleTranscript(remote.steps, seen),
      durationSeconds: remote.durationSeconds,
      completedAt: parseCompletedOn(remote.completedOn),
      error: outcome === ExecutionStatus.FAILED ? `Remote run finished in state ${remote.state}` : null,
    });
    this.events.emit({
      type: 'run_complete',
      run_id: target.runId,
      pipeline_id: target.pipelineId,
      status: outcome,
      duration: run.duration_seconds,
    });
  }
}
