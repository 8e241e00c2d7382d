import { Injectable, Logger } from '@nestjs/common';
import { DataSource, In } from 'typeorm';
import { ExecutionRun } from 'src/database/entities/execution-run.entity';
import { Pipeline } from 'src/database/entities/pipeline.entity';
import {
  ExecutionKind,
  ExecutionStatus,
  IN_FLIGHT_STATUSES,
  TriggerType,
  canTransition,
  isTerminal,
  type TerminalStatus,
} from './execution-status';
import { ExecutionNotFoundError, InvalidTransitionError } from './execution.errors';

export interface RunOrigin {
  triggerType: TriggerType;
  branch: string | null;
  previousExecutionId?: string | null;
  rollbackReason?: string | null;
}

export interface RemoteRunIdentity {
  runId: string;
  buildNumber: number | null;
  commitHash: string | null;
}

export interface CompletionInput {
  status: TerminalStatus;
  logs: string;
  /** Wall-clock time reported by the backend; measured from started_at when absent. */
  durationSeconds?: number | null;
  completedAt?: Date;
  error?: string | null;
}

export interface TransitionResult {
  run: ExecutionRun;
  changed: boolean;
}

/**
 * Owns every write to execution_runs and the status mirror on pipelines. The mirror
 * follows the pipeline's most recently started run only. Terminal rows are never rewritten.
 */
@Injectable()
export class ExecutionStateService {
  private readonly logger = new Logger(ExecutionStateService.name);

  constructor(private readonly dataSource: DataSource) {}

  async findRun(runId: string): Promise<ExecutionRun | null> {
    return this.dataSource.getRepository(ExecutionRun).findOne({ where: { id: runId } });
  }

  async getRun(runId: string): Promise<ExecutionRun> {
    const run = await this.findRun(runId);
    if (!run) throw new ExecutionNotFoundError(runId);
    return run;
  }

  async listRuns(pipelineId?: string, limit = 100): Promise<ExecutionRun[]> {
    return this.dataSource.getRepository(ExecutionRun).find({
      where: pipelineId ? { pipeline_id: pipelineId } : undefined,
      order: { created_at: 'DESC' },
      take: limit,
    });
  }

  /** Remote runs still in flight; these are the ones a poller should be watching. */
  async listInFlightRemoteRuns(): Promise<ExecutionRun[]> {
    return this.dataSource.getRepository(ExecutionRun).find({
      where: { kind: ExecutionKind.REMOTE, status: In([...IN_FLIGHT_STATUSES]) },
      order: { created_at: 'ASC' },
    });
  }

  /** Latest successful remote run of a pipeline started before `before`, with a known commit. */
  async findLastSuccessBefore(pipelineId: string, before: Date, excludeId: string): Promise<ExecutionRun | null> {
    const runs = await this.dataSource.getRepository(ExecutionRun).find({
      where: { pipeline_id: pipelineId, kind: ExecutionKind.REMOTE, status: ExecutionStatus.SUCCESS },
      order: { started_at: 'DESC' },
    });
    return (
      runs.find(
        (run) => run.id !== excludeId && run.commit_hash !== null && run.started_at.getTime() <= before.getTime(),
      ) ?? null
    );
  }

  /** A run the backend accepted: BUILDING, with the remote identity attached. */
  async createLiveRun(
    pipeline: Pipeline,
    origin: RunOrigin,
    remote: RemoteRunIdentity,
    attempts: number,
  ): Promise<ExecutionRun> {
    return this.dataSource.transaction(async (em) => {
      const now = new Date();
      const run = em.getRepository(ExecutionRun).create({
        pipeline_id: pipeline.id,
        pipeline_version: pipeline.version,
        kind: ExecutionKind.REMOTE,
        status: ExecutionStatus.BUILDING,
        trigger_type: origin.triggerType,
        branch: origin.branch,
        remote_run_uuid: remote.runId,
        remote_build_number: remote.buildNumber,
        commit_hash: remote.commitHash,
        attempts,
        rolled_back: Boolean(origin.previousExecutionId),
        rollback_reason: origin.rollbackReason ?? null,
        previous_execution_id: origin.previousExecutionId ?? null,
        started_at: now,
      });
      const saved = await em.getRepository(ExecutionRun).save(run);
      await em.getRepository(Pipeline).update(
        { id: pipeline.id },
        { status: ExecutionStatus.BUILDING, last_execution_timestamp: now },
      );
      return saved;
    });
  }

  /** A sandbox dry run in progress. */
  async createLocalRun(pipeline: Pipeline, origin: RunOrigin): Promise<ExecutionRun> {
    return this.dataSource.transaction(async (em) => {
      const now = new Date();
      const run = em.getRepository(ExecutionRun).create({
        pipeline_id: pipeline.id,
        pipeline_version: pipeline.version,
        kind: ExecutionKind.LOCAL,
        status: ExecutionStatus.BUILDING,
        trigger_type: origin.triggerType,
        branch: origin.branch,
        started_at: now,
      });
      const saved = await em.getRepository(ExecutionRun).save(run);
      await em.getRepository(Pipeline).update(
        { id: pipeline.id },
        { status: ExecutionStatus.BUILDING, last_execution_timestamp: now },
      );
      return saved;
    });
  }

  /**
   * Record a trigger whose retries ran out. Takes no entity manager: it always commits on
   * its own transaction, so the failure survives a rollback of the caller's work.
   */
  async recordTriggerFailure(
    pipeline: Pipeline,
    origin: RunOrigin,
    error: string,
    attempts: number,
  ): Promise<ExecutionRun> {
    const saved = await this.dataSource.transaction(async (em) => {
      const now = new Date();
      const run = em.getRepository(ExecutionRun).create({
        pipeline_id: pipeline.id,
        pipeline_version: pipeline.version,
        kind: ExecutionKind.REMOTE,
        status: ExecutionStatus.FAILED,
        trigger_type: origin.triggerType,
        branch: origin.branch,
        error_message: error,
        attempts,
        rolled_back: Boolean(origin.previousExecutionId),
        rollback_reason: origin.rollbackReason ?? null,
        previous_execution_id: origin.previousExecutionId ?? null,
        started_at: now,
        completed_at: now,
        duration_seconds: 0,
      });
      const row = await em.getRepository(ExecutionRun).save(run);
      await em.getRepository(Pipeline).update(
        { id: pipeline.id },
        { status: ExecutionStatus.FAILED, last_execution_timestamp: now },
      );
      return row;
    });
    this.logger.warn(`Trigger of pipeline ${pipeline.id} failed after ${attempts} attempts: ${error}`);
    return saved;
  }

  /**
   * Move a non-terminal run to an intermediate status. Same-status calls are no-ops.
   * Terminal outcomes go through complete().
   */
  async transition(runId: string, next: ExecutionStatus): Promise<TransitionResult> {
    const run = await this.getRun(runId);
    if (run.status === next) return { run, changed: false };
    if (!canTransition(run.status, next)) throw new InvalidTransitionError(runId, run.status, next);
    if (isTerminal(next)) {
      const completed = await this.complete(runId, { status: next, logs: run.logs ?? '' });
      return { run: completed, changed: true };
    }

    const result = await this.dataSource
      .getRepository(ExecutionRun)
      .update({ id: runId, status: run.status }, { status: next });
    if (!result.affected) {
      // someone else moved it first; report what is stored now
      return { run: await this.getRun(runId), changed: false };
    }
    await this.mirrorPipeline(run, next);
    run.status = next;
    return { run, changed: true };
  }

  /** Note a failure without changing the status (poll errors, cancelled monitors). */
  async recordError(runId: string, message: string): Promise<void> {
    await this.dataSource.getRepository(ExecutionRun).update({ id: runId }, { error_message: message });
  }

  /**
   * Finish a run. Commits, in order: the full logs, then status with completed_at and
   * duration, then the pipeline mirror. Once a run is terminal, later calls return it unchanged.
   */
  async complete(runId: string, input: CompletionInput): Promise<ExecutionRun> {
    const repo = this.dataSource.getRepository(ExecutionRun);
    const run = await this.getRun(runId);
    if (isTerminal(run.status)) return run;

    await repo.update({ id: runId, status: In([...IN_FLIGHT_STATUSES]) }, { logs: input.logs });

    const completedAt = input.completedAt ?? new Date();
    const duration =
      input.durationSeconds ?? Math.max(0, Math.round((completedAt.getTime() - run.started_at.getTime()) / 1000));
    const result = await repo.update(
      { id: runId, status: In([...IN_FLIGHT_STATUSES]) },
      {
        status: input.status,
        completed_at: completedAt,
        duration_seconds: duration,
        error_message: input.status === ExecutionStatus.SUCCESS ? null : (input.error ?? run.error_message),
      },
    );
    if (!result.affected) return this.getRun(runId);

    await this.mirrorPipeline(run, input.status, completedAt);
    this.logger.log(`Execution ${runId} finished ${input.status} in ${duration}s`);
    return this.getRun(runId);
  }

  /** Newest run of the pipeline by start time; creation order breaks ties. */
  private async latestRunId(pipelineId: string): Promise<string | null> {
    const latest = await this.dataSource.getRepository(ExecutionRun).findOne({
      where: { pipeline_id: pipelineId },
      order: { started_at: 'DESC', created_at: 'DESC' },
    });
    return latest?.id ?? null;
  }

  private async mirrorPipeline(run: ExecutionRun, status: ExecutionStatus, at?: Date): Promise<void> {
    const latest = await this.latestRunId(run.pipeline_id);
    if (latest !== run.id) {
      this.logger.debug(`Execution ${run.id} is superseded by ${latest}; pipeline status left as is`);
      return;
    }
    await this.dataSource
      .getRepository(Pipeline)
      .update({ id: run.pipeline_id }, at ? { status, last_execution_timestamp: at } : { status });
  }
}
