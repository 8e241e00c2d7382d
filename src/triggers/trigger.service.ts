import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { engineConfig } from 'src/config/engine.config';
import { ExecutionRun } from 'src/database/entities/execution-run.entity';
import { Pipeline } from 'src/database/entities/pipeline.entity';
import { ExecutionStateService, type RunOrigin } from 'src/executions/execution-state.service';
import { ExecutionKind, TriggerType, isTerminal } from 'src/executions/execution-status';
import { PipelineNotFoundError, RollbackUnavailableError } from 'src/executions/execution.errors';
import { StatusPollerService } from 'src/monitor/status-poller.service';
import { REMOTE_CI_CLIENT, type RemoteCiClient, type RemoteTriggerResult } from 'src/remote/remote-ci.client';
import { TriggerExhaustedError, errorMessage } from 'src/remote/remote.errors';
import { parseRepositoryRef } from 'src/remote/repository-ref';
import { RetryFailedError, checkRetryCount, withRetry, type RetryOutcome } from 'src/remote/retry';

export const DEFAULT_BRANCH = 'main';

export interface TriggerOptions {
  branch?: string;
  commit?: string | null;
  triggerType?: TriggerType;
  /** Retry transient failures with backoff (default true). */
  retry?: boolean;
  /** Overrides the configured retry count. */
  maxRetries?: number;
  /** Start a poller once the run is live (default true). */
  monitor?: boolean;
  previousExecutionId?: string | null;
  rollbackReason?: string | null;
}

/**
 * Starts remote runs. A trigger that exhausts its retries still leaves a FAILED run
 * behind before the error reaches the caller.
 */
@Injectable()
export class TriggerService {
  private readonly logger = new Logger(TriggerService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly state: ExecutionStateService,
    private readonly poller: StatusPollerService,
    @Inject(REMOTE_CI_CLIENT)
    private readonly client: RemoteCiClient,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async trigger(pipelineId: string, options: TriggerOptions = {}): Promise<ExecutionRun> {
    const pipeline = await this.dataSource.getRepository(Pipeline).findOne({ where: { id: pipelineId } });
    if (!pipeline) throw new PipelineNotFoundError(pipelineId);
    return this.triggerPipeline(pipeline, options);
  }

  async triggerPipeline(pipeline: Pipeline, options: TriggerOptions = {}): Promise<ExecutionRun> {
    const { workspace, repo } = parseRepositoryRef(pipeline.repository);
    const branch = options.branch ?? DEFAULT_BRANCH;
    const origin: RunOrigin = {
      triggerType: options.triggerType ?? TriggerType.MANUAL,
      branch,
      previousExecutionId: options.previousExecutionId ?? null,
      rollbackReason: options.rollbackReason ?? null,
    };

    // invalid counts reject before any run is recorded
    const maxRetries =
      options.retry === false ? 0 : checkRetryCount(options.maxRetries ?? this.config.trigger.maxRetries);

    let outcome: RetryOutcome<RemoteTriggerResult>;
    try {
      outcome = await withRetry(() => this.client.trigger(workspace, repo, { branch, commit: options.commit }), {
        maxRetries,
        retry: options.retry,
        baseDelayMs: this.config.trigger.retryBaseMs,
        onRetry: (retry, delayMs, err) =>
          this.logger.warn(
            `Trigger of ${pipeline.repository} failed (${errorMessage(err)}); retry ${retry} in ${delayMs}ms`,
          ),
      });
    } catch (err) {
      const attempts = err instanceof RetryFailedError ? err.attempts : 1;
      const message = err instanceof RetryFailedError ? errorMessage(err.lastError) : errorMessage(err);
      const failed = await this.state.recordTriggerFailure(pipeline, origin, message, attempts);
      throw new TriggerExhaustedError(attempts, message, failed.id);
    }

    const { value: remote, attempts } = outcome;
    const run = await this.state.createLiveRun(
      pipeline,
      origin,
      { runId: remote.runId, buildNumber: remote.buildNumber, commitHash: remote.commitHash },
      attempts,
    );
    this.logger.log(`Triggered ${pipeline.repository}@${branch}: run ${run.id} (remote ${remote.runId})`);

    if (options.monitor !== false) this.poller.monitor(run, pipeline);
    return run;
  }

  /**
   * Re-run the last successful commit before `executionId` as a new run that points back
   * at the one it supersedes. The superseded run itself is left as it is.
   */
  async rollback(executionId: string, reason: string, options: Pick<TriggerOptions, 'monitor'> = {}): Promise<ExecutionRun> {
    const superseded = await this.state.getRun(executionId);
    if (superseded.kind !== ExecutionKind.REMOTE) {
      throw new RollbackUnavailableError(`Execution ${executionId} is not a remote run`);
    }
    if (!isTerminal(superseded.status)) {
      throw new RollbackUnavailableError(`Execution ${executionId} is still ${superseded.status}`);
    }

    const target = await this.state.findLastSuccessBefore(superseded.pipeline_id, superseded.started_at, superseded.id);
    if (!target || !target.commit_hash) {
      throw new RollbackUnavailableError(`No successful execution before ${executionId} to roll back to`);
    }

    this.logger.log(`Rolling back ${executionId} to commit ${target.commit_hash} (run ${target.id})`);
    return this.trigger(superseded.pipeline_id, {
      branch: target.branch ?? superseded.branch ?? DEFAULT_BRANCH,
      commit: target.commit_hash,
      triggerType: TriggerType.MANUAL,
      previousExecutionId: superseded.id,
      rollbackReason: reason,
      monitor: options.monitor,
    });
  }
}
