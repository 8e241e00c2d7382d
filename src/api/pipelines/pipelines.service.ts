import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { DataSource, Not, type EntityManager } from 'typeorm';
import { engineConfig } from 'src/config/engine.config';
import { ExecutionRun } from 'src/database/entities/execution-run.entity';
import { Pipeline } from 'src/database/entities/pipeline.entity';
import { PipelineVersion } from 'src/database/entities/pipeline-version.entity';
import { parsePipelineDefinition } from 'src/definitions/pipeline-definition';
import { ExecutionStateService } from 'src/executions/execution-state.service';
import { ExecutionStatus, TriggerType } from 'src/executions/execution-status';
import { PipelineNotFoundError } from 'src/executions/execution.errors';
import { PollerRegistry } from 'src/monitor/poller-registry.service';
import { parseRepositoryRef } from 'src/remote/repository-ref';
import { ConfigInvalidError } from 'src/sandbox/sandbox.errors';
import { SandboxRunnerService, type SandboxResult } from 'src/sandbox/sandbox-runner.service';
import { ActivePipelineConflictError, isUniqueViolation } from './pipeline-conflict.error';
import { PipelineInputError } from './pipeline-input.error';

export interface CreatePipelineInput {
  name: string;
  repository: string;
  config: string;
  repository_url?: string | null;
  deployment_server?: string | null;
  environment_variables?: Record<string, string> | null;
  activate?: boolean;
}

export interface PipelineParameters {
  name?: string;
  repository_url?: string | null;
  deployment_server?: string | null;
  environment_variables?: Record<string, string> | null;
}

export interface DryRunReport {
  success: boolean;
  output: string;
  error: string | null;
  error_code: string | null;
  failing_step: string | null;
  execution: ExecutionRun;
}

function requireText(value: unknown, field: string, errors: string[]): string {
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push(`${field} is required`);
    return '';
  }
  return value.trim();
}

@Injectable()
export class PipelinesService {
  private readonly logger = new Logger(PipelinesService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly state: ExecutionStateService,
    private readonly sandbox: SandboxRunnerService,
    private readonly pollers: PollerRegistry,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Pipeline> {
    const pipeline = await this.repo.findOne({ where: { id } });
    if (!pipeline) throw new PipelineNotFoundError(id);
    return pipeline;
  }

  async findActiveByRepository(repository: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { repository, is_active: true }, order: { updated_at: 'DESC' } });
  }

  /** Stores the definition as version 1. Activating supersedes the repository's other pipelines. */
  async create(input: CreatePipelineInput): Promise<Pipeline> {
    const errors: string[] = [];
    const name = requireText(input.name, 'name', errors);
    const repository = requireText(input.repository, 'repository', errors);
    const config = requireText(input.config, 'config', errors);
    if (repository) {
      try {
        parseRepositoryRef(repository);
      } catch (err) {
        errors.push(err instanceof Error ? err.message : String(err));
      }
    }
    if (config) this.checkDefinition(config, errors);
    if (errors.length) throw new PipelineInputError(errors);

    const activate = input.activate !== false;
    const saved = await this.activation(repository, () =>
      this.dataSource.transaction(async (em) => {
        if (activate) await this.deactivateOthers(em, repository, null);
        const pipeline = await em.getRepository(Pipeline).save(
          em.getRepository(Pipeline).create({
            name,
            repository,
            config,
            version: 1,
            status: ExecutionStatus.PLANNED,
            is_active: activate,
            repository_url: input.repository_url ?? null,
            deployment_server: input.deployment_server ?? null,
            environment_variables: input.environment_variables ?? null,
          }),
        );
        await em.getRepository(PipelineVersion).insert({ pipeline_id: pipeline.id, version: 1, config });
        return pipeline;
      }),
    );
    this.logger.log(`Created pipeline ${saved.id} for ${repository}`);
    return saved;
  }

  async updateParameters(id: string, params: PipelineParameters): Promise<Pipeline> {
    const pipeline = await this.findOne(id);
    if (params.name !== undefined) {
      const errors: string[] = [];
      pipeline.name = requireText(params.name, 'name', errors);
      if (errors.length) throw new PipelineInputError(errors);
    }
    if (params.repository_url !== undefined) pipeline.repository_url = params.repository_url;
    if (params.deployment_server !== undefined) pipeline.deployment_server = params.deployment_server;
    if (params.environment_variables !== undefined) pipeline.environment_variables = params.environment_variables;
    return this.repo.save(pipeline);
  }

  /**
   * Replace the definition. The old text stays in pipeline_versions; the pipeline
   * goes back to PLANNED and loses its last dry-run result.
   */
  async updateConfig(id: string, config: string): Promise<Pipeline> {
    const errors: string[] = [];
    const text = requireText(config, 'config', errors);
    if (text) this.checkDefinition(text, errors);
    if (errors.length) throw new PipelineInputError(errors);

    return this.dataSource.transaction(async (em) => {
      const pipeline = await em.getRepository(Pipeline).findOne({ where: { id } });
      if (!pipeline) throw new PipelineNotFoundError(id);
      const version = pipeline.version + 1;
      await em.getRepository(PipelineVersion).insert({ pipeline_id: id, version, config: text });
      Object.assign(pipeline, {
        config: text,
        version,
        status: ExecutionStatus.PLANNED,
        test_output: null,
        error_message: null,
      });
      return em.getRepository(Pipeline).save(pipeline);
    });
  }

  async listVersions(id: string): Promise<PipelineVersion[]> {
    await this.findOne(id);
    return this.dataSource.getRepository(PipelineVersion).find({
      where: { pipeline_id: id },
      order: { version: 'DESC' },
    });
  }

  async activate(id: string): Promise<Pipeline> {
    const { repository } = await this.findOne(id);
    return this.activation(repository, () =>
      this.dataSource.transaction(async (em) => {
        const pipeline = await em.getRepository(Pipeline).findOne({ where: { id } });
        if (!pipeline) throw new PipelineNotFoundError(id);
        await this.deactivateOthers(em, pipeline.repository, pipeline.id);
        pipeline.is_active = true;
        return em.getRepository(Pipeline).save(pipeline);
      }),
    );
  }

  /** A concurrent activation in the same repository surfaces as a unique violation. */
  private async activation<T>(repository: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (isUniqueViolation(err)) throw new ActivePipelineConflictError(repository);
      throw err;
    }
  }

  /** Stops any poller still watching one of its runs, then deletes pipeline, versions and runs. */
  async remove(id: string): Promise<void> {
    await this.findOne(id);
    const cancelled = this.pollers.cancelForPipeline(id);
    if (cancelled) this.logger.log(`Stopped ${cancelled} poller(s) of pipeline ${id}`);
    await this.repo.delete({ id });
  }

  async listRuns(id: string, limit?: number): Promise<ExecutionRun[]> {
    await this.findOne(id);
    return this.state.listRuns(id, limit);
  }

  /**
   * Dry run in the local sandbox. Recorded as a LOCAL execution; the transcript and
   * outcome are also kept on the pipeline.
   */
  async test(id: string): Promise<DryRunReport> {
    const pipeline = await this.findOne(id);
    const execution = await this.state.createLocalRun(pipeline, { triggerType: TriggerType.MANUAL, branch: null });

    const parsed = parsePipelineDefinition(pipeline.config, { defaultImage: this.config.sandbox.defaultImage });
    const result: SandboxResult = parsed.ok
      ? await this.sandbox.run(parsed.value, { source: pipeline.repository_url })
      : this.invalidDefinition(parsed.errors);

    const finished = await this.state.complete(execution.id, {
      status: result.success ? ExecutionStatus.SUCCESS : ExecutionStatus.FAILED,
      logs: result.combinedOutput,
      error: result.error,
    });
    await this.repo.update({ id }, { test_output: result.combinedOutput, error_message: result.error });

    return {
      success: result.success,
      output: result.combinedOutput,
      error: result.error,
      error_code: result.errorCode,
      failing_step: result.failingStepName,
      execution: finished,
    };
  }

  private checkDefinition(config: string, errors: string[]): void {
    const parsed = parsePipelineDefinition(config, { defaultImage: this.config.sandbox.defaultImage });
    if (!parsed.ok) errors.push(...parsed.errors);
  }

  private invalidDefinition(errors: string[]): SandboxResult {
    const error = new ConfigInvalidError(errors);
    return {
      success: false,
      combinedOutput: '',
      failingStepName: null,
      error: error.message,
      errorCode: error.code,
      steps: [],
    };
  }

  private async deactivateOthers(em: EntityManager, repository: string, keepId: string | null): Promise<void> {
    await em
      .getRepository(Pipeline)
      .update(keepId ? { repository, is_active: true, id: Not(keepId) } : { repository, is_active: true }, {
        is_active: false,
      });
  }
}
