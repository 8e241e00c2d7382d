import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { engineConfig } from 'src/config/engine.config';
import { validateDefinition, type PipelineDefinition } from 'src/definitions/pipeline-definition';
import {
  ConfigInvalidError,
  EnvironmentUnavailableError,
  RunTimeoutError,
  SandboxError,
  StepFailedError,
  type SandboxErrorCode,
} from './sandbox.errors';
import {
  SANDBOX_ENVIRONMENT_PROVIDER,
  WORKSPACE_PROVIDER,
  buildStepScript,
  withWorkspace,
  type SandboxEnvironment,
  type SandboxEnvironmentProvider,
  type StepExecution,
  type WorkspaceProvider,
} from './sandbox-environment';

export interface StepOutcome {
  name: string;
  /** null when the step never produced an exit code (timeout, provisioning failure). */
  exitCode: number | null;
  durationMs: number;
}

export interface SandboxResult {
  success: boolean;
  /** Full transcript: every executed step under an `=== <name> ===` header. */
  combinedOutput: string;
  failingStepName: string | null;
  error: string | null;
  errorCode: SandboxErrorCode | null;
  steps: StepOutcome[];
}

export interface SandboxRunOptions {
  /** Local path or clonable URL used to seed the working copy. */
  source?: string | null;
}

export function stepHeader(name: string): string {
  return `=== ${name} ===`;
}

/**
 * Executes a pipeline definition locally: steps strictly in order, each in a fresh
 * environment over the same working copy, stopping at the first non-zero exit.
 * Never throws; every outcome is a SandboxResult.
 */
@Injectable()
export class SandboxRunnerService {
  private readonly logger = new Logger(SandboxRunnerService.name);

  constructor(
    @Inject(SANDBOX_ENVIRONMENT_PROVIDER)
    private readonly environments: SandboxEnvironmentProvider,
    @Inject(WORKSPACE_PROVIDER)
    private readonly workspaces: WorkspaceProvider,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async run(definition: PipelineDefinition, options: SandboxRunOptions = {}): Promise<SandboxResult> {
    const transcript: string[] = [];
    const outcomes: StepOutcome[] = [];

    const checked = validateDefinition(definition);
    if (!checked.ok) {
      return this.toFailure(new ConfigInvalidError(checked.errors), transcript, outcomes);
    }

    const { runTimeoutMs, stepTimeoutMs, cloneTimeoutMs } = this.config.sandbox;
    const deadline = Date.now() + runTimeoutMs;

    try {
      await withWorkspace(this.workspaces, options.source ?? null, cloneTimeoutMs, async (workspace) => {
        for (const step of definition.steps) {
          const remaining = deadline - Date.now();
          if (remaining <= 0) throw new RunTimeoutError('run', runTimeoutMs, step.name);

          const image = step.image ?? definition.image;
          const budget = Math.min(stepTimeoutMs, remaining);
          const scope = budget < stepTimeoutMs ? 'run' : 'step';
          transcript.push(stepHeader(step.name));

          const startedAt = Date.now();
          let execution: StepExecution;
          try {
            execution = await this.runStep(step.name, image, workspace.path, step.commands, budget, scope, runTimeoutMs);
          } catch (err) {
            outcomes.push({ name: step.name, exitCode: null, durationMs: Date.now() - startedAt });
            throw err;
          }
          outcomes.push({
            name: step.name,
            exitCode: execution.exitCode,
            durationMs: Date.now() - startedAt,
          });

          transcript.push(execution.output);
          if (execution.exitCode !== 0) throw new StepFailedError(step.name, execution.exitCode);
        }
      });
    } catch (err) {
      if (err instanceof SandboxError) return this.toFailure(err, transcript, outcomes);
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Unexpected sandbox failure: ${message}`);
      return {
        success: false,
        combinedOutput: transcript.join('\n'),
        failingStepName: outcomes.at(-1)?.name ?? null,
        error: `Unexpected error: ${message}`,
        errorCode: null,
        steps: outcomes,
      };
    }

    return {
      success: true,
      combinedOutput: transcript.join('\n'),
      failingStepName: null,
      error: null,
      errorCode: null,
      steps: outcomes,
    };
  }

  /**
   * Provision and run under one wall-clock budget, and always destroy the environment.
   * An environment that turns up after the budget ran out is destroyed on arrival.
   */
  private async runStep(
    name: string,
    image: string,
    workspacePath: string,
    commands: string[],
    budgetMs: number,
    scope: 'step' | 'run',
    runTimeoutMs: number,
  ): Promise<StepExecution> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new RunTimeoutError(scope, scope === 'step' ? budgetMs : runTimeoutMs, name));
        controller.abort();
      }, budgetMs);
    });

    const provisioning = this.environments
      .provision({ image, workspacePath, label: name })
      .catch((err: unknown) => {
        throw new EnvironmentUnavailableError(image, err instanceof Error ? err.message : String(err), name);
      });

    let environment: SandboxEnvironment | null = null;
    try {
      environment = await Promise.race([provisioning, timeout]);
      this.logger.log(`Step "${name}" running in ${environment.id}`);
      return await Promise.race([environment.run(buildStepScript(commands), controller.signal), timeout]);
    } catch (err) {
      if (!environment && err instanceof RunTimeoutError) this.discardLate(provisioning, name);
      throw err;
    } finally {
      clearTimeout(timer);
      if (environment) await this.destroyQuietly(environment);
    }
  }

  private discardLate(provisioning: Promise<SandboxEnvironment>, name: string): void {
    void provisioning.then(
      (environment) => this.destroyQuietly(environment),
      (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.debug(`Provisioning for "${name}" failed after its step timed out: ${message}`);
      },
    );
  }

  private async destroyQuietly(environment: SandboxEnvironment): Promise<void> {
    try {
      await environment.destroy();
    } catch (err) {
      this.logger.warn(
        `Failed to destroy environment ${environment.id}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private toFailure(err: SandboxError, transcript: string[], outcomes: StepOutcome[]): SandboxResult {
    this.logger.warn(err.message);
    return {
      success: false,
      combinedOutput: transcript.join('\n'),
      failingStepName: err.stepName,
      error: err.message,
      errorCode: err.code,
      steps: outcomes,
    };
  }
}
