export type SandboxErrorCode =
  | 'CLONE_FAILED'
  | 'CONFIG_INVALID'
  | 'ENVIRONMENT_UNAVAILABLE'
  | 'STEP_FAILED'
  | 'RUN_TIMEOUT';

/** Base class for every way a sandbox run can fail. The runner turns these into a SandboxResult. */
export abstract class SandboxError extends Error {
  abstract readonly code: SandboxErrorCode;
  /** Step being executed when the failure happened, if any. */
  readonly stepName: string | null;

  protected constructor(message: string, stepName: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.stepName = stepName;
  }
}

export class CloneFailedError extends SandboxError {
  readonly code = 'CLONE_FAILED';

  constructor(
    readonly source: string,
    detail: string,
  ) {
    super(`Failed to clone repository ${source}: ${detail}`);
  }
}

export class ConfigInvalidError extends SandboxError {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly errors: string[]) {
    super(`Invalid pipeline definition: ${errors.join('; ')}`);
  }
}

export class EnvironmentUnavailableError extends SandboxError {
  readonly code = 'ENVIRONMENT_UNAVAILABLE';

  constructor(
    readonly image: string,
    detail: string,
    stepName: string | null = null,
  ) {
    super(`Execution environment ${image} unavailable: ${detail}`, stepName);
  }
}

export class StepFailedError extends SandboxError {
  readonly code = 'STEP_FAILED';

  constructor(
    stepName: string,
    readonly exitCode: number,
  ) {
    super(`Step "${stepName}" failed with exit code ${exitCode}`, stepName);
  }
}

export class RunTimeoutError extends SandboxError {
  readonly code = 'RUN_TIMEOUT';

  constructor(
    readonly scope: 'step' | 'run',
    readonly timeoutMs: number,
    stepName: string | null = null,
  ) {
    super(
      scope === 'step'
        ? `Step "${stepName}" exceeded ${timeoutMs}ms`
        : `Pipeline run exceeded ${timeoutMs}ms`,
      stepName,
    );
  }
}
