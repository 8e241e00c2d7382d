import { ExecutionStatus } from './execution-status';

export class ExecutionNotFoundError extends Error {
  constructor(readonly executionId: string) {
    super(`Execution ${executionId} not found`);
    this.name = 'ExecutionNotFoundError';
  }
}

export class PipelineNotFoundError extends Error {
  constructor(readonly pipelineId: string) {
    super(`Pipeline ${pipelineId} not found`);
    this.name = 'PipelineNotFoundError';
  }
}

/** Attempt to move a run out of a terminal state, or back to PLANNED. */
export class InvalidTransitionError extends Error {
  constructor(
    readonly executionId: string,
    readonly from: ExecutionStatus,
    readonly to: ExecutionStatus,
  ) {
    super(`Execution ${executionId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class RollbackUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RollbackUnavailableError';
  }
}
