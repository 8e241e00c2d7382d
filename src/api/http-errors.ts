import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import {
  ExecutionNotFoundError,
  InvalidTransitionError,
  PipelineNotFoundError,
  RollbackUnavailableError,
} from 'src/executions/execution.errors';
import { RunNotMonitorableError } from 'src/monitor/status-poller.service';
import { TriggerExhaustedError } from 'src/remote/remote.errors';
import { InvalidRepositoryError } from 'src/remote/repository-ref';
import { InvalidRetryCountError } from 'src/remote/retry';
import { ActivePipelineConflictError } from './pipelines/pipeline-conflict.error';
import { PipelineInputError } from './pipelines/pipeline-input.error';

/** Domain error → HTTP response. Anything unrecognised is passed through as a 500. */
export function toHttpException(err: unknown): unknown {
  if (err instanceof HttpException) return err;
  if (err instanceof PipelineNotFoundError || err instanceof ExecutionNotFoundError) {
    return new NotFoundException(err.message);
  }
  if (
    err instanceof PipelineInputError ||
    err instanceof InvalidRepositoryError ||
    err instanceof InvalidRetryCountError
  ) {
    return new BadRequestException(err.message);
  }
  if (
    err instanceof InvalidTransitionError ||
    err instanceof RollbackUnavailableError ||
    err instanceof RunNotMonitorableError ||
    err instanceof ActivePipelineConflictError
  ) {
    return new ConflictException(err.message);
  }
  if (err instanceof TriggerExhaustedError) {
    return new BadGatewayException({
      message: err.message,
      execution_id: err.executionId,
      attempts: err.attempts,
    });
  }
  return err;
}

export async function mapErrors<T>(work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    throw toHttpException(err);
  }
}
