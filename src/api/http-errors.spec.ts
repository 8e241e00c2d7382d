import { BadGatewayException, BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { PipelineNotFoundError, RollbackUnavailableError } from 'src/executions/execution.errors';
import { TriggerExhaustedError } from 'src/remote/remote.errors';
import { InvalidRepositoryError } from 'src/remote/repository-ref';
import { InvalidRetryCountError } from 'src/remote/retry';
import { mapErrors, toHttpException } from './http-errors';
import { ActivePipelineConflictError } from './pipelines/pipeline-conflict.error';

describe('toHttpException', () => {
  it('maps domain errors to HTTP exceptions', () => {
    expect(toHttpException(new PipelineNotFoundError('p1'))).toEqual(new NotFoundException('Pipeline p1 not found'));
    expect(toHttpException(new InvalidRepositoryError('x'))).toBeInstanceOf(BadRequestException);
    expect(toHttpException(new InvalidRetryCountError(Number.NaN))).toEqual(
      new BadRequestException('max_retries must be an integer between 0 and 10, got NaN'),
    );
    expect(toHttpException(new RollbackUnavailableError('nothing to roll back to'))).toBeInstanceOf(ConflictException);
    expect(toHttpException(new ActivePipelineConflictError('acme/web-app'))).toBeInstanceOf(ConflictException);
  });

  it('keeps the failed execution id of an exhausted trigger', () => {
    const mapped = toHttpException(new TriggerExhaustedError(4, 'HTTP 503', 'run-1'));
    expect(mapped).toBeInstanceOf(BadGatewayException);
    expect(mapped instanceof BadGatewayException && mapped.getResponse()).toEqual({
      message: 'Trigger failed after 4 attempts: HTTP 503',
      execution_id: 'run-1',
      attempts: 4,
    });
  });

  it('passes unknown errors through', async () => {
    const err = new Error('disk full');
    expect(toHttpException(err)).toBe(err);
    await expect(mapErrors(Promise.reject(err))).rejects.toBe(err);
  });
});
