import { BadRequestException } from '@nestjs/common';
import type { TriggerRunDto } from 'src/dto/trigger-run.dto';
import { triggerOptionsFrom } from './pipelines.controller';

function body(json: string): TriggerRunDto {
  return JSON.parse(json);
}

describe('triggerOptionsFrom', () => {
  it('passes a well-formed body through', () => {
    expect(triggerOptionsFrom(body('{"branch":" release ","retry":true,"max_retries":2,"monitor":false}'))).toEqual({
      branch: 'release',
      retry: true,
      maxRetries: 2,
      monitor: false,
    });
  });

  it('leaves every option unset for an empty body', () => {
    expect(triggerOptionsFrom(body('{}'))).toEqual({
      branch: undefined,
      retry: undefined,
      maxRetries: undefined,
      monitor: undefined,
    });
  });

  it('rejects a retry count that is not a small non-negative integer', () => {
    for (const value of ['"abc"', '-1', '1.5', '1000000']) {
      expect(() => triggerOptionsFrom(body(`{"max_retries":${value}}`))).toThrow(BadRequestException);
    }
  });

  it('lists every invalid field', () => {
    const error = (() => {
      try {
        triggerOptionsFrom(body('{"retry":"yes","monitor":1,"branch":"","max_retries":"abc"}'));
      } catch (err) {
        return err;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(BadRequestException);
    expect(error instanceof BadRequestException && error.getResponse()).toEqual({
      statusCode: 400,
      error: 'Bad Request',
      message: [
        'retry must be a boolean',
        'monitor must be a boolean',
        'branch must be a non-empty string',
        'max_retries must be an integer between 0 and 10, got abc',
      ],
    });
  });
});
