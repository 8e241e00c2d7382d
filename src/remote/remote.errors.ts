/**
 * A remote failure worth retrying: network faults, rate limiting, 5xx.
 * The retry wrapper only retries errors of this type.
 */
export class TransientRemoteError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'TransientRemoteError';
  }
}

/** The remote rejected the request (4xx other than 429). Retrying will not help. */
export class RemoteRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'RemoteRequestError';
  }
}

/** Raised to the caller once every trigger attempt failed and the FAILED run was recorded. */
export class TriggerExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: string,
    readonly executionId: string,
  ) {
    super(`Trigger failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError}`);
    this.name = 'TriggerExhaustedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
