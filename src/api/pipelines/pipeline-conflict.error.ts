import { QueryFailedError } from 'typeorm';

/** Another pipeline of the repository became active while this one was being activated. */
export class ActivePipelineConflictError extends Error {
  constructor(readonly repository: string) {
    super(`Another pipeline of ${repository} was activated at the same time; retry the request`);
    this.name = 'ActivePipelineConflictError';
  }
}

/** Unique-constraint violation, as reported by the Postgres or SQLite driver. */
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof QueryFailedError)) return false;
  const { driverError } = err;
  const code =
    typeof driverError === 'object' && driverError !== null && 'code' in driverError ? driverError.code : null;
  return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}
