/**
 * Outcome of validating user-supplied input. Validation problems are returned, not thrown,
 * so callers can record them without going through exception paths.
 */
export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

export function valid<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function invalid<T>(...errors: string[]): ValidationResult<T> {
  return { ok: false, errors };
}
