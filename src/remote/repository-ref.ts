export interface RepositoryRef {
  workspace: string;
  repo: string;
}

export class InvalidRepositoryError extends Error {
  constructor(readonly repository: string) {
    super(`Repository "${repository}" is not of the form workspace/slug`);
    this.name = 'InvalidRepositoryError';
  }
}

/** Split a `workspace/slug` identifier. Surrounding slashes and whitespace are ignored. */
export function parseRepositoryRef(repository: string): RepositoryRef {
  const parts = repository.trim().replace(/^\/+|\/+$/g, '').split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) throw new InvalidRepositoryError(repository);
  return { workspace: parts[0], repo: parts[1] };
}
