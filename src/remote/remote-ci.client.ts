/** Injection token for the RemoteCiClient implementation. */
export const REMOTE_CI_CLIENT = Symbol('REMOTE_CI_CLIENT');

export interface TriggerTarget {
  branch: string;
  /** Pin the run to a commit on the branch (used by rollbacks). */
  commit?: string | null;
}

export interface RemoteTriggerResult {
  runId: string;
  buildNumber: number | null;
  state: string;
  commitHash: string | null;
}

/** Identifies one remote run. */
export interface RemoteRunRef {
  workspace: string;
  repo: string;
  runId: string;
}

export interface RemoteStepStatus {
  name: string;
  state: string;
  durationSeconds: number | null;
  /** Full log text. undefined when the caller asked to skip an already settled step. */
  log?: string;
}

export interface RemoteRunStatus {
  state: string;
  steps: RemoteStepStatus[];
  completedOn: string | null;
  durationSeconds: number | null;
}

export interface FetchStatusOptions {
  /** Step names whose logs the caller already holds in final form. */
  settledSteps?: ReadonlySet<string>;
}

/**
 * The two calls the engine needs from a remote CI backend.
 */
export interface RemoteCiClient {
  trigger(workspace: string, repo: string, target: TriggerTarget): Promise<RemoteTriggerResult>;
  fetchStatus(ref: RemoteRunRef, options?: FetchStatusOptions): Promise<RemoteRunStatus>;
}
