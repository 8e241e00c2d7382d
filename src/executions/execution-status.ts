/**
 * Lifecycle of a pipeline and of each of its execution runs.
 * PLANNED is only held by pipelines (fresh or regenerated config); runs start at BUILDING.
 */
export enum ExecutionStatus {
  PLANNED = 'PLANNED',
  BUILDING = 'BUILDING',
  TESTING = 'TESTING',
  DEPLOYING = 'DEPLOYING',
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
}

export type TerminalStatus = ExecutionStatus.SUCCESS | ExecutionStatus.FAILED;

export enum TriggerType {
  MANUAL = 'manual',
  WEBHOOK = 'webhook',
  SCHEDULED = 'scheduled',
}

export enum ExecutionKind {
  /** Dry run in the local sandbox. */
  LOCAL = 'local',
  /** Run on the remote CI backend. */
  REMOTE = 'remote',
}

const TERMINAL: ReadonlySet<ExecutionStatus> = new Set([
  ExecutionStatus.SUCCESS,
  ExecutionStatus.FAILED,
]);

/** Statuses a live remote run can be in while a poller watches it. */
export const IN_FLIGHT_STATUSES: readonly ExecutionStatus[] = [
  ExecutionStatus.BUILDING,
  ExecutionStatus.TESTING,
  ExecutionStatus.DEPLOYING,
];

export function isTerminal(status: ExecutionStatus): status is TerminalStatus {
  return TERMINAL.has(status);
}

/**
 * A non-terminal state may move to any other state except PLANNED, in either
 * direction, since the remote backend can report phases out of order. Nothing leaves
 * a terminal state.
 */
export function canTransition(from: ExecutionStatus, to: ExecutionStatus): boolean {
  if (isTerminal(from)) return false;
  return to !== ExecutionStatus.PLANNED;
}

export function isExecutionStatus(value: unknown): value is ExecutionStatus {
  return Object.values(ExecutionStatus).some((status) => status === value);
}
