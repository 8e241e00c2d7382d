import { ExecutionStatus } from 'src/executions/execution-status';

/**
 * Remote CI run/step state name → internal status. Anything not listed is unknown
 * and leaves the last known status in place.
 */
export const REMOTE_STATE_MAP: Readonly<Record<string, ExecutionStatus>> = {
  PENDING: ExecutionStatus.BUILDING,
  IN_PROGRESS: ExecutionStatus.BUILDING,
  RUNNING: ExecutionStatus.BUILDING,
  BUILDING: ExecutionStatus.BUILDING,
  TESTING: ExecutionStatus.TESTING,
  DEPLOYING: ExecutionStatus.DEPLOYING,
  COMPLETED: ExecutionStatus.SUCCESS,
  SUCCESSFUL: ExecutionStatus.SUCCESS,
  FAILED: ExecutionStatus.FAILED,
  STOPPED: ExecutionStatus.FAILED,
  ERROR: ExecutionStatus.FAILED,
  EXPIRED: ExecutionStatus.FAILED,
};

export const TERMINAL_REMOTE_STATES: ReadonlySet<string> = new Set([
  'COMPLETED',
  'SUCCESSFUL',
  'FAILED',
  'STOPPED',
  'ERROR',
  'EXPIRED',
]);

function normalize(state: string): string {
  return state.trim().toUpperCase();
}

export function mapRemoteState(state: string): ExecutionStatus | null {
  return REMOTE_STATE_MAP[normalize(state)] ?? null;
}

export function isTerminalRemoteState(state: string): boolean {
  return TERMINAL_REMOTE_STATES.has(normalize(state));
}
