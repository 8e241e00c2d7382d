import type { ExecutionStatus, TerminalStatus } from 'src/executions/execution-status';

/** One changed step as it travels in a log_update event. */
export interface StepUpdate {
  name: string;
  /** Raw backend state of the step. */
  state: string;
  /** Engine status the step state maps to, null when the state is unknown. */
  status: ExecutionStatus | null;
  duration_seconds: number | null;
  log_preview: string;
}

interface RunEventBase {
  run_id: string;
  pipeline_id: string;
  timestamp: string;
}

export interface StatusChangedEvent extends RunEventBase {
  type: 'status_changed';
  status: ExecutionStatus;
  previous_status: ExecutionStatus;
  remote_state: string;
}

export interface LogUpdateEvent extends RunEventBase {
  type: 'log_update';
  steps: StepUpdate[];
  overall_status: ExecutionStatus;
}

export interface RunCompleteEvent extends RunEventBase {
  type: 'run_complete';
  status: TerminalStatus;
  duration: number | null;
}

export interface PollErrorEvent extends RunEventBase {
  type: 'poll_error';
  error: string;
}

export interface PollTimeoutEvent extends RunEventBase {
  type: 'poll_timeout';
  iterations: number;
}

export type RunEvent = StatusChangedEvent | LogUpdateEvent | RunCompleteEvent | PollErrorEvent | PollTimeoutEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event before the service stamps it. */
export type RunEventInput = DistributiveOmit<RunEvent, 'timestamp'>;
