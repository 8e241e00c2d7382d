import type { RemoteStepStatus } from 'src/remote/remote-ci.client';
import { isTerminalRemoteState, mapRemoteState } from 'src/remote/remote-state';
import type { StepUpdate } from 'src/streaming/run-events';
import { stepHeader } from 'src/sandbox/sandbox-runner.service';

export const LOG_PREVIEW_LENGTH = 500;

/** What the poller remembers about a step between fetches. */
export interface SeenStep {
  state: string;
  durationSeconds: number | null;
  /** null until a log has been downloaded. */
  log: string | null;
}

export interface StepDiff {
  changed: StepUpdate[];
  seen: Map<string, SeenStep>;
}

function toUpdate(step: RemoteStepStatus, log: string | null): StepUpdate {
  return {
    name: step.name,
    state: step.state,
    status: mapRemoteState(step.state),
    duration_seconds: step.durationSeconds,
    log_preview: (log ?? '').slice(0, LOG_PREVIEW_LENGTH),
  };
}

/**
 * Compare a fresh step list with what was seen before. On the first fetch every step
 * counts as changed; afterwards only steps that are new or whose state moved.
 * A step that arrives without a log keeps the one already held.
 */
export function diffSteps(
  previous: ReadonlyMap<string, SeenStep>,
  current: readonly RemoteStepStatus[],
  isFirst: boolean,
): StepDiff {
  const seen = new Map(previous);
  const changed: StepUpdate[] = [];

  for (const step of current) {
    const before = previous.get(step.name);
    const log = step.log ?? before?.log ?? null;
    seen.set(step.name, { state: step.state, durationSeconds: step.durationSeconds, log });
    if (isFirst || !before || before.state !== step.state) changed.push(toUpdate(step, log));
  }

  return { changed, seen };
}

/** Steps whose logs are final: terminal state and already downloaded. */
export function settledSteps(seen: ReadonlyMap<string, SeenStep>): Set<string> {
  const names = new Set<string>();
  for (const [name, step] of seen) {
    if (step.log !== null && isTerminalRemoteState(step.state)) names.add(name);
  }
  return names;
}

/** Full run transcript, one `=== name ===` section per step in backend order. */
export function assembleTranscript(
  steps: readonly RemoteStepStatus[],
  seen: ReadonlyMap<string, SeenStep>,
): string {
  return steps
    .map((step) => `${stepHeader(step.name)}\n${step.log ?? seen.get(step.name)?.log ?? ''}`)
    .join('\n');
}
