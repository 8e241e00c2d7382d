import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { errorMessage } from 'src/remote/remote.errors';

const SHUTDOWN_GRACE_MS = 2000;

interface ActivePoller {
  pipelineId: string;
  controller: AbortController;
  done: Promise<void>;
}

export type PollTask = (signal: AbortSignal) => Promise<unknown>;

/**
 * Run id → live poller. start() is a synchronous check-and-set, so a run is never
 * watched twice by this process. Entries remove themselves when their task settles.
 */
@Injectable()
export class PollerRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(PollerRegistry.name);
  private readonly active = new Map<string, ActivePoller>();

  /** false when the run already has a poller here. */
  start(runId: string, pipelineId: string, task: PollTask): boolean {
    if (this.active.has(runId)) return false;

    const controller = new AbortController();
    const entry: ActivePoller = { pipelineId, controller, done: Promise.resolve() };
    this.active.set(runId, entry);

    entry.done = Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error(`Poller for run ${runId} crashed: ${errorMessage(err)}`);
        },
      )
      .finally(() => {
        if (this.active.get(runId) === entry) this.active.delete(runId);
      });
    return true;
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  activeRunIds(): string[] {
    return [...this.active.keys()];
  }

  /** Resolves once the run's poller has stopped; immediately if there is none. */
  async settled(runId: string): Promise<void> {
    await this.active.get(runId)?.done;
  }

  cancel(runId: string): boolean {
    const entry = this.active.get(runId);
    if (!entry) return false;
    entry.controller.abort();
    this.logger.log(`Cancelled poller for run ${runId}`);
    return true;
  }

  /** Cancel every poller watching a run of the pipeline; returns how many were stopped. */
  cancelForPipeline(pipelineId: string): number {
    let cancelled = 0;
    for (const [runId, entry] of this.active) {
      if (entry.pipelineId === pipelineId && this.cancel(runId)) cancelled += 1;
    }
    return cancelled;
  }

  async onModuleDestroy(): Promise<void> {
    const pending = [...this.active.values()];
    for (const entry of pending) entry.controller.abort();
    if (!pending.length) return;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, SHUTDOWN_GRACE_MS);
    });
    try {
      await Promise.race([Promise.all(pending.map((entry) => entry.done)), grace]);
    } finally {
      clearTimeout(timer);
    }
  }
}
