import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { engineConfig } from 'src/config/engine.config';
import { ExecutionStateService } from 'src/executions/execution-state.service';
import { errorMessage } from 'src/remote/remote.errors';
import { PollLeaseService } from './poll-lease.service';
import { PollerRegistry } from './poller-registry.service';
import { StatusPollerService } from './status-poller.service';

/**
 * Reclaim loop: in-flight remote runs that nobody is polling (process restart, a
 * holder that died and let its lease expire) get a poller again.
 */
@Injectable()
export class MonitorSweepService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MonitorSweepService.name);
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly state: ExecutionStateService,
    private readonly poller: StatusPollerService,
    private readonly registry: PollerRegistry,
    private readonly leases: PollLeaseService,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  onModuleInit(): void {
    if (!this.config.poll.sweepEnabled) return;
    this.startSweepLoop(this.config.poll.sweepIntervalMs);
  }

  onModuleDestroy(): void {
    this.stopSweepLoop();
  }

  /** One pass; returns the ids of runs whose monitoring was resumed. */
  async sweepOnce(): Promise<string[]> {
    const resumed: string[] = [];
    for (const run of await this.state.listInFlightRemoteRuns()) {
      if (!run.remote_run_uuid || this.registry.isActive(run.id)) continue;
      if (await this.leases.isHeldElsewhere(run.id)) continue;
      try {
        if (await this.poller.start(run.id)) resumed.push(run.id);
      } catch (err) {
        this.logger.warn(`Could not resume monitoring of run ${run.id}: ${errorMessage(err)}`);
      }
    }
    if (resumed.length) this.logger.log(`Resumed monitoring of ${resumed.length} run(s)`);
    return resumed;
  }

  startSweepLoop(intervalMs: number): void {
    this.stopSweepLoop();
    this.sweepTimer = setInterval(() => {
      this.sweepOnce().catch((err: unknown) => {
        this.logger.error(`Monitor sweep failed: ${errorMessage(err)}`);
      });
    }, intervalMs);
  }

  stopSweepLoop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
