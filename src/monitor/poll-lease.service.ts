import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { PollLease } from 'src/database/entities/poll-lease.entity';
import { engineConfig } from 'src/config/engine.config';

/**
 * Row-level lease so that at most one process polls a given run. Claims are
 * compare-and-set on the version column; a lease past expires_at is up for grabs.
 */
@Injectable()
export class PollLeaseService {
  private readonly logger = new Logger(PollLeaseService.name);

  constructor(
    private readonly dataSource: DataSource,
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  get holder(): string {
    return this.config.instanceId;
  }

  /**
   * Claim or extend the lease for a run. Returns false if another live holder has it
   * or a concurrent claim won the race.
   */
  async acquire(runId: string): Promise<boolean> {
    const repo = this.dataSource.getRepository(PollLease);
    const now = new Date();
    const expiresAt = new Date(now.getTime() + this.config.poll.leaseTtlMs);

    const existing = await repo.findOne({ where: { run_id: runId } });
    if (!existing) {
      try {
        await repo.insert({ run_id: runId, holder: this.holder, expires_at: expiresAt });
        return true;
      } catch (err) {
        // lost the insert race; anything else is a real failure
        const winner = await repo.findOne({ where: { run_id: runId } });
        if (winner) return winner.holder === this.holder;
        throw err;
      }
    }

    if (existing.holder !== this.holder && existing.expires_at.getTime() > now.getTime()) {
      return false;
    }
    if (existing.holder !== this.holder) {
      this.logger.log(`Taking over expired lease on run ${runId} from ${existing.holder}`);
    }

    const result = await repo.update(
      { run_id: runId, version: existing.version },
      { holder: this.holder, expires_at: expiresAt, version: existing.version + 1 },
    );
    return (result.affected ?? 0) > 0;
  }

  /** Extend a lease this process already holds. */
  async renew(runId: string): Promise<boolean> {
    return this.acquire(runId);
  }

  async release(runId: string): Promise<void> {
    await this.dataSource.getRepository(PollLease).delete({ run_id: runId, holder: this.holder });
  }

  /** True when a holder other than this process has an unexpired lease. */
  async isHeldElsewhere(runId: string): Promise<boolean> {
    const lease = await this.dataSource.getRepository(PollLease).findOne({ where: { run_id: runId } });
    return !!lease && lease.holder !== this.holder && lease.expires_at.getTime() > Date.now();
  }
}
