import { Injectable } from '@nestjs/common';
import { ExecutionRun } from 'src/database/entities/execution-run.entity';
import { ExecutionStateService } from 'src/executions/execution-state.service';
import { StatusPollerService } from 'src/monitor/status-poller.service';
import { PollerRegistry } from 'src/monitor/poller-registry.service';
import { TriggerService } from 'src/triggers/trigger.service';
import {
  filterLogsByLevel,
  filterLogsByText,
  paginateLogs,
  splitLines,
  summarizeExecutionLogs,
  type LogPage,
  type LogSummary,
} from 'src/common/logs/log-utils';

export interface LogQuery {
  search?: string;
  level?: string;
  page?: number;
  perPage?: number;
}

export interface RunLogs extends LogPage {
  execution_id: string;
  status: ExecutionRun['status'];
  summary: LogSummary;
}

export interface MonitorState {
  execution_id: string;
  monitoring: boolean;
}

/**
 * Run lookups, stored logs, and monitor control.
 */
@Injectable()
export class RunsService {
  constructor(
    private readonly state: ExecutionStateService,
    private readonly poller: StatusPollerService,
    private readonly registry: PollerRegistry,
    private readonly triggers: TriggerService,
  ) {}

  async findAll(pipelineId?: string): Promise<ExecutionRun[]> {
    return this.state.listRuns(pipelineId);
  }

  async findOne(runId: string): Promise<ExecutionRun> {
    return this.state.getRun(runId);
  }

  /** Filters apply before pagination; the summary always covers the whole transcript. */
  async getLogs(runId: string, query: LogQuery = {}): Promise<RunLogs> {
    const run = await this.state.getRun(runId);
    const lines = filterLogsByLevel(filterLogsByText(splitLines(run.logs), query.search), query.level);
    return {
      execution_id: run.id,
      status: run.status,
      summary: summarizeExecutionLogs(run.logs),
      ...paginateLogs(lines, query.page, query.perPage),
    };
  }

  async startMonitor(runId: string): Promise<MonitorState> {
    await this.poller.start(runId);
    return { execution_id: runId, monitoring: this.registry.isActive(runId) };
  }

  async stopMonitor(runId: string): Promise<MonitorState> {
    await this.state.getRun(runId);
    this.poller.stop(runId);
    await this.registry.settled(runId);
    return { execution_id: runId, monitoring: false };
  }

  async rollback(runId: string, reason: string): Promise<ExecutionRun> {
    return this.triggers.rollback(runId, reason);
  }
}
