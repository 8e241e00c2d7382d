import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import type { RunEvent, RunEventInput } from './run-events';

/**
 * In-process fan-out of monitoring events. Each pipeline id is a room; subscribers
 * only see the events of the room they joined. Nothing is buffered for late joiners.
 */
@Injectable()
export class RunEventsService implements OnModuleDestroy {
  private readonly logger = new Logger(RunEventsService.name);
  private readonly subject = new Subject<RunEvent>();

  emit(input: RunEventInput): RunEvent {
    const event: RunEvent = { ...input, timestamp: new Date().toISOString() };
    this.logger.debug(`${event.type} for run ${event.run_id}`);
    this.subject.next(event);
    return event;
  }

  all(): Observable<RunEvent> {
    return this.subject.asObservable();
  }

  forPipeline(pipelineId: string): Observable<RunEvent> {
    return this.subject.pipe(filter((ev) => ev.pipeline_id === pipelineId));
  }

  forRun(runId: string): Observable<RunEvent> {
    return this.subject.pipe(filter((ev) => ev.run_id === runId));
  }

  onModuleDestroy(): void {
    this.subject.complete();
  }
}
