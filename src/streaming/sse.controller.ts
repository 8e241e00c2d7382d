import { Controller, MessageEvent, Param, ParseUUIDPipe, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import type { RunEvent } from './run-events';
import { RunEventsService } from './run-events.service';

function toMessage(ev: RunEvent): MessageEvent {
  return { type: ev.type, data: ev };
}

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly events: RunEventsService) {}

  /**
   * SSE room for one pipeline: status changes, step diffs and completion of all its runs.
   * GET /stream/pipelines/:pipelineId
   */
  @Sse('pipelines/:pipelineId')
  @ApiOperation({ summary: 'SSE: monitoring events for every run of a pipeline' })
  streamPipeline(@Param('pipelineId', ParseUUIDPipe) pipelineId: string): Observable<MessageEvent> {
    return this.events.forPipeline(pipelineId).pipe(map(toMessage));
  }

  @Sse('runs/:runId')
  @ApiOperation({ summary: 'SSE: monitoring events for one run' })
  streamRun(@Param('runId', ParseUUIDPipe) runId: string): Observable<MessageEvent> {
    return this.events.forRun(runId).pipe(map(toMessage));
  }
}
