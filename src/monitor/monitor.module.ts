import { Module } from '@nestjs/common';
import { ExecutionsModule } from 'src/executions/executions.module';
import { RemoteModule } from 'src/remote/remote.module';
import { StreamingModule } from 'src/streaming/streaming.module';
import { MonitorSweepService } from './monitor-sweep.service';
import { PollLeaseService } from './poll-lease.service';
import { PollerRegistry } from './poller-registry.service';
import { StatusPollerService } from './status-poller.service';

@Module({
  imports: [ExecutionsModule, RemoteModule, StreamingModule],
  providers: [PollerRegistry, PollLeaseService, StatusPollerService, MonitorSweepService],
  exports: [StatusPollerService, PollerRegistry],
})
export class MonitorModule {}
