import { Module } from '@nestjs/common';
import { ExecutionsModule } from 'src/executions/executions.module';
import { MonitorModule } from 'src/monitor/monitor.module';
import { RemoteModule } from 'src/remote/remote.module';
import { TriggerService } from './trigger.service';

@Module({
  imports: [ExecutionsModule, MonitorModule, RemoteModule],
  providers: [TriggerService],
  exports: [TriggerService],
})
export class TriggersModule {}
