import { Module } from '@nestjs/common';
import { ExecutionsModule } from 'src/executions/executions.module';
import { MonitorModule } from 'src/monitor/monitor.module';
import { SandboxModule } from 'src/sandbox/sandbox.module';
import { TriggersModule } from 'src/triggers/triggers.module';
import { PipelinesController } from './pipelines.controller';
import { PipelinesService } from './pipelines.service';

@Module({
  imports: [ExecutionsModule, MonitorModule, SandboxModule, TriggersModule],
  controllers: [PipelinesController],
  providers: [PipelinesService],
  exports: [PipelinesService],
})
export class PipelinesModule {}
