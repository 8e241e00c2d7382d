import { Module } from '@nestjs/common';
import { ExecutionsModule } from 'src/executions/executions.module';
import { MonitorModule } from 'src/monitor/monitor.module';
import { TriggersModule } from 'src/triggers/triggers.module';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';

@Module({
  imports: [ExecutionsModule, MonitorModule, TriggersModule],
  controllers: [RunsController],
  providers: [RunsService],
})
export class RunsModule {}
