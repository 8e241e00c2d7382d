import { Module } from '@nestjs/common';
import { ExecutionStateService } from './execution-state.service';

@Module({
  providers: [ExecutionStateService],
  exports: [ExecutionStateService],
})
export class ExecutionsModule {}
