import { Module } from '@nestjs/common';
import { GitWebhookController } from './git-webhook.controller';
import { PipelinesModule } from 'src/api/pipelines/pipelines.module';
import { TriggersModule } from 'src/triggers/triggers.module';

@Module({
  imports: [PipelinesModule, TriggersModule],
  controllers: [GitWebhookController],
})
export class WebhooksModule {}
