import { Module } from '@nestjs/common';
import { BitbucketPipelinesClient } from './bitbucket-pipelines.client';
import { REMOTE_CI_CLIENT } from './remote-ci.client';

@Module({
  providers: [{ provide: REMOTE_CI_CLIENT, useClass: BitbucketPipelinesClient }],
  exports: [REMOTE_CI_CLIENT],
})
export class RemoteModule {}
