import { Module } from '@nestjs/common';
import { SandboxRunnerService } from './sandbox-runner.service';
import { DockerEnvironmentProvider } from './docker-environment.provider';
import { LocalWorkspaceProvider } from './local-workspace.provider';
import { SANDBOX_ENVIRONMENT_PROVIDER, WORKSPACE_PROVIDER } from './sandbox-environment';

@Module({
  providers: [
    SandboxRunnerService,
    { provide: SANDBOX_ENVIRONMENT_PROVIDER, useFactory: () => new DockerEnvironmentProvider() },
    { provide: WORKSPACE_PROVIDER, useClass: LocalWorkspaceProvider },
  ],
  exports: [SandboxRunnerService],
})
export class SandboxModule {}
