import { Injectable, Logger } from '@nestjs/common';
import Docker from 'dockerode';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type {
  ProvisionRequest,
  SandboxEnvironment,
  SandboxEnvironmentProvider,
  StepExecution,
} from './sandbox-environment';

const MOUNT_PATH = '/workspace';
const SCRIPT_NAME = '.pipeline-step.sh';
const CONTAINER_PREFIX = 'pipeline-sandbox-';

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err) {
    const { statusCode } = err;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }
  return undefined;
}

function slug(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9_.-]+/g, '-').slice(0, 40);
}

class DockerEnvironment implements SandboxEnvironment {
  private readonly logger = new Logger(DockerEnvironment.name);

  constructor(
    private readonly container: Docker.Container,
    private readonly workspacePath: string,
  ) {}

  get id(): string {
    return this.container.id;
  }

  async run(script: string, signal: AbortSignal): Promise<StepExecution> {
    await writeFile(join(this.workspacePath, SCRIPT_NAME), script, { mode: 0o755 });

    const onAbort = () => {
      this.container.kill().catch((err: unknown) => {
        // Already exited; destroy() removes it either way
        this.logger.debug(`kill ${this.id}: ${err instanceof Error ? err.message : String(err)}`);
      });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      await this.container.start();
      const result: { StatusCode?: number } = await this.container.wait();
      const logs = await this.container.logs({ stdout: true, stderr: true, follow: false });
      return { exitCode: result.StatusCode ?? 1, output: logs.toString('utf8') };
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  async destroy(): Promise<void> {
    try {
      await this.container.remove({ force: true });
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }
  }
}

/**
 * One throwaway container per step, with the run's working copy bind-mounted at /workspace.
 * Images are pulled on first use.
 */
@Injectable()
export class DockerEnvironmentProvider implements SandboxEnvironmentProvider {
  private readonly logger = new Logger(DockerEnvironmentProvider.name);
  private readonly docker: Docker;

  constructor(dockerOptions?: Docker.DockerOptions) {
    this.docker = new Docker(dockerOptions);
  }

  async provision({ image, workspacePath, label }: ProvisionRequest): Promise<SandboxEnvironment> {
    await this.ensureImage(image);

    const container = await this.docker.createContainer({
      name: `${CONTAINER_PREFIX}${slug(label)}-${randomUUID().slice(0, 8)}`,
      Image: image,
      Cmd: ['/bin/sh', `${MOUNT_PATH}/${SCRIPT_NAME}`],
      WorkingDir: MOUNT_PATH,
      Tty: true,
      HostConfig: {
        Binds: [`${workspacePath}:${MOUNT_PATH}:rw`],
        AutoRemove: false,
      },
    });
    this.logger.debug(`Created container ${container.id} (${image}) for ${label}`);
    return new DockerEnvironment(container, workspacePath);
  }

  private async ensureImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }

    this.logger.log(`Pulling image ${image}`);
    const stream: NodeJS.ReadableStream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (progressErr: Error | null) => {
        if (progressErr) return reject(progressErr);
        resolve();
      });
    });
  }
}
