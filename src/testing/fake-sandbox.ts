import type {
  ProvisionRequest,
  SandboxEnvironment,
  SandboxEnvironmentProvider,
  StepExecution,
  Workspace,
  WorkspaceProvider,
} from 'src/sandbox/sandbox-environment';

export type ScriptedStep =
  | { exitCode: number; output: string }
  /** Never finishes on its own; resolves with exit 137 once aborted. */
  | 'hang';

/**
 * In-process stand-in for the container runtime. Each provisioned environment takes the
 * next scripted behaviour and records what happened to it.
 */
export class FakeEnvironmentProvider implements SandboxEnvironmentProvider {
  readonly provisioned: ProvisionRequest[] = [];
  readonly scripts: string[] = [];
  readonly destroyed: string[] = [];
  readonly aborted: string[] = [];
  failProvisionWith: Error | null = null;
  /** While set, provisioning waits for it; a promise that never settles models a hung pull. */
  provisionGate: Promise<void> | null = null;

  constructor(private readonly behaviours: ScriptedStep[] = []) {}

  async provision(request: ProvisionRequest): Promise<SandboxEnvironment> {
    if (this.failProvisionWith) throw this.failProvisionWith;
    if (this.provisionGate) await this.provisionGate;
    const index = this.provisioned.length;
    this.provisioned.push(request);
    const behaviour = this.behaviours[index] ?? { exitCode: 0, output: '' };
    const id = `env-${index}-${request.label}`;

    return {
      id,
      run: (script: string, signal: AbortSignal): Promise<StepExecution> => {
        this.scripts.push(script);
        if (behaviour !== 'hang') return Promise.resolve(behaviour);
        return new Promise((resolve) => {
          signal.addEventListener('abort', () => {
            this.aborted.push(id);
            resolve({ exitCode: 137, output: '' });
          });
        });
      },
      destroy: async () => {
        this.destroyed.push(id);
      },
    };
  }
}

export class FakeWorkspaceProvider implements WorkspaceProvider {
  readonly acquired: Array<string | null> = [];
  released = 0;
  failWith: Error | null = null;
  failReleaseWith: Error | null = null;

  async acquire(source: string | null): Promise<Workspace> {
    if (this.failWith) throw this.failWith;
    this.acquired.push(source);
    return {
      path: '/tmp/fake-workspace',
      release: async () => {
        this.released += 1;
        if (this.failReleaseWith) throw this.failReleaseWith;
      },
    };
  }
}
