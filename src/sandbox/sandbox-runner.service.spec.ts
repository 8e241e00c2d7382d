import { SandboxRunnerService } from './sandbox-runner.service';
import { CloneFailedError } from './sandbox.errors';
import { FakeEnvironmentProvider, FakeWorkspaceProvider, type ScriptedStep } from 'src/testing/fake-sandbox';
import { testEngineConfig } from 'src/testing/engine-config';
import type { PipelineDefinition } from 'src/definitions/pipeline-definition';

function definition(...names: string[]): PipelineDefinition {
  return {
    image: 'node:20',
    steps: names.map((name) => ({ name, commands: [`echo ${name}`] })),
  };
}

describe('SandboxRunnerService', () => {
  let workspaces: FakeWorkspaceProvider;

  beforeEach(() => {
    workspaces = new FakeWorkspaceProvider();
  });

  function runner(steps: ScriptedStep[], sandbox = {}) {
    const environments = new FakeEnvironmentProvider(steps);
    const service = new SandboxRunnerService(environments, workspaces, testEngineConfig({ sandbox }));
    return { service, environments };
  }

  it('runs every step in declared order and reports success', async () => {
    const { service, environments } = runner([
      { exitCode: 0, output: 'installed\n' },
      { exitCode: 0, output: 'built\n' },
      { exitCode: 0, output: 'tested\n' },
    ]);

    const result = await service.run(definition('install', 'build', 'test'), { source: '/src/app' });

    expect(result).toEqual({
      success: true,
      combinedOutput: '=== install ===\ninstalled\n\n=== build ===\nbuilt\n\n=== test ===\ntested\n',
      failingStepName: null,
      error: null,
      errorCode: null,
      steps: [
        expect.objectContaining({ name: 'install', exitCode: 0 }),
        expect.objectContaining({ name: 'build', exitCode: 0 }),
        expect.objectContaining({ name: 'test', exitCode: 0 }),
      ],
    });
    expect(environments.provisioned.map((p) => p.label)).toEqual(['install', 'build', 'test']);
    expect(environments.provisioned.every((p) => p.workspacePath === '/tmp/fake-workspace')).toBe(true);
    expect(workspaces.acquired).toEqual(['/src/app']);
  });

  it('stops at the first failing step and never starts the next one', async () => {
    const { service, environments } = runner([
      { exitCode: 0, output: 'ok' },
      { exitCode: 1, output: 'deploy blew up' },
      { exitCode: 0, output: 'never' },
    ]);

    const result = await service.run(definition('build', 'deploy', 'notify'));

    expect(result.success).toBe(false);
    expect(result.failingStepName).toBe('deploy');
    expect(result.errorCode).toBe('STEP_FAILED');
    expect(result.error).toBe('Step "deploy" failed with exit code 1');
    expect(result.combinedOutput).toContain('=== build ===');
    expect(result.combinedOutput).toContain('=== deploy ===');
    expect(result.combinedOutput).not.toContain('=== notify ===');
    expect(environments.provisioned).toHaveLength(2);
  });

  it('destroys each environment and releases the workspace whatever happens', async () => {
    const { service, environments } = runner([
      { exitCode: 0, output: '' },
      { exitCode: 2, output: '' },
    ]);

    await service.run(definition('build', 'deploy'));

    expect(environments.destroyed).toEqual(['env-0-build', 'env-1-deploy']);
    expect(workspaces.released).toBe(1);
  });

  it('fails validation without provisioning anything for an empty definition', async () => {
    const { service, environments } = runner([]);

    const result = await service.run({ image: 'node:20', steps: [] });

    expect(result).toEqual({
      success: false,
      combinedOutput: '',
      failingStepName: null,
      error: 'Invalid pipeline definition: Pipeline has no steps',
      errorCode: 'CONFIG_INVALID',
      steps: [],
    });
    expect(environments.provisioned).toHaveLength(0);
    expect(workspaces.acquired).toHaveLength(0);
  });

  it('fails validation for a step without commands', async () => {
    const { service, environments } = runner([]);

    const result = await service.run({ image: 'node:20', steps: [{ name: 'build', commands: [] }] });

    expect(result.errorCode).toBe('CONFIG_INVALID');
    expect(environments.provisioned).toHaveLength(0);
  });

  it('uses the step image when one is given', async () => {
    const { service, environments } = runner([]);

    await service.run({
      image: 'node:20',
      steps: [
        { name: 'a', commands: ['true'] },
        { name: 'b', commands: ['true'], image: 'python:3.12' },
      ],
    });

    expect(environments.provisioned.map((p) => p.image)).toEqual(['node:20', 'python:3.12']);
  });

  it('runs the commands under set -e', async () => {
    const { service, environments } = runner([]);

    await service.run({ image: 'node:20', steps: [{ name: 'a', commands: ['npm ci', 'npm test'] }] });

    expect(environments.scripts).toEqual(['#!/bin/sh\nset -e\nnpm ci\nnpm test\n']);
  });

  it('reports an unavailable environment', async () => {
    const { service, environments } = runner([]);
    environments.failProvisionWith = new Error('pull access denied');

    const result = await service.run(definition('build'));

    expect(result.errorCode).toBe('ENVIRONMENT_UNAVAILABLE');
    expect(result.failingStepName).toBe('build');
    expect(result.error).toBe('Execution environment node:20 unavailable: pull access denied');
    expect(result.combinedOutput).toBe('=== build ===');
    expect(workspaces.released).toBe(1);
  });

  it('reports a clone failure before any step runs', async () => {
    const { service, environments } = runner([]);
    workspaces.failWith = new CloneFailedError('https://git.example.test/app.git', 'not found');

    const result = await service.run(definition('build'), { source: 'https://git.example.test/app.git' });

    expect(result.errorCode).toBe('CLONE_FAILED');
    expect(result.error).toBe('Failed to clone repository https://git.example.test/app.git: not found');
    expect(result.failingStepName).toBeNull();
    expect(environments.provisioned).toHaveLength(0);
  });

  it('times out a hanging step, aborts it and still tears it down', async () => {
    const { service, environments } = runner([{ exitCode: 0, output: 'ok' }, 'hang'], {
      stepTimeoutMs: 20,
    });

    const result = await service.run(definition('build', 'wait-forever', 'deploy'));

    expect(result.errorCode).toBe('RUN_TIMEOUT');
    expect(result.failingStepName).toBe('wait-forever');
    expect(result.error).toBe('Step "wait-forever" exceeded 20ms');
    expect(environments.aborted).toEqual(['env-1-wait-forever']);
    expect(environments.destroyed).toEqual(['env-0-build', 'env-1-wait-forever']);
    expect(environments.provisioned).toHaveLength(2);
    expect(result.steps[1]).toEqual(expect.objectContaining({ name: 'wait-forever', exitCode: null }));
  });

  it('applies the whole-run deadline to the step in progress', async () => {
    const { service } = runner(['hang'], { stepTimeoutMs: 60_000, runTimeoutMs: 20 });

    const result = await service.run(definition('slow'));

    expect(result.errorCode).toBe('RUN_TIMEOUT');
    expect(result.error).toBe('Pipeline run exceeded 20ms');
  });

  it('bounds a provisioning step that never finishes by the step timeout', async () => {
    const { service, environments } = runner([], { stepTimeoutMs: 20 });
    environments.provisionGate = new Promise<void>(() => undefined);

    const result = await service.run(definition('build', 'deploy'));

    expect(result).toEqual({
      success: false,
      combinedOutput: '=== build ===',
      failingStepName: 'build',
      error: 'Step "build" exceeded 20ms',
      errorCode: 'RUN_TIMEOUT',
      steps: [expect.objectContaining({ name: 'build', exitCode: null })],
    });
    expect(workspaces.released).toBe(1);
  });

  it('bounds provisioning by the whole-run deadline', async () => {
    const { service, environments } = runner([], { stepTimeoutMs: 60_000, runTimeoutMs: 20 });
    environments.provisionGate = new Promise<void>(() => undefined);

    const result = await service.run(definition('build'));

    expect(result.errorCode).toBe('RUN_TIMEOUT');
    expect(result.error).toBe('Pipeline run exceeded 20ms');
  });

  it('destroys an environment that arrives after its step timed out', async () => {
    const { service, environments } = runner([{ exitCode: 0, output: 'late' }], { stepTimeoutMs: 20 });
    let openGate = () => {};
    environments.provisionGate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const result = await service.run(definition('build'));
    expect(result.errorCode).toBe('RUN_TIMEOUT');
    expect(environments.destroyed).toEqual([]);

    openGate();
    await new Promise((resolve) => setImmediate(resolve));

    expect(environments.provisioned.map((p) => p.label)).toEqual(['build']);
    expect(environments.destroyed).toEqual(['env-0-build']);
    expect(environments.scripts).toEqual([]);
  });

  it('keeps a passing result when the workspace cannot be removed', async () => {
    const { service } = runner([{ exitCode: 0, output: 'ok' }]);
    workspaces.failReleaseWith = new Error('EACCES: permission denied, rmdir');

    const result = await service.run(definition('build'));

    expect(result).toEqual({
      success: true,
      combinedOutput: '=== build ===\nok',
      failingStepName: null,
      error: null,
      errorCode: null,
      steps: [expect.objectContaining({ name: 'build', exitCode: 0 })],
    });
    expect(workspaces.released).toBe(1);
  });

  it('keeps the step failure when the workspace cannot be removed', async () => {
    const { service } = runner([{ exitCode: 3, output: 'broken' }]);
    workspaces.failReleaseWith = new Error('EACCES: permission denied, rmdir');

    const result = await service.run(definition('build'));

    expect(result.errorCode).toBe('STEP_FAILED');
    expect(result.error).toBe('Step "build" failed with exit code 3');
  });
});
