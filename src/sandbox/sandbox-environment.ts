import { Logger } from '@nestjs/common';

const logger = new Logger('Workspace');

/** Injection token for the SandboxEnvironmentProvider implementation. */
export const SANDBOX_ENVIRONMENT_PROVIDER = Symbol('SANDBOX_ENVIRONMENT_PROVIDER');
/** Injection token for the WorkspaceProvider implementation. */
export const WORKSPACE_PROVIDER = Symbol('WORKSPACE_PROVIDER');

export interface StepExecution {
  exitCode: number;
  /** Interleaved stdout/stderr of the step. */
  output: string;
}

/** One isolated, single-use environment (a container) bound to the shared working copy. */
export interface SandboxEnvironment {
  readonly id: string;
  /** Runs the script to completion. Aborting the signal must stop the process. */
  run(script: string, signal: AbortSignal): Promise<StepExecution>;
  /** Tears the environment down. Safe to call after a failed or aborted run. */
  destroy(): Promise<void>;
}

export interface ProvisionRequest {
  image: string;
  workspacePath: string;
  /** Human-readable label, used for naming. */
  label: string;
}

export interface SandboxEnvironmentProvider {
  provision(request: ProvisionRequest): Promise<SandboxEnvironment>;
}

export interface Workspace {
  readonly path: string;
  release(): Promise<void>;
}

export interface WorkspaceProvider {
  /** Creates an empty working copy, seeded from `source` (local path or clonable URL) when given. */
  acquire(source: string | null, cloneTimeoutMs: number): Promise<Workspace>;
}

/**
 * Scoped acquisition: the workspace is released on every exit path of `fn`. A failed
 * release is logged and never replaces the result of `fn`.
 */
export async function withWorkspace<T>(
  provider: WorkspaceProvider,
  source: string | null,
  cloneTimeoutMs: number,
  fn: (workspace: Workspace) => Promise<T>,
): Promise<T> {
  const workspace = await provider.acquire(source, cloneTimeoutMs);
  try {
    return await fn(workspace);
  } finally {
    try {
      await workspace.release();
    } catch (err) {
      logger.warn(`Failed to release workspace ${workspace.path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

/** Shell script for one step: stop at the first failing command. */
export function buildStepScript(commands: string[]): string {
  return ['#!/bin/sh', 'set -e', ...commands, ''].join('\n');
}
