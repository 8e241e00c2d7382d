import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';
import { cp, mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CloneFailedError } from './sandbox.errors';
import type { Workspace, WorkspaceProvider } from './sandbox-environment';

async function isLocalDirectory(source: string): Promise<boolean> {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(source) || /^[^/]+@[^:]+:/.test(source)) return false;
  try {
    return (await stat(source)).isDirectory();
  } catch {
    return false;
  }
}

function gitClone(source: string, target: string, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn('git', ['clone', '--depth', '1', source, target], {
      timeout: timeoutMs,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });

    let stderr = '';
    child.stderr?.on('data', (buf: Buffer) => {
      stderr += buf.toString('utf8');
    });

    child.on('error', (err) => reject(new CloneFailedError(source, err.message)));
    child.on('close', (code, signal) => {
      if (code === 0) return resolve();
      const detail =
        signal !== null ? `timed out after ${timeoutMs}ms` : stderr.trim() || `git exited with ${code}`;
      reject(new CloneFailedError(source, detail));
    });
  });
}

/**
 * Temporary directory per sandbox run, seeded by copying a local directory or by a shallow git clone.
 */
@Injectable()
export class LocalWorkspaceProvider implements WorkspaceProvider {
  private readonly logger = new Logger(LocalWorkspaceProvider.name);

  async acquire(source: string | null, cloneTimeoutMs: number): Promise<Workspace> {
    const path = await mkdtemp(join(tmpdir(), 'pipeline-sandbox-'));
    const release = async () => {
      await rm(path, { recursive: true, force: true });
    };

    if (!source) return { path, release };

    try {
      if (await isLocalDirectory(source)) {
        await cp(source, path, { recursive: true });
      } else {
        this.logger.log(`Cloning ${source}`);
        await gitClone(source, path, cloneTimeoutMs);
      }
    } catch (err) {
      await release();
      if (err instanceof CloneFailedError) throw err;
      throw new CloneFailedError(source, err instanceof Error ? err.message : String(err));
    }

    return { path, release };
  }
}
