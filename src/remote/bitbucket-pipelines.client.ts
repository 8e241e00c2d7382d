import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { engineConfig } from 'src/config/engine.config';
import { RemoteRequestError, TransientRemoteError, errorMessage } from './remote.errors';
import type {
  FetchStatusOptions,
  RemoteCiClient,
  RemoteRunRef,
  RemoteRunStatus,
  RemoteStepStatus,
  RemoteTriggerResult,
  TriggerTarget,
} from './remote-ci.client';

type Json = Record<string, unknown>;

interface SendOptions {
  method?: string;
  body?: string;
  accept?: string;
}

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function num(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Bitbucket reports `COMPLETED` plus a result; fold the result in so a failed run
 * surfaces as FAILED/STOPPED/ERROR rather than COMPLETED.
 */
export function readState(state: unknown): string {
  if (!isRecord(state)) return 'UNKNOWN';
  const name = str(state.name) ?? 'UNKNOWN';
  const result = isRecord(state.result) ? str(state.result.name) : null;
  if (name === 'COMPLETED' && result && result !== 'SUCCESSFUL') return result;
  return name;
}

/**
 * Bitbucket Pipelines REST client (api.bitbucket.org/2.0).
 * 429, 5xx and network faults are TransientRemoteError; other 4xx are RemoteRequestError.
 */
@Injectable()
export class BitbucketPipelinesClient implements RemoteCiClient {
  private readonly logger = new Logger(BitbucketPipelinesClient.name);

  constructor(
    @Inject(engineConfig.KEY)
    private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async trigger(workspace: string, repo: string, target: TriggerTarget): Promise<RemoteTriggerResult> {
    const body = {
      target: {
        type: 'pipeline_ref_target',
        ref_type: 'branch',
        ref_name: target.branch,
        ...(target.commit ? { commit: { type: 'commit', hash: target.commit } } : {}),
      },
    };

    const data = await this.requestJson(`${this.repoPath(workspace, repo)}/pipelines/`, {
      method: 'POST',
      body: JSON.stringify(body),
    });

    const runId = str(data.uuid);
    if (!runId) throw new RemoteRequestError('Trigger response carried no pipeline uuid', 502);

    const targetInfo = isRecord(data.target) ? data.target : {};
    const commit = isRecord(targetInfo.commit) ? str(targetInfo.commit.hash) : null;

    return {
      runId,
      buildNumber: num(data.build_number),
      state: readState(data.state),
      commitHash: commit ?? target.commit ?? null,
    };
  }

  async fetchStatus(ref: RemoteRunRef, options: FetchStatusOptions = {}): Promise<RemoteRunStatus> {
    const base = `${this.repoPath(ref.workspace, ref.repo)}/pipelines/${encodeURIComponent(ref.runId)}`;
    const [run, stepsPage] = await Promise.all([
      this.requestJson(base),
      this.requestJson(`${base}/steps/?pagelen=100`),
    ]);

    const values = Array.isArray(stepsPage.values) ? stepsPage.values.filter(isRecord) : [];
    const steps = await Promise.all(
      values.map(async (step, index): Promise<RemoteStepStatus> => {
        const name = str(step.name) ?? `Step ${index + 1}`;
        const state = readState(step.state);
        const status: RemoteStepStatus = {
          name,
          state,
          durationSeconds: num(step.duration_in_seconds),
        };
        const stepId = str(step.uuid);
        if (stepId && !options.settledSteps?.has(name)) {
          status.log = await this.fetchLog(`${base}/steps/${encodeURIComponent(stepId)}/log`);
        }
        return status;
      }),
    );

    return {
      state: readState(run.state),
      steps,
      completedOn: str(run.completed_on),
      durationSeconds: num(run.duration_in_seconds),
    };
  }

  /** Step logs 404 until the step starts producing output. */
  private async fetchLog(url: string): Promise<string> {
    const res = await this.send(url, { accept: 'text/plain' });
    if (res.status === 404) return '';
    await this.ensureOk(res, url);
    return res.text();
  }

  private repoPath(workspace: string, repo: string): string {
    return `${this.config.ci.apiUrl}/repositories/${encodeURIComponent(workspace)}/${encodeURIComponent(repo)}`;
  }

  private async requestJson(url: string, init: SendOptions = {}): Promise<Json> {
    const res = await this.send(url, init);
    await this.ensureOk(res, url);
    const data: unknown = await res.json();
    if (!isRecord(data)) throw new TransientRemoteError(`Unexpected response body from ${url}`);
    return data;
  }

  private async send(url: string, { method = 'GET', body, accept = 'application/json' }: SendOptions): Promise<Response> {
    try {
      return await fetch(url, {
        method,
        body,
        headers: {
          Authorization: `Bearer ${this.config.ci.token}`,
          'Content-Type': 'application/json',
          Accept: accept,
        },
      });
    } catch (err) {
      throw new TransientRemoteError(`Request to ${url} failed: ${errorMessage(err)}`);
    }
  }

  private async ensureOk(res: Response, url: string): Promise<void> {
    if (res.ok) return;
    const detail = (await res.text().catch(() => '')).slice(0, 500);
    const message = `HTTP ${res.status} from ${url}${detail ? `: ${detail}` : ''}`;
    if (res.status === 429 || res.status >= 500) {
      this.logger.warn(message);
      throw new TransientRemoteError(message, res.status);
    }
    throw new RemoteRequestError(message, res.status);
  }
}
