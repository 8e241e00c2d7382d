import { registerAs } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { MAX_RETRIES } from 'src/remote/retry';

export interface EngineConfig {
  instanceId: string;
  ci: {
    apiUrl: string;
    token: string;
  };
  trigger: {
    maxRetries: number;
    retryBaseMs: number;
  };
  poll: {
    intervalMs: number;
    maxIterations: number;
    /** Consecutive fetch errors tolerated before the loop stops. 0 = stop on the first. */
    fetchErrorRetries: number;
    leaseTtlMs: number;
    sweepEnabled: boolean;
    sweepIntervalMs: number;
  };
  sandbox: {
    defaultImage: string;
    stepTimeoutMs: number;
    runTimeoutMs: number;
    cloneTimeoutMs: number;
  };
}

function int(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    instanceId: env.INSTANCE_ID || env.HOSTNAME || `engine-${randomUUID().slice(0, 8)}`,
    ci: {
      apiUrl: env.CI_API_URL ?? 'https://api.bitbucket.org/2.0',
      token: env.CI_API_TOKEN ?? '',
    },
    trigger: {
      maxRetries: Math.min(int(env.TRIGGER_MAX_RETRIES, 3), MAX_RETRIES),
      retryBaseMs: int(env.TRIGGER_RETRY_BASE_MS, 1000),
    },
    poll: {
      intervalMs: int(env.POLL_INTERVAL_MS, 5000),
      maxIterations: int(env.POLL_MAX_ITERATIONS, 120),
      fetchErrorRetries: int(env.POLL_FETCH_ERROR_RETRIES, 0),
      leaseTtlMs: int(env.POLL_LEASE_TTL_MS, 30_000),
      sweepEnabled: env.RUN_MONITOR_SWEEP === 'true',
      sweepIntervalMs: int(env.MONITOR_SWEEP_INTERVAL_MS, 15_000),
    },
    sandbox: {
      defaultImage: env.SANDBOX_DEFAULT_IMAGE ?? 'atlassian/default-image:3',
      stepTimeoutMs: int(env.SANDBOX_STEP_TIMEOUT_MS, 300_000),
      runTimeoutMs: int(env.SANDBOX_RUN_TIMEOUT_MS, 1_800_000),
      cloneTimeoutMs: int(env.SANDBOX_CLONE_TIMEOUT_MS, 300_000),
    },
  };
}

export const engineConfig = registerAs('engine', () => loadEngineConfig());
