import { InvalidArgumentError } from 'commander';
import type { HealthStatus } from '../types/schemas.js';
import { DEFAULT_PORT } from '../config/schema.js';

export interface HealthcheckOptions {
  url?: string;
  port?: string;
  timeout: number;
  json: boolean;
}

export interface HealthcheckResult {
  url: string;
  ok: boolean;
  status: number | null;
  error: string | null;
}

export const DEFAULT_TIMEOUT_MS = 3000;

/**
 * commander argParser for `--timeout`.
 */
export function parseTimeout(value: string): number {
  const trimmed = value.trim();
  if (!/^[1-9][0-9]*$/.test(trimmed)) {
    throw new InvalidArgumentError('Timeout must be a positive integer in milliseconds.');
  }
  return Number(trimmed);
}

export function resolveHealthUrl(options: Pick<HealthcheckOptions, 'url' | 'port'>): string {
  if (options.url) {
    // Relative to the base so a path prefix such as /api survives
    const base = options.url.endsWith('/') ? options.url : `${options.url}/`;
    return new URL('health', base).toString();
  }
  const port = options.port ?? process.env.PORT ?? String(DEFAULT_PORT);
  return `http://127.0.0.1:${port}/health`;
}

function isHealthStatus(value: unknown): value is HealthStatus {
  return typeof value === 'object' && value !== null && 'status' in value && value.status === 'ok';
}

/**
 * Probe GET /health once. Never throws; failures land in `error`.
 */
export async function checkHealth(url: string, timeoutMs: number): Promise<HealthcheckResult> {
  const result: HealthcheckResult = { url, ok: false, status: null, error: null };

  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    result.status = response.status;
    if (response.status !== 200) {
      result.error = `Unexpected status ${response.status}`;
      return result;
    }
    const body: unknown = await response.json();
    if (!isHealthStatus(body)) {
      result.error = `Unexpected body: ${JSON.stringify(body)}`;
      return result;
    }
    result.ok = true;
  } catch (err) {
    result.error = err instanceof Error ? err.message : String(err);
  }

  return result;
}

export async function healthcheckCommand(options: HealthcheckOptions): Promise<HealthcheckResult> {
  const result = await checkHealth(resolveHealthUrl(options), options.timeout);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.ok) {
    console.log(`Health: OK (${result.url})`);
  } else {
    console.log(`Health: FAIL (${result.url}) - ${result.error}`);
  }

  if (!result.ok) {
    process.exitCode = 1;
  }
  return result;
}
