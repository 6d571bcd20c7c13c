import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import express from 'express';
import { createApp } from '../../http/app.js';
import { startServer, RunningServer } from '../../http/server.js';
import { UserStore } from '../../store/user-store.js';
import { InvalidArgumentError } from 'commander';
import { checkHealth, healthcheckCommand, parseTimeout, resolveHealthUrl } from '../healthcheck.js';

describe('healthcheck command', () => {
  let running: RunningServer | null = null;
  let originalExitCode: typeof process.exitCode;

  beforeEach(() => {
    originalExitCode = process.exitCode;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    process.exitCode = originalExitCode;
    vi.restoreAllMocks();
    if (running) {
      await running.close();
      running = null;
    }
  });

  describe('resolveHealthUrl', () => {
    it('appends /health to an explicit base URL', () => {
      expect(resolveHealthUrl({ url: 'http://svc.internal:5050' })).toBe('http://svc.internal:5050/health');
    });

    it('keeps a path prefix on the base URL', () => {
      expect(resolveHealthUrl({ url: 'http://proxy.internal/api' })).toBe('http://proxy.internal/api/health');
      expect(resolveHealthUrl({ url: 'http://proxy.internal/api/' })).toBe('http://proxy.internal/api/health');
    });

    it('targets loopback on the given port', () => {
      expect(resolveHealthUrl({ port: '5060' })).toBe('http://127.0.0.1:5060/health');
    });
  });

  describe('parseTimeout', () => {
    it('parses a positive integer', () => {
      expect(parseTimeout('2500')).toBe(2500);
    });

    it.each(['abc', '', '0', '-5', '1.5', '10ms'])('rejects %j', (value) => {
      expect(() => parseTimeout(value)).toThrow(InvalidArgumentError);
      expect(() => parseTimeout(value)).toThrow('Timeout must be a positive integer in milliseconds.');
    });
  });

  it('passes against a live service', async () => {
    const app = createApp({ store: new UserStore(), service: { name: 'svc', version: '1' } });
    running = await startServer(app, '127.0.0.1', 0);

    const result = await checkHealth(`${running.url}/health`, 2000);
    expect(result).toEqual({ url: `${running.url}/health`, ok: true, status: 200, error: null });
  });

  it('fails on a non-200 status', async () => {
    const app = express();
    app.get('/health', (_req, res) => {
      res.status(503).json({ status: 'down' });
    });
    running = await startServer(app, '127.0.0.1', 0);

    const result = await checkHealth(`${running.url}/health`, 2000);
    expect(result.ok).toBe(false);
    expect(result.status).toBe(503);
    expect(result.error).toBe('Unexpected status 503');
  });

  it('fails on an unexpected body', async () => {
    const app = express();
    app.get('/health', (_req, res) => {
      res.json({ status: 'degraded' });
    });
    running = await startServer(app, '127.0.0.1', 0);

    const result = await checkHealth(`${running.url}/health`, 2000);
    expect(result.ok).toBe(false);
    expect(result.error).toBe('Unexpected body: {"status":"degraded"}');
  });

  it('fails when nothing is listening', async () => {
    const app = express();
    const probe = await startServer(app, '127.0.0.1', 0);
    const url = `${probe.url}/health`;
    await probe.close();

    const result = await checkHealth(url, 2000);
    expect(result.ok).toBe(false);
    expect(result.status).toBeNull();
    expect(result.error).not.toBeNull();
  });

  it('sets a failing exit code and prints the failure', async () => {
    const app = express();
    app.get('/health', (_req, res) => {
      res.status(500).end();
    });
    running = await startServer(app, '127.0.0.1', 0);

    await healthcheckCommand({ url: running.url, timeout: 2000, json: false });

    expect(process.exitCode).toBe(1);
    expect(console.log).toHaveBeenCalledWith(`Health: FAIL (${running.url}/health) - Unexpected status 500`);
  });

  it('prints JSON on success', async () => {
    const app = createApp({ store: new UserStore(), service: { name: 'svc', version: '1' } });
    running = await startServer(app, '127.0.0.1', 0);

    const result = await healthcheckCommand({ url: running.url, timeout: 2000, json: true });

    expect(result.ok).toBe(true);
    expect(process.exitCode).toBe(originalExitCode);
    expect(console.log).toHaveBeenCalledWith(JSON.stringify(result, null, 2));
  });
});
