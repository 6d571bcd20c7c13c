/**
 * End-to-end walk through the user routes on one service instance.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createApp } from '../src/http/app.js';
import { startServer, RunningServer } from '../src/http/server.js';
import { UserStore } from '../src/store/user-store.js';

describe('user lifecycle', () => {
  let running: RunningServer;

  beforeAll(async () => {
    const app = createApp({ store: new UserStore(), service: { name: 'user-health-api', version: 'test' } });
    running = await startServer(app, '127.0.0.1', 0);
  });

  afterAll(async () => {
    await running.close();
  });

  it('creates, reads, deletes and then misses a user', async () => {
    const created = await fetch(`${running.url}/users`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ name: 'Ann', email: 'ann@x.com' })
    });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ id: 1, name: 'Ann', email: 'ann@x.com' });

    const fetched = await fetch(`${running.url}/users/1`);
    expect(fetched.status).toBe(200);
    expect(await fetched.json()).toEqual({ id: 1, name: 'Ann', email: 'ann@x.com' });

    const deleted = await fetch(`${running.url}/users/1`, { method: 'DELETE' });
    expect(deleted.status).toBe(200);
    expect(await deleted.json()).toEqual({ deleted: 1 });

    const missing = await fetch(`${running.url}/users/1`);
    expect(missing.status).toBe(404);

    const health = await fetch(`${running.url}/health`);
    expect(health.status).toBe(200);
    expect(await health.json()).toEqual({ status: 'ok' });
  });

  it('keeps counting ids after a delete', async () => {
    const res = await fetch(`${running.url}/users`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ name: 'Bob', email: 'bob@x.com' })
    });

    expect(await res.json()).toEqual({ id: 2, name: 'Bob', email: 'bob@x.com' });

    const list = await fetch(`${running.url}/users`);
    expect(await list.json()).toEqual([{ id: 2, name: 'Bob', email: 'bob@x.com' }]);
  });
});
