import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildServer } from '../src/server';
import { InMemoryStore } from '../src/store';

class UnreachableStore extends InMemoryStore {
  async ping(): Promise<void> {
    throw new Error('connection refused');
  }
}

describe('ops health endpoints', () => {
  let app = buildServer({ storage: 'memory', reminderPollSec: 0 });

  beforeEach(async () => {
    app = buildServer({ storage: 'memory', reminderPollSec: 0 });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('returns ok for healthz and readyz', async () => {
    const health = await request(app.server).get('/healthz');
    expect(health.status).toBe(200);
    expect(health.body.code).toBe(0);
    expect(health.body.data.status).toBe('ok');
    expect(typeof health.body.data.uptime_sec).toBe('number');

    const ready = await request(app.server).get('/readyz');
    expect(ready.status).toBe(200);
    expect(ready.body.code).toBe(0);
    expect(ready.body.data.status).toBe('ready');
  });

  it('reports the store as unavailable when it cannot be reached', async () => {
    const degraded = buildServer({ reminderPollSec: 0, store: new UnreachableStore() });
    await degraded.ready();

    const ready = await request(degraded.server).get('/readyz');
    const health = await request(degraded.server).get('/healthz');
    await degraded.close();

    expect(ready.status).toBe(503);
    expect(ready.body).toEqual({ code: 50301, message: 'Store unavailable' });
    expect(health.status).toBe(200);
  });
});
