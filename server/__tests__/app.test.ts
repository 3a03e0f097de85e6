import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Storage } from '../db.js';
import { buildApp, createTestDatabase, type TestDatabase } from './helpers.js';

describe('application', () => {
  let database: TestDatabase;

  beforeAll(async () => {
    database = await createTestDatabase();
  });

  afterAll(async () => {
    await database.storage.close();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports a healthy database', async () => {
    const res = await request(buildApp(database.storage)).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.database).toBe('ok');
    expect(res.body.responseTime).toMatch(/^\d+ms$/);
  });

  it('reports 503 when the database cannot be reached', async () => {
    const unreachable: Storage = {
      withSession: () => Promise.reject(new Error('connect ECONNREFUSED')),
      ensureSchema: () => Promise.resolve(),
      close: () => Promise.resolve(),
    };
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(buildApp(unreachable)).get('/health');

    expect(res.status).toBe(503);
    expect(res.body.database).toBe('error');
  });

  it('answers unknown routes with a JSON 404', async () => {
    const res = await request(buildApp(database.storage)).get('/scenes/1');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Not Found' });
  });

  it('allows configured origins only', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const app = buildApp(database.storage);

    const allowed = await request(app).get('/items/').set('Origin', 'http://localhost:5173');
    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:5173');

    const blocked = await request(app).get('/items/').set('Origin', 'http://evil.example');
    expect(blocked.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('logs one line per request when enabled', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await request(buildApp(database.storage, { logRequests: true })).get('/projects/');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toMatch(/\[express\] GET \/projects\/ 200 in \d+ms :: \[\]$/);
  });

  it('stays quiet when request logging is off', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await request(buildApp(database.storage)).get('/projects/');

    expect(logSpy).not.toHaveBeenCalled();
  });
});
