import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildTestApp, type TestApp } from '../testing/app.js';

describe('GET /health', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.app.close();
  });

  it('reports the store without requiring a token', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', store: { name: 'sample', reachable: true } });
  });

  it('answers unknown routes with the error envelope', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/nope', headers: t.auth() });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ success: false, error: { code: 'NOT_FOUND' } });
  });
});

describe('shutdown', () => {
  it('closes the publisher with the app', async () => {
    const t = await buildTestApp();
    await t.app.close();
    expect(t.events.closed).toBe(true);
  });
});
