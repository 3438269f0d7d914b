import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WS_EVENTS } from '@kinstep/shared';
import { buildTestApp, type TestApp } from '../../testing/app.js';
import { OTHER_FAMILY_ID } from '../../testing/fixtures.js';

describe('pet routes', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.app.close();
  });

  it("returns the family's pet", async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/pet', headers: t.auth() });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({ name: 'Biscuit', type: 'dog', mood: 'happy' });
  });

  it('404s when the family has no pet', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/pet', headers: t.auth(OTHER_FAMILY_ID) });
    expect(res.statusCode).toBe(404);
  });

  it('feeds the pet and publishes the change', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/pet/actions',
      headers: t.auth(),
      payload: { action: 'feed' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({ hunger: 100, energy: 90, mood: 'happy' });
    expect(t.events.types()).toEqual([WS_EVENTS.PET_UPDATED]);
  });

  it('rejects unknown actions', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/pet/actions',
      headers: t.auth(),
      payload: { action: 'dance' },
    });

    expect(res.statusCode).toBe(422);
  });
});
