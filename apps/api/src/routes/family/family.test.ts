import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildTestApp, type TestApp } from '../../testing/app.js';
import { FAMILY_ID, JORDAN_ID, OTHER_FAMILY_ID } from '../../testing/fixtures.js';

describe('GET /family/summary', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.app.close();
  });

  it("summarises the family's day", async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/family/summary', headers: t.auth() });

    expect(res.statusCode).toBe(200);
    // Scores: Alex 92, Jordan 76, Sam 50, Rose 67
    expect(res.json().data).toMatchObject({
      family_id: FAMILY_ID,
      member_count: 4,
      total_steps_today: 27_120,
      average_health_score: 71,
      step_leader: { member_id: JORDAN_ID, name: 'Jordan', steps: 11_250 },
    });
  });

  it('is empty for a family with no members', async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: '/api/v1/family/summary',
      headers: t.auth(OTHER_FAMILY_ID),
    });

    expect(res.json().data).toMatchObject({ member_count: 0, step_leader: null });
  });
});
