import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildTestApp, type TestApp } from '../../testing/app.js';

describe('POST /health-score', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.app.close();
  });

  it('scores the readings in the body', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/health-score',
      headers: t.auth(),
      payload: {
        mood_score: 9,
        steps: 11_000,
        resting_heart_rate: 70,
        sleep_hours: 7.5,
        workout_minutes: 35,
        water_liters: 2.6,
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({ score: 100, raw_score: 100, band: 'excellent' });
  });

  it('rejects non-numeric readings', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/health-score',
      headers: t.auth(),
      payload: { steps: 'lots' },
    });

    expect(res.statusCode).toBe(422);
  });
});
