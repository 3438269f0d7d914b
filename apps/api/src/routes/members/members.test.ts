import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WS_EVENTS } from '@kinstep/shared';
import { buildTestApp, type TestApp } from '../../testing/app.js';
import {
  ALEX_ID,
  FAMILY_ID,
  OTHER_FAMILY_ID,
  ROSE_ID,
  SAM_ID,
  STEPS_CHALLENGE_ID,
  makeChallenge,
} from '../../testing/fixtures.js';

const HOUR_MS = 3_600_000;
const LIVE_CHALLENGE_ID = '3c4d5e6f-0003-4c00-8000-000000000003';

describe('member routes', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.app.close();
  });

  it('rejects requests without a token', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/members' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
    });
  });

  it('rejects a token without a family', async () => {
    const token = t.app.jwt.sign({ sub: ALEX_ID, family_id: 'not-a-family' });
    const res = await t.app.inject({
      method: 'GET',
      url: '/api/v1/members',
      headers: { authorization: `Bearer ${token}` },
    });

    expect(res.statusCode).toBe(401);
  });

  it('lists the family with scores and rings', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/members', headers: t.auth() });

    expect(res.statusCode).toBe(200);
    const { data } = res.json();
    expect(data).toHaveLength(4);
    // Alex: steps 20 + resting 15 + sleep 20 + workout 15 + mood 15 + water 7
    expect(data[0]).toMatchObject({
      name: 'Alex',
      health_score: { score: 92, band: 'excellent' },
      rings: { steps: { current: 8_420, goal: 10_000, progress: 0.842 } },
      heart_rate_zone: 'light',
      sleep_quality: 'good',
    });
  });

  it('hides members of other families', async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: `/api/v1/members/${ALEX_ID}`,
      headers: t.auth(OTHER_FAMILY_ID),
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ success: false, error: { code: 'NOT_FOUND', message: 'Member not found' } });
  });

  it('validates the member id', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/members/alex', headers: t.auth() });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  describe('PATCH /members/:id/metrics', () => {
    it('updates the reading, unlocks badges and credits challenges', async () => {
      const res = await t.app.inject({
        method: 'PATCH',
        url: `/api/v1/members/${SAM_ID}/metrics`,
        headers: t.auth(),
        payload: { steps: 10_500 },
      });

      expect(res.statusCode).toBe(200);
      const { data } = res.json();
      expect(data.member.metrics.today.steps).toBe(10_500);
      expect(data.member.metrics.weekly.steps).toBe(44_900);
      expect(data.unlocked.map((b: { key: string }) => b.key)).toEqual(['STEPS_10K']);

      const challenge = await t.store.getChallenge(FAMILY_ID, STEPS_CHALLENGE_ID);
      expect(challenge?.participants[SAM_ID]).toBe(44_900);

      expect(t.events.types()).toEqual([
        WS_EVENTS.MEMBER_METRICS_UPDATED,
        WS_EVENTS.BADGE_UNLOCKED,
        WS_EVENTS.CHALLENGE_UPDATED,
      ]);
    });

    it('requires at least one metric', async () => {
      const res = await t.app.inject({
        method: 'PATCH',
        url: `/api/v1/members/${SAM_ID}/metrics`,
        headers: t.auth(),
        payload: {},
      });

      expect(res.statusCode).toBe(422);
      expect(t.events.published).toEqual([]);
    });

    it('rejects a mood outside 1–10', async () => {
      const res = await t.app.inject({
        method: 'PATCH',
        url: `/api/v1/members/${SAM_ID}/metrics`,
        headers: t.auth(),
        payload: { mood_score: 11 },
      });

      expect(res.statusCode).toBe(422);
    });
  });

  it('re-evaluates badges without unlocking anything twice', async () => {
    const url = `/api/v1/members/${ALEX_ID}/badges/evaluate`;
    const res = await t.app.inject({ method: 'POST', url, headers: t.auth() });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.unlocked).toEqual([]);
    expect(t.events.published).toEqual([]);
  });

  it("scores a member's day", async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: `/api/v1/members/${ROSE_ID}/health-score`,
      headers: t.auth(),
    });

    // steps 8 + resting 15 + sleep 20 + workout 10 + mood 10 + water 4
    expect(res.json().data).toMatchObject({ score: 67, band: 'fair' });
  });

  describe('workouts', () => {
    it('logs a workout and lists it first', async () => {
      const created = await t.app.inject({
        method: 'POST',
        url: `/api/v1/members/${ROSE_ID}/workouts`,
        headers: t.auth(),
        payload: {
          name: 'Garden Walk',
          type: 'walking',
          duration_seconds: 1_800,
          heart_rate_samples: [90, 100, 110],
        },
      });

      expect(created.statusCode).toBe(201);
      expect(created.json().data.workout).toMatchObject({
        name: 'Garden Walk',
        calories: 0,
        duration_minutes: 30,
        average_heart_rate: 100,
        peak_heart_rate: 110,
      });
      expect(created.json().data.unlocked.map((b: { key: string }) => b.key)).toEqual(['FIRST_STEPS']);

      const listed = await t.app.inject({
        method: 'GET',
        url: `/api/v1/members/${ROSE_ID}/workouts`,
        headers: t.auth(),
      });
      expect(listed.json().data.map((w: { name: string }) => w.name)).toEqual(['Garden Walk', 'Chair Yoga']);

      const rose = await t.store.getMember(FAMILY_ID, ROSE_ID);
      expect(rose?.metrics.today.workout_minutes).toBe(50);
      expect(rose?.workouts_completed).toBe(1);
    });

    describe('against a workout challenge that started an hour ago', () => {
      beforeEach(async () => {
        const now = Date.now();
        await t.store.saveChallenge(
          makeChallenge({
            id: LIVE_CHALLENGE_ID,
            title: 'Sweat Hour',
            metric: 'workout_minutes',
            target_value: 300,
            participants: { [ALEX_ID]: 0 },
            starts_at: new Date(now - HOUR_MS).toISOString(),
            ends_at: new Date(now + 24 * HOUR_MS).toISOString(),
          }),
        );
      });

      function logWorkout(endedAt: Date, durationSeconds: number) {
        return t.app.inject({
          method: 'POST',
          url: `/api/v1/members/${ALEX_ID}/workouts`,
          headers: t.auth(),
          payload: {
            name: 'Intervals',
            type: 'hiit',
            duration_seconds: durationSeconds,
            ended_at: endedAt.toISOString(),
          },
        });
      }

      it('credits a workout that ended while it was running', async () => {
        const res = await logWorkout(new Date(Date.now() - 10 * 60_000), 600);

        expect(res.statusCode).toBe(201);
        const challenge = await t.store.getChallenge(FAMILY_ID, LIVE_CHALLENGE_ID);
        expect(challenge?.participants[ALEX_ID]).toBe(10);
        expect(t.events.types()).toContain(WS_EVENTS.CHALLENGE_UPDATED);
      });

      it('does not credit a workout from before it started', async () => {
        const res = await logWorkout(new Date(Date.now() - 72 * HOUR_MS), 3_600);

        expect(res.statusCode).toBe(201);
        const challenge = await t.store.getChallenge(FAMILY_ID, LIVE_CHALLENGE_ID);
        expect(challenge?.participants[ALEX_ID]).toBe(0);
        expect(t.events.types()).not.toContain(WS_EVENTS.CHALLENGE_UPDATED);

        // Counted as a workout, but not as today's minutes
        const alex = await t.store.getMember(FAMILY_ID, ALEX_ID);
        expect(alex?.workouts_completed).toBe(15);
        expect(alex?.metrics.today.workout_minutes).toBe(30);
      });

      it('rejects a workout that ends in the future', async () => {
        const res = await logWorkout(new Date(Date.now() + HOUR_MS), 600);

        expect(res.statusCode).toBe(422);
        expect(res.json()).toEqual({
          success: false,
          error: { code: 'WORKOUT_IN_FUTURE', message: 'ended_at cannot be in the future' },
        });
        expect(await t.store.listWorkouts(ALEX_ID)).toHaveLength(1);
        expect((await t.store.getChallenge(FAMILY_ID, LIVE_CHALLENGE_ID))?.participants[ALEX_ID]).toBe(0);
      });
    });

    it('rejects an unknown workout type', async () => {
      const res = await t.app.inject({
        method: 'POST',
        url: `/api/v1/members/${ROSE_ID}/workouts`,
        headers: t.auth(),
        payload: { name: 'Juggling', type: 'juggling', duration_seconds: 600 },
      });

      expect(res.statusCode).toBe(422);
    });
  });
});
