import { describe, expect, it } from 'vitest';
import {
  ALEX_ID,
  FAMILY_ID,
  OTHER_FAMILY_ID,
  ROSE_ID,
  STEPS_CHALLENGE_ID,
  WORKOUT_CHALLENGE_ID,
} from '../../testing/fixtures.js';
import { InMemoryFamilyStore } from './memory.js';

const NOW = new Date('2026-03-04T12:00:00.000Z');

describe('InMemoryFamilyStore', () => {
  it('loads the sample family', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);

    expect(await store.listFamilyIds()).toEqual([FAMILY_ID]);
    expect((await store.listMembers(FAMILY_ID)).map((m) => m.name)).toEqual(['Alex', 'Jordan', 'Sam', 'Rose']);
    expect(await store.ping()).toBe(true);
  });

  it('scopes lookups to the family', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);

    expect(await store.getMember(OTHER_FAMILY_ID, ALEX_ID)).toBeNull();
    expect(await store.getChallenge(OTHER_FAMILY_ID, STEPS_CHALLENGE_ID)).toBeNull();
    expect(await store.listMembers(OTHER_FAMILY_ID)).toEqual([]);
  });

  it('hands out copies, never the stored record', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);

    const member = await store.getMember(FAMILY_ID, ALEX_ID);
    if (!member) throw new Error('missing member');
    member.metrics.today.steps = 0;

    expect((await store.getMember(FAMILY_ID, ALEX_ID))?.metrics.today.steps).toBe(8_420);
  });

  it('persists saved members', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);

    const member = await store.getMember(FAMILY_ID, ROSE_ID);
    if (!member) throw new Error('missing member');
    await store.saveMember({ ...member, heart_rate: 90 });

    expect((await store.getMember(FAMILY_ID, ROSE_ID))?.heart_rate).toBe(90);
  });

  it('places sample workouts and challenges relative to load time', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);

    const [run] = await store.listWorkouts(ALEX_ID);
    expect(run).toMatchObject({
      name: 'Morning Run',
      started_at: '2026-03-04T10:00:00.000Z',
      ended_at: '2026-03-04T10:30:00.000Z',
    });

    const challenges = await store.listChallenges(FAMILY_ID);
    expect(challenges.map((c) => c.id)).toEqual([STEPS_CHALLENGE_ID, WORKOUT_CHALLENGE_ID]);
    expect(challenges[0]).toMatchObject({
      starts_at: '2026-02-28T12:00:00.000Z',
      ends_at: '2026-03-07T12:00:00.000Z',
    });
  });

  it('lists workouts newest first', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);
    await store.addWorkout({
      id: 'w-new',
      member_id: ALEX_ID,
      name: 'Evening Swim',
      type: 'swimming',
      duration_seconds: 1_200,
      calories: 200,
      distance_km: 1,
      heart_rate_samples: [130],
      started_at: '2026-03-04T11:00:00.000Z',
      ended_at: '2026-03-04T11:20:00.000Z',
      is_active: false,
    });

    expect((await store.listWorkouts(ALEX_ID)).map((w) => w.name)).toEqual(['Evening Swim', 'Morning Run']);
  });

  it('derives the pet mood from its stats', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);
    expect(await store.getPet(FAMILY_ID)).toMatchObject({
      name: 'Biscuit',
      hunger: 75,
      energy: 90,
      mood: 'happy',
      last_interaction_at: NOW.toISOString(),
    });
  });
});
