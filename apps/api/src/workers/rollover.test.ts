import { describe, expect, it } from 'vitest';
import { WS_EVENTS } from '@kinstep/shared';
import { InMemoryFamilyStore } from '../services/store/memory.js';
import { ALEX_ID, FAMILY_ID, JORDAN_ID, RecordingPublisher } from '../testing/fixtures.js';
import { runDailyRollover } from './rollover.js';

const LOADED = new Date('2026-03-04T12:00:00.000Z');
const THURSDAY = new Date('2026-03-05T00:05:00.000Z');
const MONDAY = new Date('2026-03-09T00:05:00.000Z');

describe('runDailyRollover', () => {
  it('closes out the day for every member', async () => {
    const store = InMemoryFamilyStore.fromSample(LOADED);
    const events = new RecordingPublisher();

    const stats = await runDailyRollover({ store, events, now: THURSDAY });

    // Only Jordan (11 250 of 10 000) met the goal
    expect(stats).toEqual({ families: 1, members: 4, goals_met: 1, unlocked: 0 });

    const jordan = await store.getMember(FAMILY_ID, JORDAN_ID);
    expect(jordan?.streak).toEqual({ current: 4, best: 9, goal_days: 12 });
    expect(jordan?.metrics.today.steps).toBe(0);
    expect(jordan?.metrics.weekly.steps).toBe(61_020);

    const alex = await store.getMember(FAMILY_ID, ALEX_ID);
    expect(alex?.streak).toEqual({ current: 0, best: 12, goal_days: 18 });

    expect(events.types()).toEqual(Array(4).fill(WS_EVENTS.MEMBER_METRICS_UPDATED));
  });

  it('starts a new week on Monday', async () => {
    const store = InMemoryFamilyStore.fromSample(LOADED);

    await runDailyRollover({ store, events: new RecordingPublisher(), now: MONDAY });

    const alex = await store.getMember(FAMILY_ID, ALEX_ID);
    expect(alex?.metrics.weekly.steps).toBe(0);
    expect(alex?.metrics.monthly.steps).toBe(210_400);
  });
});
