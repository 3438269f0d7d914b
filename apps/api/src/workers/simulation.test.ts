import { describe, expect, it, vi } from 'vitest';
import { WS_EVENTS } from '@kinstep/shared';
import type { FamilyEventPublisher } from '../services/events.js';
import { InMemoryFamilyStore } from '../services/store/memory.js';
import {
  ALEX_ID,
  FAMILY_ID,
  RecordingPublisher,
  STEPS_CHALLENGE_ID,
  WORKOUT_CHALLENGE_ID,
  sequence,
} from '../testing/fixtures.js';
import { runSimulationTick } from './simulation.js';

const NOW = new Date('2026-03-04T12:00:00.000Z');

describe('runSimulationTick', () => {
  it('advances every member and credits the running challenge', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);
    const events = new RecordingPublisher();

    const stats = await runSimulationTick({ store, events, random: sequence(0.999), now: NOW });

    expect(stats).toEqual({ families: 1, members: 4, steps: 20, unlocked: 0, challenges_updated: 4 });

    const alex = await store.getMember(FAMILY_ID, ALEX_ID);
    expect(alex?.metrics.today.steps).toBe(8_425);
    expect(alex?.heart_rate).toBe(74);

    const steps = await store.getChallenge(FAMILY_ID, STEPS_CHALLENGE_ID);
    expect(steps?.participants[ALEX_ID]).toBe(52_345);

    // Not started yet
    const workout = await store.getChallenge(FAMILY_ID, WORKOUT_CHALLENGE_ID);
    expect(workout?.participants[ALEX_ID]).toBe(0);
  });

  it('decays the pet', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);

    await runSimulationTick({ store, events: new RecordingPublisher(), random: sequence(0.999), now: NOW });

    expect(await store.getPet(FAMILY_ID)).toMatchObject({ hunger: 72, energy: 88 });
  });

  it('publishes each member update, then the pet', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);
    const events = new RecordingPublisher();

    await runSimulationTick({ store, events, random: sequence(0.999), now: NOW });

    const memberPair = [WS_EVENTS.MEMBER_METRICS_UPDATED, WS_EVENTS.CHALLENGE_UPDATED];
    expect(events.types()).toEqual([...memberPair, ...memberPair, ...memberPair, ...memberPair, WS_EVENTS.PET_UPDATED]);
    expect(new Set(events.published.map((p) => p.familyId))).toEqual(new Set([FAMILY_ID]));
  });

  it('keeps going when events cannot be delivered', async () => {
    const store = InMemoryFamilyStore.fromSample(NOW);
    const events: FamilyEventPublisher = {
      publish: vi.fn().mockRejectedValue(new Error('redis down')),
      close: vi.fn().mockResolvedValue(undefined),
    };
    const log = { warn: vi.fn() };

    const stats = await runSimulationTick({ store, events, log, random: sequence(0), now: NOW });

    expect(stats.members).toBe(4);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ familyId: FAMILY_ID, type: WS_EVENTS.MEMBER_METRICS_UPDATED }),
      '[events] publish failed — event dropped',
    );
  });
});
