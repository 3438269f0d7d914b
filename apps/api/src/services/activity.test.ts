import { describe, expect, it, vi } from 'vitest';
import { WS_EVENTS, type Pet } from '@kinstep/shared';
import { FAMILY_ID, RecordingPublisher, period } from '../testing/fixtures.js';
import { activityBetween, publishAll, petUpdatedEvent } from './activity.js';
import type { FamilyEvent, FamilyEventPublisher } from './events.js';

describe('activityBetween', () => {
  it('keeps only figures that went up', () => {
    const before = period({ steps: 1_000, calories: 50, active_minutes: 10, workout_minutes: 20 });
    const after = period({ steps: 1_400, calories: 50, active_minutes: 8, workout_minutes: 35 });

    expect(activityBetween(before, after)).toEqual({ steps: 400, workout_minutes: 15 });
  });

  it('is empty when nothing moved', () => {
    const same = period({ steps: 500 });
    expect(activityBetween(same, same)).toEqual({});
  });
});

describe('publishAll', () => {
  const pet: Pet = {
    family_id: FAMILY_ID,
    name: 'Biscuit',
    type: 'dog',
    hunger: 70,
    energy: 70,
    mood: 'happy',
    last_interaction_at: '2026-03-04T12:00:00.000Z',
  };

  it('publishes in order', async () => {
    const events = new RecordingPublisher();
    const batch: FamilyEvent[] = [petUpdatedEvent(pet), petUpdatedEvent({ ...pet, hunger: 60 })];

    await publishAll(events, FAMILY_ID, batch, { warn: vi.fn() });

    expect(events.published.map((p) => p.event)).toEqual(batch);
  });

  it('logs and carries on when a publish fails', async () => {
    const publish = vi
      .fn<(familyId: string, event: FamilyEvent) => Promise<void>>()
      .mockRejectedValueOnce(new Error('redis down'))
      .mockResolvedValue(undefined);
    const events: FamilyEventPublisher = { publish, close: vi.fn().mockResolvedValue(undefined) };
    const log = { warn: vi.fn() };

    await publishAll(events, FAMILY_ID, [petUpdatedEvent(pet), petUpdatedEvent(pet)], log);

    expect(publish).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ familyId: FAMILY_ID, type: WS_EVENTS.PET_UPDATED }),
      '[events] publish failed — event dropped',
    );
  });
});
