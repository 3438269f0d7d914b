// Test fixtures shared by the API test suites.

import type { FamilyChallenge, FamilyMember, PeriodMetrics } from '@kinstep/shared';
import { catalogAchievements, catalogBadges } from '../services/badges.js';
import type { FamilyEvent, FamilyEventPublisher } from '../services/events.js';
import { emptyPeriod } from '../services/members.js';
import type { RandomSource } from '../services/random.js';

export const FAMILY_ID = '0f8b1c2e-5a47-4c1e-9d3b-2a6f4e8c1b01';
export const OTHER_FAMILY_ID = '9e8d7c6b-5a49-4f3e-8d2c-1b0a9f8e7d6c';

export const ALEX_ID = '1a2b3c4d-0001-4a00-8000-000000000001';
export const JORDAN_ID = '1a2b3c4d-0002-4a00-8000-000000000002';
export const SAM_ID = '1a2b3c4d-0003-4a00-8000-000000000003';
export const ROSE_ID = '1a2b3c4d-0004-4a00-8000-000000000004';

export const STEPS_CHALLENGE_ID = '3c4d5e6f-0001-4c00-8000-000000000001';
export const WORKOUT_CHALLENGE_ID = '3c4d5e6f-0002-4c00-8000-000000000002';

export function period(values: Partial<PeriodMetrics> = {}): PeriodMetrics {
  return { ...emptyPeriod(), ...values };
}

/** A member with nothing recorded and nothing unlocked. */
export function makeMember(overrides: Partial<FamilyMember> = {}): FamilyMember {
  return {
    id: ALEX_ID,
    family_id: FAMILY_ID,
    name: 'Alex',
    relationship: 'self',
    color: '#34c759',
    daily_step_goal: 10_000,
    weekly_step_goal: 70_000,
    monthly_step_goal: 300_000,
    heart_rate: 72,
    resting_heart_rate: 62,
    mood_score: 8,
    metrics: { today: period(), weekly: period(), monthly: period() },
    streak: { current: 0, best: 0, goal_days: 0 },
    workouts_completed: 0,
    badges: catalogBadges(new Map()),
    achievements: catalogAchievements(new Map()),
    updated_at: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeChallenge(overrides: Partial<FamilyChallenge> = {}): FamilyChallenge {
  return {
    id: STEPS_CHALLENGE_ID,
    family_id: FAMILY_ID,
    title: 'Step it up',
    metric: 'steps',
    target_value: 1_000,
    participants: { [ALEX_ID]: 300, [JORDAN_ID]: 500 },
    starts_at: '2026-03-01T00:00:00.000Z',
    ends_at: '2026-03-08T00:00:00.000Z',
    created_at: '2026-02-28T00:00:00.000Z',
    ...overrides,
  };
}

/** Replays the given draws in order, cycling when exhausted. */
export function sequence(...values: number[]): RandomSource {
  let i = 0;
  return () => {
    const value = values[i % values.length] ?? 0;
    i++;
    return value;
  };
}

export class RecordingPublisher implements FamilyEventPublisher {
  readonly published: { familyId: string; event: FamilyEvent }[] = [];
  closed = false;

  async publish(familyId: string, event: FamilyEvent): Promise<void> {
    this.published.push({ familyId, event });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  types(): string[] {
    return this.published.map((p) => p.event.type);
  }
}

/** The value thrown by `fn`, or undefined when it returns normally. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
