// =============================================================================
// Kinstep API — Family member records
// =============================================================================

import {
  DEFAULT_GOALS,
  type FamilyMember,
  type MemberOverview,
  type MetricPeriod,
  type PeriodMetrics,
  type SampleMember,
  type UpdateMetricsInput,
} from '@kinstep/shared';
import { catalogAchievements, catalogBadges, evaluateMember } from './badges.js';
import { computeHealthScore, healthInputFromMember } from './healthScore.js';
import { activityRings } from './progress.js';
import { heartRateZone, sleepQuality } from './vitals.js';

export const METRIC_PERIODS: readonly MetricPeriod[] = ['today', 'weekly', 'monthly'];

export function emptyPeriod(): PeriodMetrics {
  return {
    steps: 0,
    calories: 0,
    distance_km: 0,
    active_minutes: 0,
    sleep_hours: 0,
    water_liters: 0,
    hydration_ml: 0,
    workout_minutes: 0,
  };
}

/** Round to a fixed number of decimals to keep accumulated floats tidy. */
export function roundTo(value: number, places: number): number {
  const f = 10 ** places;
  return Math.round(value * f) / f;
}

export function memberFromSample(
  sample: SampleMember,
  familyId: string,
  now: Date = new Date(),
): FamilyMember {
  const stamp = now.toISOString();
  const unlocked = new Map(sample.unlocked_badges.map((key) => [key, stamp]));

  const member: FamilyMember = {
    id: sample.id,
    family_id: familyId,
    name: sample.name,
    relationship: sample.relationship,
    color: sample.color,
    daily_step_goal: sample.daily_step_goal ?? DEFAULT_GOALS.DAILY_STEPS,
    weekly_step_goal: DEFAULT_GOALS.WEEKLY_STEPS,
    monthly_step_goal: DEFAULT_GOALS.MONTHLY_STEPS,
    heart_rate: sample.heart_rate ?? 72,
    resting_heart_rate: sample.resting_heart_rate ?? null,
    mood_score: sample.mood_score ?? null,
    metrics: {
      today: { ...sample.metrics.today },
      weekly: { ...sample.metrics.weekly },
      monthly: { ...sample.metrics.monthly },
    },
    streak: { ...sample.streak },
    workouts_completed: sample.workouts_completed,
    badges: catalogBadges(unlocked),
    achievements: catalogAchievements(new Map()),
    updated_at: stamp,
  };

  // Achievement progress is derived, so settle it on load
  return evaluateMember(member, now).member;
}

type CumulativeField = keyof PeriodMetrics & keyof UpdateMetricsInput;

const CUMULATIVE_FIELDS: readonly CumulativeField[] = [
  'steps',
  'calories',
  'distance_km',
  'active_minutes',
  'sleep_hours',
  'water_liters',
];

/**
 * Overwrite today's figures with a manual or device reading. Weekly and
 * monthly totals move by the same delta as today (never below zero).
 */
export function applyMetricsUpdate(
  member: FamilyMember,
  input: UpdateMetricsInput,
  now: Date = new Date(),
): FamilyMember {
  const today = { ...member.metrics.today };
  const weekly = { ...member.metrics.weekly };
  const monthly = { ...member.metrics.monthly };

  for (const field of CUMULATIVE_FIELDS) {
    const value = input[field];
    if (value === undefined) continue;
    const delta = value - today[field];
    today[field] = value;
    weekly[field] = roundTo(Math.max(0, weekly[field] + delta), 3);
    monthly[field] = roundTo(Math.max(0, monthly[field] + delta), 3);
  }
  if (input.water_liters !== undefined) {
    today.hydration_ml = Math.round(today.water_liters * 1000);
    weekly.hydration_ml = Math.round(weekly.water_liters * 1000);
    monthly.hydration_ml = Math.round(monthly.water_liters * 1000);
  }

  return {
    ...member,
    heart_rate: input.heart_rate ?? member.heart_rate,
    resting_heart_rate:
      input.resting_heart_rate !== undefined ? input.resting_heart_rate : member.resting_heart_rate,
    mood_score: input.mood_score !== undefined ? input.mood_score : member.mood_score,
    metrics: { today, weekly, monthly },
    updated_at: now.toISOString(),
  };
}

export function memberOverview(member: FamilyMember, now: Date = new Date()): MemberOverview {
  return {
    ...member,
    health_score: computeHealthScore(healthInputFromMember(member), now),
    rings: activityRings(member),
    heart_rate_zone: heartRateZone(member.heart_rate),
    sleep_quality: sleepQuality(member.metrics.today.sleep_hours),
  };
}
