// =============================================================================
// Kinstep API — Workouts
// =============================================================================

import { randomUUID } from 'node:crypto';
import {
  LIMITS,
  type Badge,
  type CreateWorkoutInput,
  type FamilyMember,
  type PeriodMetrics,
  type Workout,
  type WorkoutSummary,
} from '@kinstep/shared';
import { HttpError } from '../errors.js';
import { evaluateMember } from './badges.js';
import { roundTo } from './members.js';
import { randomInt, type RandomSource } from './random.js';

export function summarizeWorkout(workout: Workout): WorkoutSummary {
  const samples = workout.heart_rate_samples;
  return {
    ...workout,
    duration_minutes: Math.round(workout.duration_seconds / 60),
    average_heart_rate:
      samples.length > 0 ? Math.round(samples.reduce((a, b) => a + b, 0) / samples.length) : null,
    peak_heart_rate: samples.length > 0 ? Math.max(...samples) : null,
  };
}

const DAY_MS = 86_400_000;

function startOfUtcDay(d: Date): number {
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

/** Weeks start on Monday, matching the nightly rollover. */
function startOfUtcWeek(d: Date): number {
  return startOfUtcDay(d) - ((d.getUTCDay() + 6) % 7) * DAY_MS;
}

function startOfUtcMonth(d: Date): number {
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1);
}

/** A finished workout ending at `ended_at` (default: now). */
export function buildWorkout(
  memberId: string,
  input: CreateWorkoutInput,
  now: Date = new Date(),
  random: RandomSource = Math.random,
): Workout {
  const endedAt = input.ended_at ? new Date(input.ended_at) : now;
  if (endedAt.getTime() > now.getTime()) {
    throw new HttpError(422, 'WORKOUT_IN_FUTURE', 'ended_at cannot be in the future');
  }
  const samples =
    input.heart_rate_samples && input.heart_rate_samples.length > 0
      ? input.heart_rate_samples
      : [randomInt(LIMITS.DEFAULT_WORKOUT_HR_MIN, LIMITS.DEFAULT_WORKOUT_HR_MAX, random)];

  return {
    id: randomUUID(),
    member_id: memberId,
    name: input.name,
    type: input.type,
    duration_seconds: input.duration_seconds,
    calories: input.calories,
    distance_km: input.distance_km ?? null,
    heart_rate_samples: samples,
    started_at: new Date(endedAt.getTime() - input.duration_seconds * 1000).toISOString(),
    ended_at: endedAt.toISOString(),
    is_active: false,
  };
}

function addMinutes(period: PeriodMetrics, minutes: number, counts: boolean): PeriodMetrics {
  if (!counts) return period;
  return { ...period, workout_minutes: roundTo(period.workout_minutes + minutes, 2) };
}

/**
 * Credit a finished workout to the member and re-check achievements. Its
 * minutes land only in the periods (UTC day, week, month) it ended in.
 */
export function applyWorkout(
  member: FamilyMember,
  workout: Workout,
  now: Date = new Date(),
): { member: FamilyMember; unlocked: Badge[]; minutes: number } {
  const minutes = roundTo(workout.duration_seconds / 60, 2);
  const ended = Date.parse(workout.ended_at);
  const { today, weekly, monthly } = member.metrics;

  const credited: FamilyMember = {
    ...member,
    workouts_completed: member.workouts_completed + 1,
    metrics: {
      today: addMinutes(today, minutes, ended >= startOfUtcDay(now)),
      weekly: addMinutes(weekly, minutes, ended >= startOfUtcWeek(now)),
      monthly: addMinutes(monthly, minutes, ended >= startOfUtcMonth(now)),
    },
    updated_at: now.toISOString(),
  };

  const evaluation = evaluateMember(credited, now);
  return { member: evaluation.member, unlocked: evaluation.unlocked, minutes };
}
