// =============================================================================
// Kinstep API — Goal progress ratios
// Inputs for the dashboard rings and bars; always within [0, 1].
// =============================================================================

import { DEFAULT_GOALS, type ActivityRings, type FamilyMember, type RingProgress } from '@kinstep/shared';

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function progressRatio(current: number, goal: number): number {
  if (!Number.isFinite(current) || !Number.isFinite(goal) || goal <= 0) return 0;
  return clamp(current / goal, 0, 1);
}

export function ring(current: number, goal: number): RingProgress {
  return { current, goal, progress: progressRatio(current, goal) };
}

/** Steps, calories and active-minute rings for today. */
export function activityRings(member: FamilyMember): ActivityRings {
  const today = member.metrics.today;
  return {
    steps: ring(today.steps, member.daily_step_goal),
    calories: ring(today.calories, DEFAULT_GOALS.DAILY_CALORIES),
    active_minutes: ring(today.active_minutes, DEFAULT_GOALS.DAILY_ACTIVE_MINUTES),
  };
}

export function stepGoalProgress(member: FamilyMember): {
  today: RingProgress;
  weekly: RingProgress;
  monthly: RingProgress;
} {
  return {
    today: ring(member.metrics.today.steps, member.daily_step_goal),
    weekly: ring(member.metrics.weekly.steps, member.weekly_step_goal),
    monthly: ring(member.metrics.monthly.steps, member.monthly_step_goal),
  };
}
