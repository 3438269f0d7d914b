// =============================================================================
// Kinstep API — Badge & achievement unlock evaluation
//
// A milestone unlocks when its metric reaches the catalog threshold
// (inclusive). Thresholds are evaluated independently of each other and an
// unlocked milestone is never touched again, so re-evaluating is a no-op.
// =============================================================================

import {
  ACHIEVEMENT_CATALOG,
  BADGE_CATALOG,
  type Achievement,
  type Badge,
  type FamilyMember,
  type MetricSnapshot,
  type MilestoneMetric,
} from '@kinstep/shared';
import { progressRatio } from './progress.js';

export interface EvaluationResult<T> {
  items: T[];
  unlocked: T[];
}

export interface MilestoneState {
  progress: number;
  unlocked_at: string | null;
}

export function metricSnapshot(member: FamilyMember): MetricSnapshot {
  const today = member.metrics.today;
  return {
    steps: today.steps,
    calories: today.calories,
    distance_km: today.distance_km,
    sleep_hours: today.sleep_hours,
    streak_days: member.streak.current,
    goal_days: member.streak.goal_days,
    workouts_completed: member.workouts_completed,
  };
}

// Missing or non-numeric metrics count as zero.
function metricValue(metrics: Partial<MetricSnapshot>, metric: MilestoneMetric): number {
  const value = metrics[metric];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function evaluateBadges(
  badges: readonly Badge[],
  metrics: Partial<MetricSnapshot>,
  now: Date = new Date(),
): EvaluationResult<Badge> {
  const stamp = now.toISOString();
  const unlocked: Badge[] = [];

  const items = badges.map((badge) => {
    if (badge.is_unlocked) return badge;
    if (metricValue(metrics, badge.metric) < badge.threshold) return badge;
    const next: Badge = { ...badge, is_unlocked: true, unlocked_at: stamp };
    unlocked.push(next);
    return next;
  });

  return { items, unlocked };
}

/** Like evaluateBadges, and also refreshes each locked achievement's progress. */
export function evaluateAchievements(
  achievements: readonly Achievement[],
  metrics: Partial<MetricSnapshot>,
  now: Date = new Date(),
): EvaluationResult<Achievement> {
  const stamp = now.toISOString();
  const unlocked: Achievement[] = [];

  const items = achievements.map((achievement) => {
    if (achievement.is_unlocked) return achievement;
    const value = metricValue(metrics, achievement.metric);
    if (value >= achievement.threshold) {
      const next: Achievement = { ...achievement, is_unlocked: true, unlocked_at: stamp, progress: 1 };
      unlocked.push(next);
      return next;
    }
    return { ...achievement, progress: progressRatio(value, achievement.threshold) };
  });

  return { items, unlocked };
}

/** Re-run both evaluators against the member's current metrics. */
export function evaluateMember(
  member: FamilyMember,
  now: Date = new Date(),
): { member: FamilyMember; unlocked: Badge[] } {
  const metrics = metricSnapshot(member);
  const badges = evaluateBadges(member.badges, metrics, now);
  const achievements = evaluateAchievements(member.achievements, metrics, now);
  return {
    member: { ...member, badges: badges.items, achievements: achievements.items },
    unlocked: [...badges.unlocked, ...achievements.unlocked],
  };
}

// ---------------------------------------------------------------------------
// Catalog merge — stores keep only unlock state; definitions live in code
// ---------------------------------------------------------------------------

export function catalogBadges(unlockedAt: ReadonlyMap<string, string>): Badge[] {
  return BADGE_CATALOG.map((def) => {
    const at = unlockedAt.get(def.key) ?? null;
    return { ...def, is_unlocked: at !== null, unlocked_at: at };
  });
}

export function catalogAchievements(state: ReadonlyMap<string, MilestoneState>): Achievement[] {
  return ACHIEVEMENT_CATALOG.map((def) => {
    const s = state.get(def.key);
    const at = s?.unlocked_at ?? null;
    return {
      ...def,
      is_unlocked: at !== null,
      unlocked_at: at,
      progress: at !== null ? 1 : (s?.progress ?? 0),
    };
  });
}
