// =============================================================================
// Kinstep API — Day rollover
// Closes out "today": extends or resets the streak, clears today's metrics
// and, on period boundaries (UTC), the weekly and monthly totals.
// =============================================================================

import type { Badge, FamilyMember } from '@kinstep/shared';
import { evaluateMember } from './badges.js';
import { emptyPeriod } from './members.js';

export interface RolloverResult {
  member: FamilyMember;
  metGoal: boolean;
  unlocked: Badge[];
}

/** `newDay` is any instant on the day being opened. */
export function rolloverDay(member: FamilyMember, newDay: Date): RolloverResult {
  const metGoal =
    member.daily_step_goal > 0 && member.metrics.today.steps >= member.daily_step_goal;

  const current = metGoal ? member.streak.current + 1 : 0;
  const streak = {
    current,
    best: Math.max(member.streak.best, current),
    goal_days: member.streak.goal_days + (metGoal ? 1 : 0),
  };

  const isMonday = newDay.getUTCDay() === 1;
  const isFirstOfMonth = newDay.getUTCDate() === 1;

  const rolled: FamilyMember = {
    ...member,
    streak,
    metrics: {
      today: emptyPeriod(),
      weekly: isMonday ? emptyPeriod() : member.metrics.weekly,
      monthly: isFirstOfMonth ? emptyPeriod() : member.metrics.monthly,
    },
    updated_at: newDay.toISOString(),
  };

  // Streak milestones can only be reached here, so re-evaluate now
  const evaluation = evaluateMember(rolled, newDay);
  return { member: evaluation.member, metGoal, unlocked: evaluation.unlocked };
}
