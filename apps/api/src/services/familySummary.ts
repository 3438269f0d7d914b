import type { FamilyMember, FamilySummary } from '@kinstep/shared';
import { memberOverview } from './members.js';

export function buildFamilySummary(
  familyId: string,
  members: readonly FamilyMember[],
  now: Date = new Date(),
): FamilySummary {
  const overviews = members.map((m) => memberOverview(m, now));
  const totalSteps = members.reduce((sum, m) => sum + m.metrics.today.steps, 0);
  const averageScore =
    overviews.length > 0
      ? Math.round(overviews.reduce((sum, o) => sum + o.health_score.score, 0) / overviews.length)
      : 0;

  // Most steps today; ties go to the alphabetically first name
  const leader = [...members].sort(
    (a, b) => b.metrics.today.steps - a.metrics.today.steps || a.name.localeCompare(b.name),
  )[0];

  return {
    family_id: familyId,
    member_count: members.length,
    total_steps_today: totalSteps,
    average_health_score: averageScore,
    step_leader: leader
      ? { member_id: leader.id, name: leader.name, steps: leader.metrics.today.steps }
      : null,
    members: overviews,
  };
}
