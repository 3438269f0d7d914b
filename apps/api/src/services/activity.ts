// =============================================================================
// Kinstep API — Activity fan-out
// Shared by the routes and the simulation worker: credits a member's new
// activity to running challenges and publishes the resulting family events.
// Publishing is best-effort; a dropped event never fails the caller.
// =============================================================================

import {
  WS_EVENTS,
  type Badge,
  type ChallengeMetric,
  type FamilyChallenge,
  type FamilyMember,
  type PeriodMetrics,
  type Pet,
} from '@kinstep/shared';
import { applyActivity, describeChallenge, type ActivityDeltas } from './challenges.js';
import type { FamilyEvent, FamilyEventPublisher } from './events.js';
import { computeHealthScore, healthInputFromMember } from './healthScore.js';
import type { FamilyStore, StoreLogger } from './store/types.js';

const PERIOD_CHALLENGE_METRICS: readonly (ChallengeMetric & keyof PeriodMetrics)[] = [
  'steps',
  'calories',
  'distance_km',
  'active_minutes',
  'workout_minutes',
];

/** Positive movement of today's figures between two readings. */
export function activityBetween(before: PeriodMetrics, after: PeriodMetrics): ActivityDeltas {
  const deltas: ActivityDeltas = {};
  for (const metric of PERIOD_CHALLENGE_METRICS) {
    const delta = after[metric] - before[metric];
    if (delta > 0) deltas[metric] = delta;
  }
  return deltas;
}

export async function creditChallenges(
  store: FamilyStore,
  member: FamilyMember,
  deltas: ActivityDeltas,
  now: Date = new Date(),
): Promise<FamilyChallenge[]> {
  if (Object.keys(deltas).length === 0) return [];
  const challenges = await store.listChallenges(member.family_id);
  const { changed } = applyActivity(challenges, member.id, deltas, now);
  for (const challenge of changed) {
    await store.saveChallenge(challenge);
  }
  return changed;
}

// ---------------------------------------------------------------------------
// Event builders
// ---------------------------------------------------------------------------

export function memberUpdatedEvent(member: FamilyMember, now: Date = new Date()): FamilyEvent {
  return {
    type: WS_EVENTS.MEMBER_METRICS_UPDATED,
    data: {
      member_id: member.id,
      heart_rate: member.heart_rate,
      today: member.metrics.today,
      streak: member.streak,
      health_score: computeHealthScore(healthInputFromMember(member), now).score,
      updated_at: member.updated_at,
    },
  };
}

export function badgeUnlockedEvent(memberId: string, badge: Badge): FamilyEvent {
  return {
    type: WS_EVENTS.BADGE_UNLOCKED,
    data: { member_id: memberId, key: badge.key, name: badge.name, unlocked_at: badge.unlocked_at },
  };
}

export function challengeUpdatedEvent(challenge: FamilyChallenge, now: Date = new Date()): FamilyEvent {
  return { type: WS_EVENTS.CHALLENGE_UPDATED, data: { challenge: describeChallenge(challenge, now) } };
}

export function petUpdatedEvent(pet: Pet): FamilyEvent {
  return { type: WS_EVENTS.PET_UPDATED, data: { pet } };
}

export async function publishAll(
  events: FamilyEventPublisher,
  familyId: string,
  batch: readonly FamilyEvent[],
  log: StoreLogger,
): Promise<void> {
  for (const event of batch) {
    try {
      await events.publish(familyId, event);
    } catch (err) {
      log.warn({ err, familyId, type: event.type }, '[events] publish failed — event dropped');
    }
  }
}

/** Events for a member change: the update itself, then one per unlock. */
export function memberEvents(
  member: FamilyMember,
  unlocked: readonly Badge[],
  changed: readonly FamilyChallenge[],
  now: Date = new Date(),
): FamilyEvent[] {
  return [
    memberUpdatedEvent(member, now),
    ...unlocked.map((badge) => badgeUnlockedEvent(member.id, badge)),
    ...changed.map((challenge) => challengeUpdatedEvent(challenge, now)),
  ];
}
