// =============================================================================
// Kinstep API — Family challenges
// A shared, time-boxed goal. Completion is derived from the participant
// progress map and never exceeds 100%.
// =============================================================================

import { randomUUID } from 'node:crypto';
import type {
  ChallengeMetric,
  ChallengeStatus,
  ChallengeView,
  CreateChallengeInput,
  FamilyChallenge,
  LeaderboardEntry,
} from '@kinstep/shared';
import { HttpError } from '../errors.js';
import { clamp } from './progress.js';

export type ActivityDeltas = Partial<Record<ChallengeMetric, number>>;

function safeAmount(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function totalProgress(challenge: FamilyChallenge): number {
  return Object.values(challenge.participants).reduce((sum, v) => sum + safeAmount(v), 0);
}

export function completionPercentage(challenge: FamilyChallenge): number {
  if (!(challenge.target_value > 0)) return 0;
  const pct = (totalProgress(challenge) / challenge.target_value) * 100;
  // One decimal place for display
  return Math.round(clamp(pct, 0, 100) * 10) / 10;
}

export function challengeStatus(challenge: FamilyChallenge, now: Date): ChallengeStatus {
  const t = now.getTime();
  if (t < Date.parse(challenge.starts_at)) return 'upcoming';
  if (t >= Date.parse(challenge.ends_at)) return 'ended';
  return 'active';
}

/** Highest progress first; ties ordered by member id so the ranking is stable. */
export function leaderboard(challenge: FamilyChallenge): LeaderboardEntry[] {
  return Object.entries(challenge.participants)
    .map(([member_id, progress]) => ({ member_id, progress: safeAmount(progress) }))
    .sort((a, b) => b.progress - a.progress || a.member_id.localeCompare(b.member_id))
    .map((entry, i) => ({ ...entry, rank: i + 1 }));
}

export function describeChallenge(challenge: FamilyChallenge, now: Date = new Date()): ChallengeView {
  const total = totalProgress(challenge);
  return {
    ...challenge,
    total_progress: total,
    completion_percentage: completionPercentage(challenge),
    is_complete: challenge.target_value > 0 && total >= challenge.target_value,
    status: challengeStatus(challenge, now),
    leaderboard: leaderboard(challenge),
  };
}

export function createChallenge(
  familyId: string,
  input: CreateChallengeInput,
  familyMemberIds: ReadonlySet<string>,
  now: Date = new Date(),
): FamilyChallenge {
  const unknown = input.participant_ids.filter((id) => !familyMemberIds.has(id));
  if (unknown.length > 0) {
    throw new HttpError(
      422,
      'UNKNOWN_PARTICIPANT',
      `Not members of this family: ${unknown.join(', ')}`,
    );
  }

  const participants: Record<string, number> = {};
  for (const id of input.participant_ids) participants[id] = 0;

  return {
    id: randomUUID(),
    family_id: familyId,
    title: input.title,
    metric: input.metric,
    target_value: input.target_value,
    participants,
    starts_at: new Date(input.starts_at).toISOString(),
    ends_at: new Date(input.ends_at).toISOString(),
    created_at: now.toISOString(),
  };
}

export function recordProgress(
  challenge: FamilyChallenge,
  memberId: string,
  amount: number,
  now: Date = new Date(),
): FamilyChallenge {
  if (!(memberId in challenge.participants)) {
    throw new HttpError(409, 'NOT_A_PARTICIPANT', 'Member is not taking part in this challenge');
  }
  if (challengeStatus(challenge, now) !== 'active') {
    throw new HttpError(409, 'CHALLENGE_NOT_ACTIVE', 'Challenge is not running');
  }
  if (!Number.isFinite(amount) || amount < 0) {
    throw new HttpError(422, 'INVALID_AMOUNT', 'Progress amount must be a non-negative number');
  }

  const current = challenge.participants[memberId] ?? 0;
  return {
    ...challenge,
    participants: { ...challenge.participants, [memberId]: current + amount },
  };
}

/**
 * Credit a member's simulated or logged activity to every active challenge
 * they take part in. Returns the full list plus the challenges that changed.
 */
export function applyActivity(
  challenges: readonly FamilyChallenge[],
  memberId: string,
  deltas: ActivityDeltas,
  now: Date = new Date(),
): { challenges: FamilyChallenge[]; changed: FamilyChallenge[] } {
  const changed: FamilyChallenge[] = [];

  const next = challenges.map((challenge) => {
    const amount = safeAmount(deltas[challenge.metric] ?? 0);
    if (amount === 0) return challenge;
    if (!(memberId in challenge.participants)) return challenge;
    if (challengeStatus(challenge, now) !== 'active') return challenge;

    const updated = recordProgress(challenge, memberId, amount, now);
    changed.push(updated);
    return updated;
  });

  return { challenges: next, changed };
}
