// =============================================================================
// Kinstep API — Postgres family store (the remote record store)
// Badge/achievement definitions live in code; only unlock state is stored.
// NUMERIC columns are cast to float8 so postgres.js returns numbers.
// =============================================================================

import { closeDb, getSql } from '@kinstep/db';
import {
  ChallengeMetricSchema,
  MetricPeriodSchema,
  PetMoodSchema,
  PetTypeSchema,
  RelationshipSchema,
  WorkoutTypeSchema,
  type FamilyChallenge,
  type FamilyMember,
  type PeriodMetrics,
  type Pet,
  type Workout,
} from '@kinstep/shared';
import { catalogAchievements, catalogBadges, type MilestoneState } from '../badges.js';
import { emptyPeriod, METRIC_PERIODS } from '../members.js';
import type { FamilyStore } from './types.js';

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

interface MemberRow {
  id: string;
  family_id: string;
  name: string;
  relationship: string;
  color: string;
  daily_step_goal: number;
  weekly_step_goal: number;
  monthly_step_goal: number;
  heart_rate: number;
  resting_heart_rate: number | null;
  mood_score: number | null;
  current_streak: number;
  best_streak: number;
  goal_days: number;
  workouts_completed: number;
  updated_at: Date;
}

interface MetricRow extends PeriodMetrics {
  member_id: string;
  period: string;
}

interface MilestoneRow {
  member_id: string;
  kind: 'badge' | 'achievement';
  milestone_key: string;
  progress: number;
  unlocked_at: Date | null;
}

interface WorkoutRow {
  id: string;
  member_id: string;
  name: string;
  type: string;
  duration_seconds: number;
  calories: number;
  distance_km: number | null;
  heart_rate_samples: number[];
  started_at: Date;
  ended_at: Date;
  is_active: boolean;
}

interface ChallengeRow {
  id: string;
  family_id: string;
  title: string;
  metric: string;
  target_value: number;
  starts_at: Date;
  ends_at: Date;
  created_at: Date;
}

interface ParticipantRow {
  challenge_id: string;
  member_id: string;
  progress: number;
}

interface PetRow {
  family_id: string;
  name: string;
  type: string;
  hunger: number;
  energy: number;
  mood: string;
  last_interaction_at: Date;
}

// ---------------------------------------------------------------------------
// Row → entity mapping
// ---------------------------------------------------------------------------

function assembleMembers(
  rows: readonly MemberRow[],
  metricRows: readonly MetricRow[],
  milestoneRows: readonly MilestoneRow[],
): FamilyMember[] {
  return rows.map((row) => {
    const metrics = { today: emptyPeriod(), weekly: emptyPeriod(), monthly: emptyPeriod() };
    for (const m of metricRows) {
      if (m.member_id !== row.id) continue;
      const { member_id: _memberId, period, ...values } = m;
      metrics[MetricPeriodSchema.parse(period)] = values;
    }

    const badges = new Map<string, string>();
    const achievements = new Map<string, MilestoneState>();
    for (const ms of milestoneRows) {
      if (ms.member_id !== row.id) continue;
      const unlockedAt = ms.unlocked_at ? ms.unlocked_at.toISOString() : null;
      if (ms.kind === 'badge' && unlockedAt) {
        badges.set(ms.milestone_key, unlockedAt);
      } else if (ms.kind === 'achievement') {
        achievements.set(ms.milestone_key, { progress: ms.progress, unlocked_at: unlockedAt });
      }
    }

    return {
      id: row.id,
      family_id: row.family_id,
      name: row.name,
      relationship: RelationshipSchema.parse(row.relationship),
      color: row.color,
      daily_step_goal: row.daily_step_goal,
      weekly_step_goal: row.weekly_step_goal,
      monthly_step_goal: row.monthly_step_goal,
      heart_rate: row.heart_rate,
      resting_heart_rate: row.resting_heart_rate,
      mood_score: row.mood_score,
      metrics,
      streak: { current: row.current_streak, best: row.best_streak, goal_days: row.goal_days },
      workouts_completed: row.workouts_completed,
      badges: catalogBadges(badges),
      achievements: catalogAchievements(achievements),
      updated_at: row.updated_at.toISOString(),
    };
  });
}

function toWorkout(row: WorkoutRow): Workout {
  return {
    ...row,
    type: WorkoutTypeSchema.parse(row.type),
    started_at: row.started_at.toISOString(),
    ended_at: row.ended_at.toISOString(),
  };
}

function toChallenge(row: ChallengeRow, participants: readonly ParticipantRow[]): FamilyChallenge {
  const progress: Record<string, number> = {};
  for (const p of participants) {
    if (p.challenge_id === row.id) progress[p.member_id] = p.progress;
  }
  return {
    id: row.id,
    family_id: row.family_id,
    title: row.title,
    metric: ChallengeMetricSchema.parse(row.metric),
    target_value: row.target_value,
    participants: progress,
    starts_at: row.starts_at.toISOString(),
    ends_at: row.ends_at.toISOString(),
    created_at: row.created_at.toISOString(),
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class PostgresFamilyStore implements FamilyStore {
  readonly name = 'postgres';

  async ping(): Promise<boolean> {
    await getSql()`SELECT 1`;
    return true;
  }

  async listFamilyIds(): Promise<string[]> {
    const rows = await getSql()<{ id: string }[]>`SELECT id FROM families ORDER BY created_at`;
    return rows.map((r) => r.id);
  }

  private async loadMembers(familyId: string, memberId: string | null): Promise<FamilyMember[]> {
    const sql = getSql();
    const filter = memberId === null ? sql`` : sql`AND fm.id = ${memberId}`;

    const rows = await sql<MemberRow[]>`
      SELECT fm.id, fm.family_id, fm.name, fm.relationship, fm.color,
             fm.daily_step_goal, fm.weekly_step_goal, fm.monthly_step_goal,
             fm.heart_rate, fm.resting_heart_rate, fm.mood_score,
             fm.current_streak, fm.best_streak, fm.goal_days,
             fm.workouts_completed, fm.updated_at
      FROM family_members fm
      WHERE fm.family_id = ${familyId} ${filter}
      ORDER BY fm.created_at, fm.name
    `;
    if (rows.length === 0) return [];

    const metricRows = await sql<MetricRow[]>`
      SELECT mpm.member_id, mpm.period, mpm.steps, mpm.calories,
             mpm.distance_km::float8     AS distance_km,
             mpm.active_minutes,
             mpm.sleep_hours::float8     AS sleep_hours,
             mpm.water_liters::float8    AS water_liters,
             mpm.hydration_ml,
             mpm.workout_minutes::float8 AS workout_minutes
      FROM member_period_metrics mpm
      JOIN family_members fm ON fm.id = mpm.member_id
      WHERE fm.family_id = ${familyId} ${filter}
    `;

    const milestoneRows = await sql<MilestoneRow[]>`
      SELECT ms.member_id, ms.kind, ms.milestone_key,
             ms.progress::float8 AS progress, ms.unlocked_at
      FROM member_milestones ms
      JOIN family_members fm ON fm.id = ms.member_id
      WHERE fm.family_id = ${familyId} ${filter}
    `;

    return assembleMembers(rows, metricRows, milestoneRows);
  }

  listMembers(familyId: string): Promise<FamilyMember[]> {
    return this.loadMembers(familyId, null);
  }

  async getMember(familyId: string, memberId: string): Promise<FamilyMember | null> {
    const [member] = await this.loadMembers(familyId, memberId);
    return member ?? null;
  }

  async saveMember(member: FamilyMember): Promise<void> {
    await getSql().begin(async (tx) => {
      await tx`
        INSERT INTO family_members (
          id, family_id, name, relationship, color,
          daily_step_goal, weekly_step_goal, monthly_step_goal,
          heart_rate, resting_heart_rate, mood_score,
          current_streak, best_streak, goal_days, workouts_completed, updated_at
        ) VALUES (
          ${member.id}, ${member.family_id}, ${member.name}, ${member.relationship}, ${member.color},
          ${member.daily_step_goal}, ${member.weekly_step_goal}, ${member.monthly_step_goal},
          ${member.heart_rate}, ${member.resting_heart_rate}, ${member.mood_score},
          ${member.streak.current}, ${member.streak.best}, ${member.streak.goal_days},
          ${member.workouts_completed}, ${member.updated_at}
        )
        ON CONFLICT (id) DO UPDATE SET
          name               = EXCLUDED.name,
          relationship       = EXCLUDED.relationship,
          color              = EXCLUDED.color,
          daily_step_goal    = EXCLUDED.daily_step_goal,
          weekly_step_goal   = EXCLUDED.weekly_step_goal,
          monthly_step_goal  = EXCLUDED.monthly_step_goal,
          heart_rate         = EXCLUDED.heart_rate,
          resting_heart_rate = EXCLUDED.resting_heart_rate,
          mood_score         = EXCLUDED.mood_score,
          current_streak     = EXCLUDED.current_streak,
          best_streak        = EXCLUDED.best_streak,
          goal_days          = EXCLUDED.goal_days,
          workouts_completed = EXCLUDED.workouts_completed,
          updated_at         = EXCLUDED.updated_at
      `;

      for (const period of METRIC_PERIODS) {
        const p = member.metrics[period];
        await tx`
          INSERT INTO member_period_metrics (
            member_id, period, steps, calories, distance_km, active_minutes,
            sleep_hours, water_liters, hydration_ml, workout_minutes
          ) VALUES (
            ${member.id}, ${period}, ${p.steps}, ${p.calories}, ${p.distance_km}, ${p.active_minutes},
            ${p.sleep_hours}, ${p.water_liters}, ${p.hydration_ml}, ${p.workout_minutes}
          )
          ON CONFLICT (member_id, period) DO UPDATE SET
            steps           = EXCLUDED.steps,
            calories        = EXCLUDED.calories,
            distance_km     = EXCLUDED.distance_km,
            active_minutes  = EXCLUDED.active_minutes,
            sleep_hours     = EXCLUDED.sleep_hours,
            water_liters    = EXCLUDED.water_liters,
            hydration_ml    = EXCLUDED.hydration_ml,
            workout_minutes = EXCLUDED.workout_minutes,
            updated_at      = NOW()
        `;
      }

      // An unlock, once stored, keeps its original timestamp
      for (const badge of member.badges) {
        if (!badge.unlocked_at) continue;
        await tx`
          INSERT INTO member_milestones (member_id, kind, milestone_key, progress, unlocked_at)
          VALUES (${member.id}, 'badge', ${badge.key}, 1, ${badge.unlocked_at})
          ON CONFLICT (member_id, kind, milestone_key) DO NOTHING
        `;
      }
      for (const a of member.achievements) {
        await tx`
          INSERT INTO member_milestones (member_id, kind, milestone_key, progress, unlocked_at)
          VALUES (${member.id}, 'achievement', ${a.key}, ${a.progress}, ${a.unlocked_at})
          ON CONFLICT (member_id, kind, milestone_key) DO UPDATE SET
            progress    = EXCLUDED.progress,
            unlocked_at = COALESCE(member_milestones.unlocked_at, EXCLUDED.unlocked_at)
        `;
      }
    });
  }

  async listWorkouts(memberId: string): Promise<Workout[]> {
    const rows = await getSql()<WorkoutRow[]>`
      SELECT id, member_id, name, type, duration_seconds, calories,
             distance_km::float8 AS distance_km, heart_rate_samples,
             started_at, ended_at, is_active
      FROM workouts
      WHERE member_id = ${memberId}
      ORDER BY ended_at DESC
    `;
    return rows.map(toWorkout);
  }

  async addWorkout(w: Workout): Promise<void> {
    await getSql()`
      INSERT INTO workouts (
        id, member_id, name, type, duration_seconds, calories, distance_km,
        heart_rate_samples, started_at, ended_at, is_active
      ) VALUES (
        ${w.id}, ${w.member_id}, ${w.name}, ${w.type}, ${w.duration_seconds}, ${w.calories},
        ${w.distance_km}, ${w.heart_rate_samples}, ${w.started_at}, ${w.ended_at}, ${w.is_active}
      )
    `;
  }

  private async loadChallenges(familyId: string, challengeId: string | null): Promise<FamilyChallenge[]> {
    const sql = getSql();
    const filter = challengeId === null ? sql`` : sql`AND fc.id = ${challengeId}`;

    const rows = await sql<ChallengeRow[]>`
      SELECT fc.id, fc.family_id, fc.title, fc.metric,
             fc.target_value::float8 AS target_value,
             fc.starts_at, fc.ends_at, fc.created_at
      FROM family_challenges fc
      WHERE fc.family_id = ${familyId} ${filter}
      ORDER BY fc.starts_at
    `;
    if (rows.length === 0) return [];

    const participants = await sql<ParticipantRow[]>`
      SELECT cp.challenge_id, cp.member_id, cp.progress::float8 AS progress
      FROM challenge_participants cp
      JOIN family_challenges fc ON fc.id = cp.challenge_id
      WHERE fc.family_id = ${familyId} ${filter}
    `;

    return rows.map((row) => toChallenge(row, participants));
  }

  listChallenges(familyId: string): Promise<FamilyChallenge[]> {
    return this.loadChallenges(familyId, null);
  }

  async getChallenge(familyId: string, challengeId: string): Promise<FamilyChallenge | null> {
    const [challenge] = await this.loadChallenges(familyId, challengeId);
    return challenge ?? null;
  }

  async saveChallenge(c: FamilyChallenge): Promise<void> {
    await getSql().begin(async (tx) => {
      await tx`
        INSERT INTO family_challenges (id, family_id, title, metric, target_value, starts_at, ends_at, created_at)
        VALUES (
          ${c.id}, ${c.family_id}, ${c.title}, ${c.metric}, ${c.target_value},
          ${c.starts_at}, ${c.ends_at}, ${c.created_at}
        )
        ON CONFLICT (id) DO UPDATE SET
          title        = EXCLUDED.title,
          target_value = EXCLUDED.target_value,
          starts_at    = EXCLUDED.starts_at,
          ends_at      = EXCLUDED.ends_at
      `;
      for (const [memberId, progress] of Object.entries(c.participants)) {
        await tx`
          INSERT INTO challenge_participants (challenge_id, member_id, progress)
          VALUES (${c.id}, ${memberId}, ${progress})
          ON CONFLICT (challenge_id, member_id) DO UPDATE SET progress = EXCLUDED.progress
        `;
      }
    });
  }

  async getPet(familyId: string): Promise<Pet | null> {
    const [row] = await getSql()<PetRow[]>`
      SELECT family_id, name, type, hunger, energy, mood, last_interaction_at
      FROM pets
      WHERE family_id = ${familyId}
    `;
    if (!row) return null;
    return {
      family_id: row.family_id,
      name: row.name,
      type: PetTypeSchema.parse(row.type),
      hunger: row.hunger,
      energy: row.energy,
      mood: PetMoodSchema.parse(row.mood),
      last_interaction_at: row.last_interaction_at.toISOString(),
    };
  }

  async savePet(pet: Pet): Promise<void> {
    await getSql()`
      INSERT INTO pets (family_id, name, type, hunger, energy, mood, last_interaction_at)
      VALUES (
        ${pet.family_id}, ${pet.name}, ${pet.type}, ${pet.hunger}, ${pet.energy},
        ${pet.mood}, ${pet.last_interaction_at}
      )
      ON CONFLICT (family_id) DO UPDATE SET
        hunger              = EXCLUDED.hunger,
        energy              = EXCLUDED.energy,
        mood                = EXCLUDED.mood,
        last_interaction_at = EXCLUDED.last_interaction_at
    `;
  }

  async close(): Promise<void> {
    await closeDb();
  }
}
