// =============================================================================
// Kinstep — Seed the record store with the sample family
// Usage: npm run db:seed (from packages/db)
// Idempotent: existing rows are updated in place.
// =============================================================================

import { getSql, closeDb } from './client.js';
import { loadSampleFamily, sampleChallengeWindow, sampleWorkoutWindow } from './sample.js';

const PERIODS = ['today', 'weekly', 'monthly'] as const;

async function seed(): Promise<void> {
  const sql = getSql();
  const sample = loadSampleFamily();
  const now = new Date();

  console.log(`Seeding sample family "${sample.family.name}"…`);

  await sql.begin(async (tx) => {
    await tx`
      INSERT INTO families (id, name)
      VALUES (${sample.family.id}, ${sample.family.name})
      ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name
    `;

    for (const m of sample.members) {
      await tx`
        INSERT INTO family_members (
          id, family_id, name, relationship, color, daily_step_goal,
          heart_rate, resting_heart_rate, mood_score,
          current_streak, best_streak, goal_days, workouts_completed
        ) VALUES (
          ${m.id}, ${sample.family.id}, ${m.name}, ${m.relationship}, ${m.color},
          ${m.daily_step_goal ?? 10000}, ${m.heart_rate ?? 72},
          ${m.resting_heart_rate ?? null}, ${m.mood_score ?? null},
          ${m.streak.current}, ${m.streak.best}, ${m.streak.goal_days}, ${m.workouts_completed}
        )
        ON CONFLICT (id) DO UPDATE SET
          name               = EXCLUDED.name,
          relationship       = EXCLUDED.relationship,
          color              = EXCLUDED.color,
          daily_step_goal    = EXCLUDED.daily_step_goal,
          heart_rate         = EXCLUDED.heart_rate,
          resting_heart_rate = EXCLUDED.resting_heart_rate,
          mood_score         = EXCLUDED.mood_score,
          current_streak     = EXCLUDED.current_streak,
          best_streak        = EXCLUDED.best_streak,
          goal_days          = EXCLUDED.goal_days,
          workouts_completed = EXCLUDED.workouts_completed,
          updated_at         = NOW()
      `;

      for (const period of PERIODS) {
        const p = m.metrics[period];
        await tx`
          INSERT INTO member_period_metrics (
            member_id, period, steps, calories, distance_km, active_minutes,
            sleep_hours, water_liters, hydration_ml, workout_minutes
          ) VALUES (
            ${m.id}, ${period}, ${p.steps}, ${p.calories}, ${p.distance_km}, ${p.active_minutes},
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

      for (const key of m.unlocked_badges) {
        await tx`
          INSERT INTO member_milestones (member_id, kind, milestone_key, progress, unlocked_at)
          VALUES (${m.id}, 'badge', ${key}, 1, NOW())
          ON CONFLICT (member_id, kind, milestone_key) DO NOTHING
        `;
      }
    }

    for (const w of sample.workouts) {
      const window = sampleWorkoutWindow(w, now);
      await tx`
        INSERT INTO workouts (
          id, member_id, name, type, duration_seconds, calories, distance_km,
          heart_rate_samples, started_at, ended_at, is_active
        ) VALUES (
          ${w.id}, ${w.member_id}, ${w.name}, ${w.type}, ${w.duration_seconds}, ${w.calories},
          ${w.distance_km}, ${w.heart_rate_samples}, ${window.started_at}, ${window.ended_at}, FALSE
        )
        ON CONFLICT (id) DO NOTHING
      `;
    }

    for (const c of sample.challenges) {
      const window = sampleChallengeWindow(c, now);
      await tx`
        INSERT INTO family_challenges (id, family_id, title, metric, target_value, starts_at, ends_at)
        VALUES (
          ${c.id}, ${sample.family.id}, ${c.title}, ${c.metric}, ${c.target_value},
          ${window.starts_at}, ${window.ends_at}
        )
        ON CONFLICT (id) DO UPDATE SET
          starts_at = EXCLUDED.starts_at,
          ends_at   = EXCLUDED.ends_at
      `;
      for (const [memberId, progress] of Object.entries(c.participants)) {
        await tx`
          INSERT INTO challenge_participants (challenge_id, member_id, progress)
          VALUES (${c.id}, ${memberId}, ${progress})
          ON CONFLICT (challenge_id, member_id) DO UPDATE SET progress = EXCLUDED.progress
        `;
      }
    }

    await tx`
      INSERT INTO pets (family_id, name, type, hunger, energy, mood)
      VALUES (
        ${sample.family.id}, ${sample.pet.name}, ${sample.pet.type},
        ${sample.pet.hunger}, ${sample.pet.energy}, 'happy'
      )
      ON CONFLICT (family_id) DO NOTHING
    `;
  });

  console.log(`  ✓ ${sample.members.length} members, ${sample.workouts.length} workouts, ${sample.challenges.length} challenges`);
}

void seed()
  .catch((err: unknown) => {
    console.error('Seed failed:', err);
    process.exitCode = 1;
  })
  .finally(() => closeDb());
