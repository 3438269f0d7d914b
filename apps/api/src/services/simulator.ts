// =============================================================================
// Kinstep API — Simulated activity
//
// Each tick adds a few steps, a heart-rate drift and a sip of water.
// Derived figures: 0.8 m per step, 20 steps per kcal, 100 steps per active
// minute. Random draws, in order: steps, heart-rate drift, hydration.
// =============================================================================

import { SIMULATION, type FamilyMember, type PeriodMetrics } from '@kinstep/shared';
import type { ActivityDeltas } from './challenges.js';
import { roundTo } from './members.js';
import { clamp } from './progress.js';
import { randomInt, type RandomSource } from './random.js';

export interface TickDeltas extends ActivityDeltas {
  steps: number;
  calories: number;
  distance_km: number;
  active_minutes: number;
  hydration_ml: number;
}

function addDeltas(period: PeriodMetrics, d: TickDeltas): PeriodMetrics {
  const hydration = period.hydration_ml + d.hydration_ml;
  return {
    ...period,
    steps: period.steps + d.steps,
    calories: period.calories + d.calories,
    distance_km: roundTo(period.distance_km + d.distance_km, 4),
    active_minutes: period.active_minutes + d.active_minutes,
    hydration_ml: hydration,
    water_liters: roundTo(period.water_liters + d.hydration_ml / 1000, 3),
  };
}

export function simulateTick(
  member: FamilyMember,
  random: RandomSource = Math.random,
  now: Date = new Date(),
): { member: FamilyMember; deltas: TickDeltas } {
  const today = member.metrics.today;

  const stepDelta = randomInt(0, SIMULATION.MAX_STEPS_PER_TICK, random);
  const heartRateDrift = randomInt(-SIMULATION.HEART_RATE_DRIFT, SIMULATION.HEART_RATE_DRIFT, random);
  const hydrationDelta = randomInt(0, SIMULATION.MAX_HYDRATION_ML_PER_TICK, random);

  const steps = today.steps + stepDelta;
  // Manual readings may already be ahead of the step-derived figure
  const calories = Math.max(today.calories, Math.floor(steps / SIMULATION.STEPS_PER_CALORIE));
  const activeMinutes = Math.max(
    today.active_minutes,
    Math.floor(steps / SIMULATION.STEPS_PER_ACTIVE_MINUTE),
  );

  const deltas: TickDeltas = {
    steps: stepDelta,
    calories: calories - today.calories,
    distance_km: stepDelta * SIMULATION.KM_PER_STEP,
    active_minutes: activeMinutes - today.active_minutes,
    hydration_ml: hydrationDelta,
  };

  return {
    member: {
      ...member,
      heart_rate: clamp(
        member.heart_rate + heartRateDrift,
        SIMULATION.HEART_RATE_MIN,
        SIMULATION.HEART_RATE_MAX,
      ),
      metrics: {
        today: addDeltas(today, deltas),
        weekly: addDeltas(member.metrics.weekly, deltas),
        monthly: addDeltas(member.metrics.monthly, deltas),
      },
      updated_at: now.toISOString(),
    },
    deltas,
  };
}
