// =============================================================================
// Kinstep API — Banded Health Score
//
// Computes a composite 0–100 health score from six independent factors.
// Each factor looks its value up in an ordered list of bands (see
// HEALTH_SCORE_RULES in @kinstep/shared); the first matching band gives the
// factor's points.
//
// Over-allocation: max possible = 105, capped at 100.
//
// Scoring bands:
//   85–100  Excellent
//   70–84   Good
//   50–69   Fair
//    0–49   Needs attention
// =============================================================================

import {
  HEALTH_SCORE_BANDS,
  HEALTH_SCORE_MAX,
  HEALTH_SCORE_RULES,
  type FamilyMember,
  type HealthBand,
  type HealthFactor,
  type HealthFactorRule,
  type HealthScoreInput,
  type HealthScoreResult,
  type ScoreBand,
} from '@kinstep/shared';
import { clamp } from './progress.js';

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function bandPoints(value: number, bands: readonly ScoreBand[]): number {
  for (const band of bands) {
    if (value >= band.min && (band.max === undefined || value <= band.max)) {
      return band.points;
    }
  }
  return 0;
}

function readInput(input: HealthScoreInput, rule: HealthFactorRule): number | null {
  const value = input[rule.input];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function evaluateFactor(rule: HealthFactorRule, input: HealthScoreInput): HealthFactor {
  const value = readInput(input, rule);
  const contribution =
    value === null || value < 0 ? 0 : Math.min(rule.weight, bandPoints(value, rule.bands));

  return {
    rule: rule.rule,
    label: rule.label,
    weight: rule.weight,
    contribution,
    value,
    detail: `${rule.label}: ${value === null ? 'not recorded' : String(value)} (${contribution}/${rule.weight})`,
  };
}

export function scoreToBand(score: number): HealthBand {
  for (const { min, band } of HEALTH_SCORE_BANDS) {
    if (score >= min) return band;
  }
  return 'needs_attention';
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function computeHealthScore(
  input: HealthScoreInput,
  now: Date = new Date(),
): HealthScoreResult {
  const factors = HEALTH_SCORE_RULES.map((rule) => evaluateFactor(rule, input));
  const rawScore = factors.reduce((sum, f) => sum + f.contribution, 0);
  const score = Math.round(clamp(rawScore, 0, HEALTH_SCORE_MAX));

  return {
    score,
    raw_score: rawScore,
    band: scoreToBand(score),
    factors,
    computed_at: now.toISOString(),
  };
}

/** Today's figures for a member; resting heart rate falls back to the live reading. */
export function healthInputFromMember(member: FamilyMember): HealthScoreInput {
  const today = member.metrics.today;
  return {
    steps: today.steps,
    resting_heart_rate: member.resting_heart_rate ?? member.heart_rate,
    sleep_hours: today.sleep_hours,
    workout_minutes: today.workout_minutes,
    mood_score: member.mood_score,
    water_liters: today.water_liters,
  };
}
