// =============================================================================
// Kinstep — Shared Constants
// =============================================================================

import type {
  AchievementDefinition,
  BadgeDefinition,
  HealthFactorRule,
} from '../types/index.js';

// ---------------------------------------------------------------------------
// Goals
// ---------------------------------------------------------------------------

export const DEFAULT_GOALS = {
  DAILY_STEPS: 10_000,
  WEEKLY_STEPS: 70_000,
  MONTHLY_STEPS: 300_000,
  /** Activity ring targets on the dashboard */
  DAILY_CALORIES: 500,
  DAILY_ACTIVE_MINUTES: 30,
} as const;

// ---------------------------------------------------------------------------
// Badge catalog
// Thresholds are inclusive: a metric equal to the threshold unlocks the badge.
// ---------------------------------------------------------------------------

export const BADGE_CATALOG: readonly BadgeDefinition[] = [
  {
    key: 'STEPS_5K',
    name: 'Step Starter',
    description: 'Walk 5,000 steps in a day',
    icon: 'figure.walk',
    metric: 'steps',
    threshold: 5_000,
  },
  {
    key: 'STEPS_10K',
    name: '10K Steps',
    description: 'Walk 10,000 steps in a day',
    icon: 'figure.walk.motion',
    metric: 'steps',
    threshold: 10_000,
  },
  {
    key: 'STEPS_20K',
    name: '20K Steps',
    description: 'Walk 20,000 steps in a day',
    icon: 'shoeprints.fill',
    metric: 'steps',
    threshold: 20_000,
  },
  {
    key: 'CALORIES_500',
    name: 'Calorie Crusher',
    description: 'Burn 500 active calories in a day',
    icon: 'flame.fill',
    metric: 'calories',
    threshold: 500,
  },
  {
    key: 'DISTANCE_5K',
    name: '5K Distance',
    description: 'Cover 5 km in a day',
    icon: 'map.fill',
    metric: 'distance_km',
    threshold: 5,
  },
  {
    key: 'SLEEP_8H',
    name: 'Well Rested',
    description: 'Sleep 8 hours in a night',
    icon: 'bed.double.fill',
    metric: 'sleep_hours',
    threshold: 8,
  },
  {
    key: 'STREAK_7',
    name: 'Week Warrior',
    description: 'Hit your step goal 7 days in a row',
    icon: 'calendar',
    metric: 'streak_days',
    threshold: 7,
  },
  {
    key: 'STREAK_30',
    name: 'Monthly Master',
    description: 'Hit your step goal 30 days in a row',
    icon: 'crown.fill',
    metric: 'streak_days',
    threshold: 30,
  },
] as const;

export const ACHIEVEMENT_CATALOG: readonly AchievementDefinition[] = [
  {
    key: 'FIRST_STEPS',
    name: 'First Steps',
    description: 'Complete your first workout',
    icon: 'figure.walk',
    metric: 'workouts_completed',
    threshold: 1,
  },
  {
    key: 'STREAK_MASTER',
    name: 'Streak Master',
    description: 'Maintain a 7-day streak',
    icon: 'flame.fill',
    metric: 'streak_days',
    threshold: 7,
  },
  {
    key: 'GOAL_CRUSHER',
    name: 'Goal Crusher',
    description: 'Hit your daily goal 5 times',
    icon: 'target',
    metric: 'goal_days',
    threshold: 5,
  },
] as const;

// ---------------------------------------------------------------------------
// Health score bands
//
// Each factor is an ordered list of bands; the first band containing the
// value wins. Values outside every band contribute 0.
//
// Over-allocation: max possible = 105 (steps can reach 30), capped at 100.
// ---------------------------------------------------------------------------

export const HEALTH_SCORE_RULES: readonly HealthFactorRule[] = [
  {
    rule: 'STEPS',
    label: 'Daily steps',
    input: 'steps',
    weight: 30,
    bands: [
      { min: 15_000, points: 30 },
      { min: 10_000, points: 25 },
      { min: 7_500, points: 20 },
      { min: 5_000, points: 15 },
      { min: 2_500, points: 8 },
    ],
  },
  {
    rule: 'RESTING_HEART_RATE',
    label: 'Resting heart rate',
    input: 'resting_heart_rate',
    weight: 15,
    bands: [
      { min: 60, max: 80, points: 15 },
      { min: 50, max: 90, points: 10 },
      { min: 40, max: 100, points: 5 },
    ],
  },
  {
    rule: 'SLEEP',
    label: 'Sleep duration',
    input: 'sleep_hours',
    weight: 20,
    bands: [
      { min: 7, max: 9, points: 20 },
      { min: 6, max: 10, points: 12 },
      { min: 5, max: 6, points: 6 },
    ],
  },
  {
    rule: 'WORKOUT_MINUTES',
    label: 'Workout minutes',
    input: 'workout_minutes',
    weight: 15,
    bands: [
      { min: 30, points: 15 },
      { min: 20, points: 10 },
      { min: 10, points: 5 },
    ],
  },
  {
    rule: 'MOOD',
    label: 'Mood',
    input: 'mood_score',
    weight: 15,
    bands: [
      { min: 8, points: 15 },
      { min: 6, points: 10 },
      { min: 4, points: 5 },
    ],
  },
  {
    rule: 'WATER',
    label: 'Water intake',
    input: 'water_liters',
    weight: 10,
    bands: [
      { min: 2.5, points: 10 },
      { min: 2.0, points: 7 },
      { min: 1.5, points: 4 },
    ],
  },
] as const;

export const HEALTH_SCORE_MAX = 100;

/** Lower bounds for the score bands, highest first. */
export const HEALTH_SCORE_BANDS = [
  { min: 85, band: 'excellent' },
  { min: 70, band: 'good' },
  { min: 50, band: 'fair' },
] as const;

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

export const SIMULATION = {
  /** Max steps added per tick per member */
  MAX_STEPS_PER_TICK: 5,
  KM_PER_STEP: 0.0008,
  STEPS_PER_CALORIE: 20,
  STEPS_PER_ACTIVE_MINUTE: 100,
  HEART_RATE_DRIFT: 2,
  HEART_RATE_MIN: 60,
  HEART_RATE_MAX: 180,
  MAX_HYDRATION_ML_PER_TICK: 10,
  /** Family steps per tick that earn the pet 1 energy */
  PET_STEPS_PER_ENERGY: 1_000,
} as const;

export const PET_RULES = {
  STAT_MIN: 0,
  STAT_MAX: 100,
  LOW_THRESHOLD: 30,
  HAPPY_THRESHOLD: 60,
  FEED_HUNGER: 25,
  PLAY_ENERGY_COST: 15,
  PLAY_HUNGER_COST: 10,
  REST_ENERGY: 30,
  DECAY_HUNGER_MAX: 3,
  DECAY_ENERGY_MAX: 2,
} as const;

// ---------------------------------------------------------------------------
// App-wide limits
// ---------------------------------------------------------------------------

export const LIMITS = {
  MOOD_MIN: 1,
  MOOD_MAX: 10,
  SLEEP_MIN_HOURS: 0,
  SLEEP_MAX_HOURS: 24,
  HEART_RATE_MIN: 20,
  HEART_RATE_MAX: 250,
  WATER_MAX_LITERS: 15,
  WORKOUT_MAX_SECONDS: 24 * 60 * 60,
  CHALLENGE_TITLE_MAX_CHARS: 120,
  CHALLENGE_MAX_PARTICIPANTS: 20,
  /** Workout heart-rate sample recorded when none are supplied */
  DEFAULT_WORKOUT_HR_MIN: 120,
  DEFAULT_WORKOUT_HR_MAX: 160,
} as const;

// ---------------------------------------------------------------------------
// API versioning
// ---------------------------------------------------------------------------

export const API_VERSION = 'v1' as const;
export const API_PREFIX = `/api/${API_VERSION}` as const;

// ---------------------------------------------------------------------------
// WebSocket / pub-sub events
// ---------------------------------------------------------------------------

export const WS_EVENTS = {
  MEMBER_METRICS_UPDATED: 'member.metrics_updated',
  BADGE_UNLOCKED: 'badge.unlocked',
  CHALLENGE_UPDATED: 'challenge.updated',
  PET_UPDATED: 'pet.updated',
  PING: 'ping',
  PONG: 'pong',
} as const;

export type WsEvent = (typeof WS_EVENTS)[keyof typeof WS_EVENTS];

/** Redis channel prefix for per-family event fan-out. */
export const FAMILY_CHANNEL_PREFIX = 'kinstep:family:' as const;
