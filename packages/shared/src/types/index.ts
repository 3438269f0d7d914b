// =============================================================================
// Kinstep — Shared Entity Types
// Mirrors migrations/001_initial.sql. Keep in sync with DB migrations.
// =============================================================================

// Enum unions are defined in schemas/index.ts (Zod-derived).
import type {
  ChallengeMetric,
  MetricPeriod,
  PetMood,
  PetType,
  Relationship,
  WorkoutType,
} from '../schemas/index.js';

// ---------------------------------------------------------------------------
// Milestones (badges + achievements)
// ---------------------------------------------------------------------------

export type MilestoneMetric =
  | 'steps'
  | 'calories'
  | 'distance_km'
  | 'sleep_hours'
  | 'streak_days'
  | 'goal_days'
  | 'workouts_completed';

export type MetricSnapshot = Record<MilestoneMetric, number>;

export interface BadgeDefinition {
  key: string;
  name: string;
  description: string;
  icon: string; // SF Symbol name rendered by the clients
  metric: MilestoneMetric;
  threshold: number;
}

export type AchievementDefinition = BadgeDefinition;

export interface Badge extends BadgeDefinition {
  is_unlocked: boolean;
  unlocked_at: string | null; // ISO 8601
}

export interface Achievement extends Badge {
  progress: number; // 0–1
}

// ---------------------------------------------------------------------------
// Family members
// ---------------------------------------------------------------------------

export interface PeriodMetrics {
  steps: number;
  calories: number;
  distance_km: number;
  active_minutes: number;
  sleep_hours: number;
  water_liters: number;
  hydration_ml: number;
  workout_minutes: number;
}

export interface StreakState {
  current: number;
  best: number;
  goal_days: number;
}

export interface FamilyMember {
  id: string;
  family_id: string;
  name: string;
  relationship: Relationship;
  color: string; // hex
  daily_step_goal: number;
  weekly_step_goal: number;
  monthly_step_goal: number;
  heart_rate: number;
  resting_heart_rate: number | null;
  mood_score: number | null;
  metrics: Record<MetricPeriod, PeriodMetrics>;
  streak: StreakState;
  workouts_completed: number;
  badges: Badge[];
  achievements: Achievement[];
  updated_at: string;
}

// ---------------------------------------------------------------------------
// Workouts
// ---------------------------------------------------------------------------

export interface Workout {
  id: string;
  member_id: string;
  name: string;
  type: WorkoutType;
  duration_seconds: number;
  calories: number;
  distance_km: number | null;
  heart_rate_samples: number[];
  started_at: string;
  ended_at: string;
  is_active: boolean;
}

export interface WorkoutSummary extends Workout {
  duration_minutes: number;
  average_heart_rate: number | null;
  peak_heart_rate: number | null;
}

// ---------------------------------------------------------------------------
// Challenges
// ---------------------------------------------------------------------------

export interface FamilyChallenge {
  id: string;
  family_id: string;
  title: string;
  metric: ChallengeMetric;
  target_value: number;
  participants: Record<string, number>; // member_id → progress
  starts_at: string;
  ends_at: string;
  created_at: string;
}

export type ChallengeStatus = 'upcoming' | 'active' | 'ended';

export interface LeaderboardEntry {
  member_id: string;
  progress: number;
  rank: number;
}

export interface ChallengeView extends FamilyChallenge {
  total_progress: number;
  completion_percentage: number; // 0–100
  is_complete: boolean;
  status: ChallengeStatus;
  leaderboard: LeaderboardEntry[];
}

// ---------------------------------------------------------------------------
// Pet companion
// ---------------------------------------------------------------------------

export interface Pet {
  family_id: string;
  name: string;
  type: PetType;
  hunger: number; // 0–100, 100 = full
  energy: number; // 0–100
  mood: PetMood;
  last_interaction_at: string;
}

// ---------------------------------------------------------------------------
// Health score
// ---------------------------------------------------------------------------

export type HealthInputKey =
  | 'steps'
  | 'resting_heart_rate'
  | 'sleep_hours'
  | 'workout_minutes'
  | 'mood_score'
  | 'water_liters';

export type HealthScoreInput = Partial<Record<HealthInputKey, number | null>>;

export interface ScoreBand {
  min: number;
  max?: number; // inclusive; open-ended when omitted
  points: number;
}

export interface HealthFactorRule {
  rule: string;
  label: string;
  input: HealthInputKey;
  weight: number;
  bands: readonly ScoreBand[];
}

export interface HealthFactor {
  rule: string;
  label: string;
  weight: number;
  contribution: number;
  value: number | null;
  detail: string;
}

export type HealthBand = 'excellent' | 'good' | 'fair' | 'needs_attention';

export interface HealthScoreResult {
  score: number; // 0–100 (capped)
  raw_score: number; // uncapped sum of contributions
  band: HealthBand;
  factors: HealthFactor[];
  computed_at: string;
}

// ---------------------------------------------------------------------------
// Dashboard views
// ---------------------------------------------------------------------------

export interface RingProgress {
  current: number;
  goal: number;
  progress: number; // 0–1
}

export interface ActivityRings {
  steps: RingProgress;
  calories: RingProgress;
  active_minutes: RingProgress;
}

export type HeartRateZone = 'resting' | 'light' | 'moderate' | 'vigorous' | 'maximum';

export type SleepQuality = 'excellent' | 'good' | 'fair' | 'poor';

export interface MemberOverview extends FamilyMember {
  health_score: HealthScoreResult;
  rings: ActivityRings;
  heart_rate_zone: HeartRateZone;
  sleep_quality: SleepQuality;
}

export interface FamilySummary {
  family_id: string;
  member_count: number;
  total_steps_today: number;
  average_health_score: number;
  step_leader: { member_id: string; name: string; steps: number } | null;
  members: MemberOverview[];
}

// ---------------------------------------------------------------------------
// API response envelope
// ---------------------------------------------------------------------------

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ApiResponse<T> = ApiSuccess<T> | ApiError;
