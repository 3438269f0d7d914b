// =============================================================================
// Kinstep — Zod Validation Schemas
// Used for API request validation and for loading the sample family data.
// =============================================================================

import { z } from 'zod';
import { LIMITS } from '../constants/index.js';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const UuidSchema = z.string().uuid();

export const IsoDateTimeSchema = z.string().datetime({ offset: true });

export const HexColorSchema = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, 'Must be a hex colour such as #34c759');

export const MoodScoreSchema = z.number().int().min(LIMITS.MOOD_MIN).max(LIMITS.MOOD_MAX);

export const HeartRateSchema = z
  .number()
  .int()
  .min(LIMITS.HEART_RATE_MIN)
  .max(LIMITS.HEART_RATE_MAX);

// ---------------------------------------------------------------------------
// Enums (mirror PostgreSQL CHECK constraints)
// ---------------------------------------------------------------------------

export const RelationshipSchema = z.enum([
  'self',
  'partner',
  'parent',
  'child',
  'sibling',
  'grandparent',
  'other',
]);
export type Relationship = z.infer<typeof RelationshipSchema>;

export const MetricPeriodSchema = z.enum(['today', 'weekly', 'monthly']);
export type MetricPeriod = z.infer<typeof MetricPeriodSchema>;

export const WorkoutTypeSchema = z.enum([
  'running',
  'cycling',
  'walking',
  'hiit',
  'yoga',
  'swimming',
]);
export type WorkoutType = z.infer<typeof WorkoutTypeSchema>;

export const ChallengeMetricSchema = z.enum([
  'steps',
  'calories',
  'distance_km',
  'active_minutes',
  'workout_minutes',
]);
export type ChallengeMetric = z.infer<typeof ChallengeMetricSchema>;

export const PetTypeSchema = z.enum(['cat', 'dog', 'bird', 'robot']);
export type PetType = z.infer<typeof PetTypeSchema>;

export const PetMoodSchema = z.enum(['happy', 'hungry', 'sleepy', 'sad']);
export type PetMood = z.infer<typeof PetMoodSchema>;

export const PetActionSchema = z.enum(['feed', 'play', 'rest']);
export type PetAction = z.infer<typeof PetActionSchema>;

// ---------------------------------------------------------------------------
// Member metrics
// ---------------------------------------------------------------------------

export const UpdateMetricsSchema = z
  .object({
    steps: z.number().int().min(0).optional(),
    calories: z.number().int().min(0).optional(),
    distance_km: z.number().min(0).optional(),
    active_minutes: z.number().int().min(0).optional(),
    sleep_hours: z.number().min(LIMITS.SLEEP_MIN_HOURS).max(LIMITS.SLEEP_MAX_HOURS).optional(),
    water_liters: z.number().min(0).max(LIMITS.WATER_MAX_LITERS).optional(),
    heart_rate: HeartRateSchema.optional(),
    resting_heart_rate: HeartRateSchema.nullable().optional(),
    mood_score: MoodScoreSchema.nullable().optional(),
  })
  .refine((v) => Object.keys(v).length > 0, { message: 'At least one metric is required' });
export type UpdateMetricsInput = z.infer<typeof UpdateMetricsSchema>;

export const HealthScoreInputSchema = z.object({
  steps: z.number().nullable().optional(),
  resting_heart_rate: z.number().nullable().optional(),
  sleep_hours: z.number().nullable().optional(),
  workout_minutes: z.number().nullable().optional(),
  mood_score: z.number().nullable().optional(),
  water_liters: z.number().nullable().optional(),
});

// ---------------------------------------------------------------------------
// Workouts
// ---------------------------------------------------------------------------

export const CreateWorkoutSchema = z.object({
  name: z.string().trim().min(1).max(100),
  type: WorkoutTypeSchema,
  duration_seconds: z.number().int().min(1).max(LIMITS.WORKOUT_MAX_SECONDS),
  calories: z.number().int().min(0).default(0),
  distance_km: z.number().positive().nullable().optional(),
  heart_rate_samples: z.array(HeartRateSchema).max(1_000).optional(),
  ended_at: IsoDateTimeSchema.optional(),
});
export type CreateWorkoutInput = z.infer<typeof CreateWorkoutSchema>;

// ---------------------------------------------------------------------------
// Challenges
// ---------------------------------------------------------------------------

export const CreateChallengeSchema = z
  .object({
    title: z.string().trim().min(1).max(LIMITS.CHALLENGE_TITLE_MAX_CHARS),
    metric: ChallengeMetricSchema,
    target_value: z.number().positive(),
    participant_ids: z.array(UuidSchema).min(1).max(LIMITS.CHALLENGE_MAX_PARTICIPANTS),
    starts_at: IsoDateTimeSchema,
    ends_at: IsoDateTimeSchema,
  })
  .refine((v) => Date.parse(v.ends_at) > Date.parse(v.starts_at), {
    message: 'ends_at must be after starts_at',
    path: ['ends_at'],
  });
export type CreateChallengeInput = z.infer<typeof CreateChallengeSchema>;

export const RecordProgressSchema = z.object({
  member_id: UuidSchema,
  amount: z.number().min(0),
});
export type RecordProgressInput = z.infer<typeof RecordProgressSchema>;

// ---------------------------------------------------------------------------
// Pet
// ---------------------------------------------------------------------------

export const PetActionBodySchema = z.object({
  action: PetActionSchema,
});

// ---------------------------------------------------------------------------
// Sample family data (packages/db/seed/sample-family.json)
// ---------------------------------------------------------------------------

const PeriodSeedSchema = z.object({
  steps: z.number().int().min(0).default(0),
  calories: z.number().int().min(0).default(0),
  distance_km: z.number().min(0).default(0),
  active_minutes: z.number().int().min(0).default(0),
  sleep_hours: z.number().min(0).default(0),
  water_liters: z.number().min(0).default(0),
  hydration_ml: z.number().int().min(0).default(0),
  workout_minutes: z.number().min(0).default(0),
});

export const SampleMemberSchema = z.object({
  id: UuidSchema,
  name: z.string().min(1),
  relationship: RelationshipSchema,
  color: HexColorSchema,
  daily_step_goal: z.number().int().positive().optional(),
  heart_rate: z.number().int().optional(),
  resting_heart_rate: z.number().int().nullable().optional(),
  mood_score: MoodScoreSchema.nullable().optional(),
  metrics: z.object({
    today: PeriodSeedSchema,
    weekly: PeriodSeedSchema,
    monthly: PeriodSeedSchema,
  }),
  streak: z
    .object({
      current: z.number().int().min(0),
      best: z.number().int().min(0),
      goal_days: z.number().int().min(0),
    })
    .default({ current: 0, best: 0, goal_days: 0 }),
  workouts_completed: z.number().int().min(0).default(0),
  unlocked_badges: z.array(z.string()).default([]),
});
export type SampleMember = z.infer<typeof SampleMemberSchema>;

export const SampleWorkoutSchema = z.object({
  id: UuidSchema,
  member_id: UuidSchema,
  name: z.string().min(1),
  type: WorkoutTypeSchema,
  duration_seconds: z.number().int().positive(),
  calories: z.number().int().min(0),
  distance_km: z.number().positive().nullable(),
  heart_rate_samples: z.array(z.number().int()),
  /** Offset from "now" at load time, in seconds (negative = past) */
  ended_offset_seconds: z.number().int().max(0),
});
export type SampleWorkout = z.infer<typeof SampleWorkoutSchema>;

export const SampleChallengeSchema = z.object({
  id: UuidSchema,
  title: z.string().min(1),
  metric: ChallengeMetricSchema,
  target_value: z.number().positive(),
  participants: z.record(UuidSchema, z.number().min(0)),
  /** Challenge window relative to load time, in days */
  starts_in_days: z.number().int(),
  duration_days: z.number().int().positive(),
});
export type SampleChallenge = z.infer<typeof SampleChallengeSchema>;

export const SampleFamilySchema = z.object({
  family: z.object({ id: UuidSchema, name: z.string().min(1) }),
  members: z.array(SampleMemberSchema).min(1),
  workouts: z.array(SampleWorkoutSchema).default([]),
  challenges: z.array(SampleChallengeSchema).default([]),
  pet: z.object({
    name: z.string().min(1),
    type: PetTypeSchema,
    hunger: z.number().int().min(0).max(100),
    energy: z.number().int().min(0).max(100),
  }),
});
export type SampleFamily = z.infer<typeof SampleFamilySchema>;
