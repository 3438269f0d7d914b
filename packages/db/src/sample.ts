// =============================================================================
// Kinstep — Sample family data
// The built-in data source for demos and for degraded mode when the record
// store is unreachable. Loaded once from seed/sample-family.json.
// =============================================================================

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  SampleFamilySchema,
  type SampleChallenge,
  type SampleFamily,
  type SampleWorkout,
} from '@kinstep/shared';

const SAMPLE_PATH = fileURLToPath(new URL('../seed/sample-family.json', import.meta.url));

const DAY_MS = 86_400_000;

let cached: SampleFamily | null = null;

export function loadSampleFamily(): SampleFamily {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(SAMPLE_PATH, 'utf-8'));
    cached = SampleFamilySchema.parse(raw);
  }
  return cached;
}

/** Absolute start/end of a sample workout, relative to `now`. */
export function sampleWorkoutWindow(
  workout: SampleWorkout,
  now: Date,
): { started_at: string; ended_at: string } {
  const endedMs = now.getTime() + workout.ended_offset_seconds * 1000;
  return {
    started_at: new Date(endedMs - workout.duration_seconds * 1000).toISOString(),
    ended_at: new Date(endedMs).toISOString(),
  };
}

/** Absolute window of a sample challenge, relative to `now`. */
export function sampleChallengeWindow(
  challenge: SampleChallenge,
  now: Date,
): { starts_at: string; ends_at: string } {
  const startsMs = now.getTime() + challenge.starts_in_days * DAY_MS;
  return {
    starts_at: new Date(startsMs).toISOString(),
    ends_at: new Date(startsMs + challenge.duration_days * DAY_MS).toISOString(),
  };
}
