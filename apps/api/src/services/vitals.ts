import type { HeartRateZone, SleepQuality } from '@kinstep/shared';

export function heartRateZone(bpm: number): HeartRateZone {
  if (bpm < 60) return 'resting';
  if (bpm < 100) return 'light';
  if (bpm < 140) return 'moderate';
  if (bpm < 170) return 'vigorous';
  return 'maximum';
}

export function sleepQuality(hours: number): SleepQuality {
  if (hours >= 8) return 'excellent';
  if (hours >= 7) return 'good';
  if (hours >= 6) return 'fair';
  return 'poor';
}
