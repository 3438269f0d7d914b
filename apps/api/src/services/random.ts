// Injectable randomness so simulated updates are reproducible in tests.
export type RandomSource = () => number;

/** Uniform integer in [min, max]. */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * (max - min + 1)) + min;
}
