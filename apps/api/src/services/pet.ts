// =============================================================================
// Kinstep API — Pet companion
// Stats are 0–100 (hunger 100 = full). Mood is always derived from stats.
// =============================================================================

import { PET_RULES, SIMULATION, type Pet, type PetAction, type PetMood } from '@kinstep/shared';
import { clamp } from './progress.js';
import { randomInt, type RandomSource } from './random.js';

function stat(value: number): number {
  return clamp(Math.round(value), PET_RULES.STAT_MIN, PET_RULES.STAT_MAX);
}

export function derivePetMood(hunger: number, energy: number): PetMood {
  if (hunger < PET_RULES.LOW_THRESHOLD) return 'hungry';
  if (energy < PET_RULES.LOW_THRESHOLD) return 'sleepy';
  if (hunger >= PET_RULES.HAPPY_THRESHOLD && energy >= PET_RULES.HAPPY_THRESHOLD) return 'happy';
  return 'sad';
}

function withStats(pet: Pet, hunger: number, energy: number): Pet {
  const h = stat(hunger);
  const e = stat(energy);
  return { ...pet, hunger: h, energy: e, mood: derivePetMood(h, e) };
}

const ACTION_EFFECTS: Record<PetAction, { hunger: number; energy: number }> = {
  feed: { hunger: PET_RULES.FEED_HUNGER, energy: 0 },
  play: { hunger: -PET_RULES.PLAY_HUNGER_COST, energy: -PET_RULES.PLAY_ENERGY_COST },
  rest: { hunger: 0, energy: PET_RULES.REST_ENERGY },
};

export function applyPetAction(pet: Pet, action: PetAction, now: Date = new Date()): Pet {
  const effect = ACTION_EFFECTS[action];
  const next = withStats(pet, pet.hunger + effect.hunger, pet.energy + effect.energy);
  return { ...next, last_interaction_at: now.toISOString() };
}

/** Passive decay for one simulation tick. */
export function decayPet(pet: Pet, random: RandomSource = Math.random): Pet {
  const hungerLoss = randomInt(1, PET_RULES.DECAY_HUNGER_MAX, random);
  const energyLoss = randomInt(1, PET_RULES.DECAY_ENERGY_MAX, random);
  return withStats(pet, pet.hunger - hungerLoss, pet.energy - energyLoss);
}

/** Family activity perks the pet up: 1 energy per 1,000 steps in the tick. */
export function cheerPet(pet: Pet, familySteps: number): Pet {
  const boost = Math.floor(Math.max(0, familySteps) / SIMULATION.PET_STEPS_PER_ENERGY);
  if (boost === 0) return pet;
  return withStats(pet, pet.hunger, pet.energy + boost);
}
