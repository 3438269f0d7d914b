// =============================================================================
// Kinstep API — In-memory family store
// Seeded from the sample family. Records are cloned on the way in and out so
// callers can never mutate stored state by reference.
// =============================================================================

import {
  loadSampleFamily,
  sampleChallengeWindow,
  sampleWorkoutWindow,
} from '@kinstep/db';
import type { FamilyChallenge, FamilyMember, Pet, SampleFamily, Workout } from '@kinstep/shared';
import { memberFromSample } from '../members.js';
import { derivePetMood } from '../pet.js';
import type { FamilyStore } from './types.js';

export class InMemoryFamilyStore implements FamilyStore {
  readonly name = 'sample';

  private readonly members = new Map<string, FamilyMember>();
  private readonly workouts = new Map<string, Workout>();
  private readonly challenges = new Map<string, FamilyChallenge>();
  private readonly pets = new Map<string, Pet>();
  private readonly families = new Set<string>();

  /** Store pre-loaded with seed/sample-family.json. */
  static fromSample(now: Date = new Date()): InMemoryFamilyStore {
    const store = new InMemoryFamilyStore();
    store.load(loadSampleFamily(), now);
    return store;
  }

  load(sample: SampleFamily, now: Date = new Date()): void {
    const familyId = sample.family.id;
    this.families.add(familyId);

    for (const m of sample.members) {
      this.members.set(m.id, memberFromSample(m, familyId, now));
    }
    for (const w of sample.workouts) {
      this.workouts.set(w.id, {
        id: w.id,
        member_id: w.member_id,
        name: w.name,
        type: w.type,
        duration_seconds: w.duration_seconds,
        calories: w.calories,
        distance_km: w.distance_km,
        heart_rate_samples: [...w.heart_rate_samples],
        ...sampleWorkoutWindow(w, now),
        is_active: false,
      });
    }
    for (const c of sample.challenges) {
      this.challenges.set(c.id, {
        id: c.id,
        family_id: familyId,
        title: c.title,
        metric: c.metric,
        target_value: c.target_value,
        participants: { ...c.participants },
        ...sampleChallengeWindow(c, now),
        created_at: now.toISOString(),
      });
    }
    this.pets.set(familyId, {
      family_id: familyId,
      name: sample.pet.name,
      type: sample.pet.type,
      hunger: sample.pet.hunger,
      energy: sample.pet.energy,
      mood: derivePetMood(sample.pet.hunger, sample.pet.energy),
      last_interaction_at: now.toISOString(),
    });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async listFamilyIds(): Promise<string[]> {
    return [...this.families];
  }

  async listMembers(familyId: string): Promise<FamilyMember[]> {
    return [...this.members.values()]
      .filter((m) => m.family_id === familyId)
      .map((m) => structuredClone(m));
  }

  async getMember(familyId: string, memberId: string): Promise<FamilyMember | null> {
    const member = this.members.get(memberId);
    return member && member.family_id === familyId ? structuredClone(member) : null;
  }

  async saveMember(member: FamilyMember): Promise<void> {
    this.families.add(member.family_id);
    this.members.set(member.id, structuredClone(member));
  }

  async listWorkouts(memberId: string): Promise<Workout[]> {
    return [...this.workouts.values()]
      .filter((w) => w.member_id === memberId)
      .sort((a, b) => Date.parse(b.ended_at) - Date.parse(a.ended_at))
      .map((w) => structuredClone(w));
  }

  async addWorkout(workout: Workout): Promise<void> {
    this.workouts.set(workout.id, structuredClone(workout));
  }

  async listChallenges(familyId: string): Promise<FamilyChallenge[]> {
    return [...this.challenges.values()]
      .filter((c) => c.family_id === familyId)
      .sort((a, b) => Date.parse(a.starts_at) - Date.parse(b.starts_at))
      .map((c) => structuredClone(c));
  }

  async getChallenge(familyId: string, challengeId: string): Promise<FamilyChallenge | null> {
    const challenge = this.challenges.get(challengeId);
    return challenge && challenge.family_id === familyId ? structuredClone(challenge) : null;
  }

  async saveChallenge(challenge: FamilyChallenge): Promise<void> {
    this.challenges.set(challenge.id, structuredClone(challenge));
  }

  async getPet(familyId: string): Promise<Pet | null> {
    const pet = this.pets.get(familyId);
    return pet ? structuredClone(pet) : null;
  }

  async savePet(pet: Pet): Promise<void> {
    this.pets.set(pet.family_id, structuredClone(pet));
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
