import type { FamilyChallenge, FamilyMember, Pet, Workout } from '@kinstep/shared';

/**
 * Pluggable data source behind every route and worker. Scoring code never
 * talks to a backend directly, so sample data, the Postgres record store or
 * a future cloud/sensor integration can be swapped without touching it.
 */
export interface FamilyStore {
  readonly name: string;
  ping(): Promise<boolean>;
  listFamilyIds(): Promise<string[]>;

  listMembers(familyId: string): Promise<FamilyMember[]>;
  getMember(familyId: string, memberId: string): Promise<FamilyMember | null>;
  saveMember(member: FamilyMember): Promise<void>;

  /** Newest first. */
  listWorkouts(memberId: string): Promise<Workout[]>;
  addWorkout(workout: Workout): Promise<void>;

  listChallenges(familyId: string): Promise<FamilyChallenge[]>;
  getChallenge(familyId: string, challengeId: string): Promise<FamilyChallenge | null>;
  saveChallenge(challenge: FamilyChallenge): Promise<void>;

  getPet(familyId: string): Promise<Pet | null>;
  savePet(pet: Pet): Promise<void>;

  close(): Promise<void>;
}

/** Minimal logger shape satisfied by both pino and console. */
export interface StoreLogger {
  warn(obj: object, msg: string): void;
}
