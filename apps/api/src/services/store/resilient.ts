// =============================================================================
// Kinstep API — Best-effort store wrapper
//
// The record store is a sync target, not a source of truth the user must
// wait on. A failed read logs a warning and serves the sample data instead;
// a failed write logs a warning and is dropped. Nothing is retried and
// nothing reaches the caller.
// =============================================================================

import type { FamilyChallenge, FamilyMember, Pet, Workout } from '@kinstep/shared';
import type { FamilyStore, StoreLogger } from './types.js';

export class ResilientFamilyStore implements FamilyStore {
  readonly name: string;

  constructor(
    private readonly primary: FamilyStore,
    private readonly fallback: FamilyStore,
    private readonly log: StoreLogger,
  ) {
    this.name = primary.name;
  }

  private async read<T>(op: string, primary: () => Promise<T>, fallback: () => Promise<T>): Promise<T> {
    try {
      return await primary();
    } catch (err) {
      this.log.warn({ err, op, store: this.primary.name }, '[store] read failed — serving sample data');
      return fallback();
    }
  }

  private async write(op: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      this.log.warn({ err, op, store: this.primary.name }, '[store] write failed — change not saved');
    }
  }

  async ping(): Promise<boolean> {
    try {
      return await this.primary.ping();
    } catch {
      return false;
    }
  }

  listFamilyIds(): Promise<string[]> {
    return this.read('listFamilyIds', () => this.primary.listFamilyIds(), () => this.fallback.listFamilyIds());
  }

  listMembers(familyId: string): Promise<FamilyMember[]> {
    return this.read(
      'listMembers',
      () => this.primary.listMembers(familyId),
      () => this.fallback.listMembers(familyId),
    );
  }

  getMember(familyId: string, memberId: string): Promise<FamilyMember | null> {
    return this.read(
      'getMember',
      () => this.primary.getMember(familyId, memberId),
      () => this.fallback.getMember(familyId, memberId),
    );
  }

  saveMember(member: FamilyMember): Promise<void> {
    return this.write('saveMember', () => this.primary.saveMember(member));
  }

  listWorkouts(memberId: string): Promise<Workout[]> {
    return this.read(
      'listWorkouts',
      () => this.primary.listWorkouts(memberId),
      () => this.fallback.listWorkouts(memberId),
    );
  }

  addWorkout(workout: Workout): Promise<void> {
    return this.write('addWorkout', () => this.primary.addWorkout(workout));
  }

  listChallenges(familyId: string): Promise<FamilyChallenge[]> {
    return this.read(
      'listChallenges',
      () => this.primary.listChallenges(familyId),
      () => this.fallback.listChallenges(familyId),
    );
  }

  getChallenge(familyId: string, challengeId: string): Promise<FamilyChallenge | null> {
    return this.read(
      'getChallenge',
      () => this.primary.getChallenge(familyId, challengeId),
      () => this.fallback.getChallenge(familyId, challengeId),
    );
  }

  saveChallenge(challenge: FamilyChallenge): Promise<void> {
    return this.write('saveChallenge', () => this.primary.saveChallenge(challenge));
  }

  getPet(familyId: string): Promise<Pet | null> {
    return this.read('getPet', () => this.primary.getPet(familyId), () => this.fallback.getPet(familyId));
  }

  savePet(pet: Pet): Promise<void> {
    return this.write('savePet', () => this.primary.savePet(pet));
  }

  async close(): Promise<void> {
    await Promise.all([this.primary.close(), this.fallback.close()]);
  }
}
