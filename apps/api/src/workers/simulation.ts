// =============================================================================
// Kinstep API — Activity simulation worker
// A repeatable job that nudges every member's live figures, credits running
// challenges, looks after the family pet and publishes the changes.
// =============================================================================

import { Queue, Worker } from 'bullmq';
import { config } from '../config.js';
import {
  creditChallenges,
  memberEvents,
  petUpdatedEvent,
  publishAll,
} from '../services/activity.js';
import { evaluateMember } from '../services/badges.js';
import type { FamilyEvent, FamilyEventPublisher } from '../services/events.js';
import { cheerPet, decayPet } from '../services/pet.js';
import type { RandomSource } from '../services/random.js';
import { simulateTick } from '../services/simulator.js';
import type { FamilyStore, StoreLogger } from '../services/store/types.js';
import { defaultJobOptions, queueConnection, SIMULATION_QUEUE_NAME } from './queue.js';

export interface SimulationDeps {
  store: FamilyStore;
  events: FamilyEventPublisher;
  log?: StoreLogger;
  random?: RandomSource;
  now?: Date;
}

export interface SimulationStats {
  families: number;
  members: number;
  steps: number;
  unlocked: number;
  challenges_updated: number;
}

// ---------------------------------------------------------------------------
// Processor
// ---------------------------------------------------------------------------

export async function runSimulationTick(deps: SimulationDeps): Promise<SimulationStats> {
  const { store, events } = deps;
  const log = deps.log ?? console;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? new Date();

  const stats: SimulationStats = { families: 0, members: 0, steps: 0, unlocked: 0, challenges_updated: 0 };

  for (const familyId of await store.listFamilyIds()) {
    const batch: FamilyEvent[] = [];
    let familySteps = 0;

    for (const member of await store.listMembers(familyId)) {
      const tick = simulateTick(member, random, now);
      const evaluation = evaluateMember(tick.member, now);
      await store.saveMember(evaluation.member);

      const changed = await creditChallenges(store, evaluation.member, tick.deltas, now);
      batch.push(...memberEvents(evaluation.member, evaluation.unlocked, changed, now));

      familySteps += tick.deltas.steps;
      stats.members++;
      stats.unlocked += evaluation.unlocked.length;
      stats.challenges_updated += changed.length;
    }

    const pet = await store.getPet(familyId);
    if (pet) {
      const next = cheerPet(decayPet(pet, random), familySteps);
      await store.savePet(next);
      batch.push(petUpdatedEvent(next));
    }

    await publishAll(events, familyId, batch, log);
    stats.families++;
    stats.steps += familySteps;
  }

  return stats;
}

// ===========================================================================
// Worker factory — call from the dedicated worker.ts entrypoint
// ===========================================================================

export async function startSimulationWorker(
  deps: SimulationDeps,
): Promise<{ queue: Queue; worker: Worker<Record<string, never>, SimulationStats> }> {
  const connection = queueConnection();
  const queue = new Queue(SIMULATION_QUEUE_NAME, { connection, defaultJobOptions });

  // Repeatable jobs are deduplicated by their repeat key
  await queue.add('tick', {}, { repeat: { every: config.simulationIntervalMs } });

  const worker = new Worker<Record<string, never>, SimulationStats>(
    SIMULATION_QUEUE_NAME,
    () => runSimulationTick(deps),
    { connection, concurrency: 1 },
  );

  worker.on('completed', (job, stats) => {
    console.info(
      `[simulation] ✓ job ${job.id ?? '?'} — ${stats.members} members, +${stats.steps} steps, ${stats.unlocked} unlocks`,
    );
  });

  worker.on('failed', (job, err) => {
    console.error(`[simulation] ✗ job ${job?.id ?? '?'} failed:`, err.message);
  });

  return { queue, worker };
}
