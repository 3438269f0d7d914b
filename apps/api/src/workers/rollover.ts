// =============================================================================
// Kinstep API — Nightly day rollover
// Runs shortly after UTC midnight: closes out yesterday's streaks and clears
// the period totals that have ended.
// =============================================================================

import { Queue, Worker } from 'bullmq';
import { config } from '../config.js';
import { memberEvents, publishAll } from '../services/activity.js';
import type { FamilyEvent, FamilyEventPublisher } from '../services/events.js';
import { rolloverDay } from '../services/streaks.js';
import type { FamilyStore, StoreLogger } from '../services/store/types.js';
import { defaultJobOptions, queueConnection, ROLLOVER_QUEUE_NAME } from './queue.js';

export interface RolloverDeps {
  store: FamilyStore;
  events: FamilyEventPublisher;
  log?: StoreLogger;
  now?: Date;
}

export interface RolloverStats {
  families: number;
  members: number;
  goals_met: number;
  unlocked: number;
}

export async function runDailyRollover(deps: RolloverDeps): Promise<RolloverStats> {
  const { store, events } = deps;
  const log = deps.log ?? console;
  const now = deps.now ?? new Date();

  const stats: RolloverStats = { families: 0, members: 0, goals_met: 0, unlocked: 0 };

  for (const familyId of await store.listFamilyIds()) {
    const batch: FamilyEvent[] = [];

    for (const member of await store.listMembers(familyId)) {
      const result = rolloverDay(member, now);
      await store.saveMember(result.member);
      batch.push(...memberEvents(result.member, result.unlocked, [], now));

      stats.members++;
      if (result.metGoal) stats.goals_met++;
      stats.unlocked += result.unlocked.length;
    }

    await publishAll(events, familyId, batch, log);
    stats.families++;
  }

  return stats;
}

// ---------------------------------------------------------------------------
// Scheduler worker
// ---------------------------------------------------------------------------

export async function startRolloverWorker(
  deps: RolloverDeps,
): Promise<{ queue: Queue; worker: Worker<Record<string, never>, RolloverStats> }> {
  const connection = queueConnection();
  const queue = new Queue(ROLLOVER_QUEUE_NAME, { connection, defaultJobOptions });

  await queue.add(
    'rollover',
    {},
    { repeat: { pattern: config.rolloverCron, tz: 'UTC' }, jobId: 'rollover-singleton' },
  );

  const worker = new Worker<Record<string, never>, RolloverStats>(
    ROLLOVER_QUEUE_NAME,
    () => runDailyRollover(deps),
    { connection, concurrency: 1 },
  );

  worker.on('completed', (job, stats) => {
    console.info(
      `[rollover] ✓ job ${job.id ?? '?'} — ${stats.members} members, ${stats.goals_met} goals met`,
    );
  });

  worker.on('failed', (job, err) => {
    console.error(`[rollover] ✗ job ${job?.id ?? '?'} failed:`, err.message);
  });

  return { queue, worker };
}
