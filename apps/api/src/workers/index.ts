// =============================================================================
// Kinstep API — Background jobs
// Both repeatable jobs behind one start/close shape, so they can run in the
// dedicated worker process or inside the API (see plugins/jobs.ts).
// =============================================================================

import type { FamilyEventPublisher } from '../services/events.js';
import type { FamilyStore, StoreLogger } from '../services/store/types.js';
import { startRolloverWorker } from './rollover.js';
import { startSimulationWorker } from './simulation.js';

export interface JobDeps {
  store: FamilyStore;
  events: FamilyEventPublisher;
  log?: StoreLogger;
}

export interface RunningJob {
  name: string;
  close(): Promise<void>;
}

export type JobStarter = (deps: JobDeps) => Promise<RunningJob>;

export const backgroundJobs: readonly JobStarter[] = [
  async (deps) => {
    const { queue, worker } = await startSimulationWorker(deps);
    return {
      name: 'simulation',
      close: async () => {
        await worker.close();
        await queue.close();
      },
    };
  },
  async (deps) => {
    const { queue, worker } = await startRolloverWorker(deps);
    return {
      name: 'rollover',
      close: async () => {
        await worker.close();
        await queue.close();
      },
    };
  },
];
