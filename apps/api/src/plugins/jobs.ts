// =============================================================================
// Kinstep API — In-process background jobs
// With DATA_SOURCE=sample the family data lives in this process's memory, so
// the simulation and rollover jobs have to run here, against fastify.store.
// =============================================================================

import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { JobStarter, RunningJob } from '../workers/index.js';

export interface JobsPluginOptions {
  jobs: readonly JobStarter[];
}

async function jobsPlugin(fastify: FastifyInstance, opts: JobsPluginOptions): Promise<void> {
  const running: RunningJob[] = [];

  fastify.addHook('onReady', async () => {
    const deps = { store: fastify.store, events: fastify.events, log: fastify.log };
    for (const start of opts.jobs) {
      const job = await start(deps);
      running.push(job);
      fastify.log.info(`[jobs] ${job.name} running in-process`);
    }
  });

  // Registered after the store plugin, so this runs before the store closes
  fastify.addHook('onClose', async () => {
    await Promise.all(running.map((job) => job.close()));
  });
}

export default fp(jobsPlugin, { name: 'jobs', dependencies: ['store'] });
