// =============================================================================
// Kinstep API — Worker entrypoint
// Run separately from the HTTP server:
//   tsx src/worker.ts
//
// Only with DATA_SOURCE=postgres: sample data lives in the API's memory, and
// the API runs these jobs itself (plugins/jobs.ts).
//
// Starts:
//   1. Activity simulation (BullMQ repeatable job)
//   2. Nightly day rollover (BullMQ cron job)
// =============================================================================

import { initSentry, captureException } from './sentry.js';
import { config } from './config.js';
import { RedisEventPublisher } from './services/events.js';
import { createFamilyStore } from './services/store/index.js';
import { backgroundJobs, type RunningJob } from './workers/index.js';

initSentry();

if (config.dataSource !== 'postgres') {
  console.error(
    '[worker] DATA_SOURCE=sample keeps family data inside the API process, which runs the jobs itself. ' +
      'Set DATA_SOURCE=postgres to run a separate worker.',
  );
  process.exit(1);
}

console.info('[worker] Starting Kinstep worker process…');
console.info(`[worker] Redis: ${config.redisUrl}`);
console.info(`[worker] Data source: ${config.dataSource}, tick every ${config.simulationIntervalMs} ms`);

const store = createFamilyStore(console);
const events = new RedisEventPublisher();
const deps = { store, events };

const running: RunningJob[] = [];
for (const start of backgroundJobs) running.push(await start(deps));

// Graceful shutdown
const shutdown = async (signal: string): Promise<void> => {
  console.info(`[worker] ${signal} received — shutting down`);
  await Promise.all(running.map((job) => job.close()));
  await Promise.all([store.close(), events.close()]);
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('uncaughtException', (err) => {
  console.error('[worker] Uncaught exception:', err);
  captureException(err, { source: 'worker' });
  void shutdown('uncaughtException');
});
process.on('unhandledRejection', (reason) => {
  console.error('[worker] Unhandled rejection:', reason);
  captureException(reason, { source: 'worker' });
  void shutdown('unhandledRejection');
});

console.info('[worker] Ready');
