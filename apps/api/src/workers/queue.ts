// =============================================================================
// Kinstep API — BullMQ connection
// Queues are created inside the start functions so importing a processor
// never opens a Redis connection.
// =============================================================================

import type { ConnectionOptions } from 'bullmq';
import { config } from '../config.js';

export const SIMULATION_QUEUE_NAME = 'kinstep:simulation';
export const ROLLOVER_QUEUE_NAME = 'kinstep:rollover';

export function queueConnection(redisUrl: string = config.redisUrl): ConnectionOptions {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: Number(url.port || 6379),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    maxRetriesPerRequest: null,
  };
}

export const defaultJobOptions = {
  removeOnComplete: { count: 100 },
  removeOnFail: { count: 500 },
};
