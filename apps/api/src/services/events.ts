// =============================================================================
// Kinstep API — Family event publishing
// Workers and routes publish to Redis; the websocket plugin fans events out
// to every connected client of the family.
// =============================================================================

import { Redis } from 'ioredis';
import { FAMILY_CHANNEL_PREFIX, type WsEvent } from '@kinstep/shared';
import { config } from '../config.js';

export interface FamilyEvent {
  type: WsEvent;
  data: Record<string, unknown>;
}

export interface FamilyEventPublisher {
  publish(familyId: string, event: FamilyEvent): Promise<void>;
  close(): Promise<void>;
}

export function familyChannel(familyId: string): string {
  return `${FAMILY_CHANNEL_PREFIX}${familyId}`;
}

export function createRedisClient(): Redis {
  return new Redis(config.redisUrl, {
    lazyConnect: true,
    maxRetriesPerRequest: null,
  });
}

export class RedisEventPublisher implements FamilyEventPublisher {
  private readonly redis: Redis;

  constructor(redis: Redis = createRedisClient()) {
    this.redis = redis;
  }

  async publish(familyId: string, event: FamilyEvent): Promise<void> {
    await this.redis.publish(familyChannel(familyId), JSON.stringify(event));
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

/** Used when real-time delivery is disabled. */
export class NoopEventPublisher implements FamilyEventPublisher {
  async publish(): Promise<void> {
    // nothing listens
  }

  async close(): Promise<void> {
    // nothing to close
  }
}
