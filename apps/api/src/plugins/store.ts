// =============================================================================
// Kinstep API — Data plugin
// Decorates the instance with the family store and the event publisher so
// routes never construct backends themselves.
// =============================================================================

import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { FamilyEventPublisher } from '../services/events.js';
import type { FamilyStore } from '../services/store/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    store: FamilyStore;
    events: FamilyEventPublisher;
  }
}

export interface StorePluginOptions {
  store: FamilyStore;
  events: FamilyEventPublisher;
}

async function storePlugin(fastify: FastifyInstance, opts: StorePluginOptions): Promise<void> {
  fastify.decorate('store', opts.store);
  fastify.decorate('events', opts.events);

  fastify.log.info(`[store] data source: ${opts.store.name}`);

  fastify.addHook('onClose', async () => {
    await Promise.all([opts.store.close(), opts.events.close()]);
  });
}

export default fp(storePlugin, { name: 'store' });
