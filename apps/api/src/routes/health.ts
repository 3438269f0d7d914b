// =============================================================================
// Kinstep API — Health check route
// GET /health  →  200 { status: 'ok', ... }
// =============================================================================

import type { FastifyInstance } from 'fastify';

export default async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', { logLevel: 'silent' }, async (_request, reply) => {
    const storeOk = await fastify.store.ping();
    if (!storeOk) fastify.log.warn(`Health check: store "${fastify.store.name}" unreachable`);

    return reply.status(storeOk ? 200 : 503).send({
      status: storeOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      version: process.env['npm_package_version'] ?? '0.1.0',
      store: { name: fastify.store.name, reachable: storeOk },
    });
  });
}
