// =============================================================================
// Kinstep API — Stateless health score
// POST /api/v1/health-score — score an arbitrary set of readings
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { HealthScoreInputSchema } from '@kinstep/shared';
import { computeHealthScore } from '../../services/healthScore.js';

export default async function healthScoreRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post('/', { preHandler: [fastify.authenticate] }, async (request, reply) => {
    const input = HealthScoreInputSchema.parse(request.body ?? {});
    return reply.send({ success: true, data: computeHealthScore(input) });
  });
}
