// =============================================================================
// Kinstep API — Family dashboard
// GET /api/v1/family/summary
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { buildFamilySummary } from '../../services/familySummary.js';

export default async function familyRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/summary', { preHandler: [fastify.authenticate] }, async (request, reply) => {
    const familyId = request.user.family_id;
    const members = await fastify.store.listMembers(familyId);
    return reply.send({ success: true, data: buildFamilySummary(familyId, members) });
  });
}
