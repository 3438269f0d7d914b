// =============================================================================
// Kinstep API — Family pet
// GET  /api/v1/pet          — the family's companion
// POST /api/v1/pet/actions  — feed | play | rest
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { PetActionBodySchema } from '@kinstep/shared';
import { notFound } from '../../errors.js';
import { petUpdatedEvent, publishAll } from '../../services/activity.js';
import { applyPetAction } from '../../services/pet.js';

export default async function petRoutes(fastify: FastifyInstance): Promise<void> {
  const auth = { preHandler: [fastify.authenticate] };

  fastify.get('/', auth, async (request, reply) => {
    const pet = await fastify.store.getPet(request.user.family_id);
    if (!pet) throw notFound('Pet');
    return reply.send({ success: true, data: pet });
  });

  fastify.post('/actions', auth, async (request, reply) => {
    const { action } = PetActionBodySchema.parse(request.body);
    const familyId = request.user.family_id;

    const pet = await fastify.store.getPet(familyId);
    if (!pet) throw notFound('Pet');

    const updated = applyPetAction(pet, action);
    await fastify.store.savePet(updated);
    await publishAll(fastify.events, familyId, [petUpdatedEvent(updated)], request.log);

    return reply.send({ success: true, data: updated });
  });
}
