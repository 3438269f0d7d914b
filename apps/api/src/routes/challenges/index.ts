// =============================================================================
// Kinstep API — Family challenges
// GET  /api/v1/challenges               — all challenges with derived fields
// POST /api/v1/challenges               — create
// GET  /api/v1/challenges/:id           — one challenge
// POST /api/v1/challenges/:id/progress  — record a participant's progress
// =============================================================================

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  CreateChallengeSchema,
  RecordProgressSchema,
  UuidSchema,
  type FamilyChallenge,
} from '@kinstep/shared';
import { notFound } from '../../errors.js';
import { challengeUpdatedEvent, publishAll } from '../../services/activity.js';
import {
  createChallenge,
  describeChallenge,
  recordProgress,
} from '../../services/challenges.js';

const ChallengeParamsSchema = z.object({ id: UuidSchema });

export default async function challengeRoutes(fastify: FastifyInstance): Promise<void> {
  const auth = { preHandler: [fastify.authenticate] };

  async function loadChallenge(request: FastifyRequest): Promise<FamilyChallenge> {
    const { id } = ChallengeParamsSchema.parse(request.params);
    const challenge = await fastify.store.getChallenge(request.user.family_id, id);
    if (!challenge) throw notFound('Challenge');
    return challenge;
  }

  fastify.get('/', auth, async (request, reply) => {
    const now = new Date();
    const challenges = await fastify.store.listChallenges(request.user.family_id);
    return reply.send({ success: true, data: challenges.map((c) => describeChallenge(c, now)) });
  });

  fastify.post('/', auth, async (request, reply) => {
    const body = CreateChallengeSchema.parse(request.body);
    const familyId = request.user.family_id;
    const now = new Date();

    const members = await fastify.store.listMembers(familyId);
    const challenge = createChallenge(familyId, body, new Set(members.map((m) => m.id)), now);
    await fastify.store.saveChallenge(challenge);
    await publishAll(fastify.events, familyId, [challengeUpdatedEvent(challenge, now)], request.log);

    return reply.status(201).send({ success: true, data: describeChallenge(challenge, now) });
  });

  fastify.get('/:id', auth, async (request, reply) => {
    const challenge = await loadChallenge(request);
    return reply.send({ success: true, data: describeChallenge(challenge) });
  });

  fastify.post('/:id/progress', auth, async (request, reply) => {
    const challenge = await loadChallenge(request);
    const body = RecordProgressSchema.parse(request.body);
    const now = new Date();

    const updated = recordProgress(challenge, body.member_id, body.amount, now);
    await fastify.store.saveChallenge(updated);
    await publishAll(
      fastify.events,
      updated.family_id,
      [challengeUpdatedEvent(updated, now)],
      request.log,
    );

    return reply.send({ success: true, data: describeChallenge(updated, now) });
  });
}
