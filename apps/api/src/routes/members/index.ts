// =============================================================================
// Kinstep API — Family member routes
// GET   /api/v1/members                         — members with score + rings
// GET   /api/v1/members/:memberId               — one member
// PATCH /api/v1/members/:memberId/metrics       — manual / device reading
// POST  /api/v1/members/:memberId/badges/evaluate
// GET   /api/v1/members/:memberId/health-score
// GET   /api/v1/members/:memberId/workouts      — newest first, summarised
// POST  /api/v1/members/:memberId/workouts      — log a finished workout
// =============================================================================

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  CreateWorkoutSchema,
  UpdateMetricsSchema,
  UuidSchema,
  type FamilyMember,
} from '@kinstep/shared';
import { notFound } from '../../errors.js';
import {
  activityBetween,
  creditChallenges,
  memberEvents,
  publishAll,
} from '../../services/activity.js';
import { evaluateMember } from '../../services/badges.js';
import { computeHealthScore, healthInputFromMember } from '../../services/healthScore.js';
import { applyMetricsUpdate, memberOverview } from '../../services/members.js';
import { applyWorkout, buildWorkout, summarizeWorkout } from '../../services/workouts.js';

const MemberParamsSchema = z.object({ memberId: UuidSchema });

export default async function memberRoutes(fastify: FastifyInstance): Promise<void> {
  const auth = { preHandler: [fastify.authenticate] };

  async function loadMember(request: FastifyRequest): Promise<FamilyMember> {
    const { memberId } = MemberParamsSchema.parse(request.params);
    const member = await fastify.store.getMember(request.user.family_id, memberId);
    if (!member) throw notFound('Member');
    return member;
  }

  // ---------------------------------------------------------------------------
  // GET /members
  // ---------------------------------------------------------------------------
  fastify.get('/', auth, async (request, reply) => {
    const now = new Date();
    const members = await fastify.store.listMembers(request.user.family_id);
    return reply.send({ success: true, data: members.map((m) => memberOverview(m, now)) });
  });

  // ---------------------------------------------------------------------------
  // GET /members/:memberId
  // ---------------------------------------------------------------------------
  fastify.get('/:memberId', auth, async (request, reply) => {
    const member = await loadMember(request);
    return reply.send({ success: true, data: memberOverview(member) });
  });

  // ---------------------------------------------------------------------------
  // PATCH /members/:memberId/metrics
  // ---------------------------------------------------------------------------
  fastify.patch('/:memberId/metrics', auth, async (request, reply) => {
    const member = await loadMember(request);
    const body = UpdateMetricsSchema.parse(request.body);
    const now = new Date();

    const updated = applyMetricsUpdate(member, body, now);
    const evaluation = evaluateMember(updated, now);
    await fastify.store.saveMember(evaluation.member);

    const changed = await creditChallenges(
      fastify.store,
      evaluation.member,
      activityBetween(member.metrics.today, evaluation.member.metrics.today),
      now,
    );

    await publishAll(
      fastify.events,
      member.family_id,
      memberEvents(evaluation.member, evaluation.unlocked, changed, now),
      request.log,
    );

    return reply.send({
      success: true,
      data: { member: memberOverview(evaluation.member, now), unlocked: evaluation.unlocked },
    });
  });

  // ---------------------------------------------------------------------------
  // POST /members/:memberId/badges/evaluate
  // ---------------------------------------------------------------------------
  fastify.post('/:memberId/badges/evaluate', auth, async (request, reply) => {
    const member = await loadMember(request);
    const now = new Date();

    const evaluation = evaluateMember(member, now);
    if (evaluation.unlocked.length > 0) {
      await fastify.store.saveMember(evaluation.member);
      await publishAll(
        fastify.events,
        member.family_id,
        memberEvents(evaluation.member, evaluation.unlocked, [], now),
        request.log,
      );
    }

    return reply.send({
      success: true,
      data: {
        badges: evaluation.member.badges,
        achievements: evaluation.member.achievements,
        unlocked: evaluation.unlocked,
      },
    });
  });

  // ---------------------------------------------------------------------------
  // GET /members/:memberId/health-score
  // ---------------------------------------------------------------------------
  fastify.get('/:memberId/health-score', auth, async (request, reply) => {
    const member = await loadMember(request);
    return reply.send({ success: true, data: computeHealthScore(healthInputFromMember(member)) });
  });

  // ---------------------------------------------------------------------------
  // GET /members/:memberId/workouts
  // ---------------------------------------------------------------------------
  fastify.get('/:memberId/workouts', auth, async (request, reply) => {
    const member = await loadMember(request);
    const workouts = await fastify.store.listWorkouts(member.id);
    return reply.send({ success: true, data: workouts.map(summarizeWorkout) });
  });

  // ---------------------------------------------------------------------------
  // POST /members/:memberId/workouts
  // ---------------------------------------------------------------------------
  fastify.post('/:memberId/workouts', auth, async (request, reply) => {
    const member = await loadMember(request);
    const body = CreateWorkoutSchema.parse(request.body);
    const now = new Date();

    const workout = buildWorkout(member.id, body, now);
    await fastify.store.addWorkout(workout);

    const credited = applyWorkout(member, workout, now);
    await fastify.store.saveMember(credited.member);

    // Only challenges that were running when the workout ended
    const changed = await creditChallenges(
      fastify.store,
      credited.member,
      { workout_minutes: credited.minutes },
      new Date(workout.ended_at),
    );

    await publishAll(
      fastify.events,
      member.family_id,
      memberEvents(credited.member, credited.unlocked, changed, now),
      request.log,
    );

    return reply.status(201).send({
      success: true,
      data: { workout: summarizeWorkout(workout), unlocked: credited.unlocked },
    });
  });
}
