// =============================================================================
// Kinstep API — Route registry
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { API_PREFIX } from '@kinstep/shared';
import healthRoutes from './health.js';
import memberRoutes from './members/index.js';
import healthScoreRoutes from './health-score/index.js';
import challengeRoutes from './challenges/index.js';
import familyRoutes from './family/index.js';
import petRoutes from './pet/index.js';

export async function registerRoutes(fastify: FastifyInstance): Promise<void> {
  // Health check — no prefix, no auth
  await fastify.register(healthRoutes);

  // Versioned API routes
  await fastify.register(
    async (api) => {
      await api.register(memberRoutes, { prefix: '/members' });
      await api.register(healthScoreRoutes, { prefix: '/health-score' });
      await api.register(challengeRoutes, { prefix: '/challenges' });
      await api.register(familyRoutes, { prefix: '/family' });
      await api.register(petRoutes, { prefix: '/pet' });
    },
    { prefix: API_PREFIX },
  );
}
