// =============================================================================
// Kinstep API — Auth plugin (HS256 JWT verification)
// Registers @fastify/jwt and decorates the instance with `authenticate`.
// Every token is scoped to exactly one family.
// =============================================================================

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import fastifyJwt from '@fastify/jwt';
import { z } from 'zod';
import { config } from '../config.js';

// Extract JWT from Authorization: Bearer header OR ?token= query param.
// The query-param fallback is required for WebSocket upgrade requests because
// browsers cannot set custom headers on the WS handshake.
const TokenQuerySchema = z.object({ token: z.string().min(1).optional() }).passthrough();

function extractToken(request: FastifyRequest): string {
  const auth = request.headers.authorization;
  if (auth && /^Bearer\s/i.test(auth)) {
    const parts = auth.split(' ');
    return parts.length === 2 && parts[1] ? parts[1] : '';
  }
  const query = TokenQuerySchema.safeParse(request.query);
  return query.success ? (query.data.token ?? '') : '';
}

export interface JwtPayload {
  sub: string; // member or account UUID
  family_id: string;
}

const JwtPayloadSchema = z.object({
  sub: z.string().min(1),
  family_id: z.string().uuid(),
});

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JwtPayload;
    user: JwtPayload;
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

async function authPlugin(fastify: FastifyInstance): Promise<void> {
  await fastify.register(fastifyJwt, {
    secret: config.jwtSecret,
    sign: { expiresIn: '1h' },
    verify: { extractToken },
  });

  fastify.decorate(
    'authenticate',
    async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
      try {
        const payload = await request.jwtVerify<JwtPayload>();
        // Tokens from other issuers may be well-signed but missing the family claim
        JwtPayloadSchema.parse(payload);
      } catch (err) {
        request.log.debug({ err }, '[auth] token rejected');
        await reply.status(401).send({
          success: false,
          error: { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
        });
      }
    },
  );
}

export default fp(authPlugin, { name: 'auth' });
