// =============================================================================
// Kinstep API — WebSocket plugin
// Pushes live family updates to connected dashboards.
//
// Architecture:
//   - Each authenticated connection joins its family's set
//   - Routes and workers publish family events to Redis pub/sub
//   - This plugin pattern-subscribes and fans out to matching connections
//
// Channel naming:
//   kinstep:family:{familyId}
// =============================================================================

import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { z } from 'zod';
import { FAMILY_CHANNEL_PREFIX, WS_EVENTS } from '@kinstep/shared';
import { createRedisClient } from '../services/events.js';

// ---------------------------------------------------------------------------
// In-process connection registry
// Maps familyId → Set of active WebSocket connections
// ---------------------------------------------------------------------------

interface WsConnection {
  socket: WebSocket;
  userId: string;
  familyId: string;
}

export class ConnectionRegistry {
  private readonly connections = new Map<string, Set<WsConnection>>();

  add(conn: WsConnection): void {
    let set = this.connections.get(conn.familyId);
    if (!set) {
      set = new Set();
      this.connections.set(conn.familyId, set);
    }
    set.add(conn);
  }

  remove(conn: WsConnection): void {
    const set = this.connections.get(conn.familyId);
    if (!set) return;
    set.delete(conn);
    if (set.size === 0) this.connections.delete(conn.familyId);
  }

  /** Returns the number of sockets the message was written to. */
  broadcast(familyId: string, message: string): number {
    const set = this.connections.get(familyId);
    if (!set) return 0;
    let sent = 0;
    for (const conn of set) {
      if (conn.socket.readyState === 1 /* OPEN */) {
        conn.socket.send(message);
        sent++;
      }
    }
    return sent;
  }

  size(familyId: string): number {
    return this.connections.get(familyId)?.size ?? 0;
  }
}

/** kinstep:family:{id} → id */
export function familyIdFromChannel(channel: string): string | null {
  if (!channel.startsWith(FAMILY_CHANNEL_PREFIX)) return null;
  const id = channel.slice(FAMILY_CHANNEL_PREFIX.length);
  return id.length > 0 ? id : null;
}

const ClientMessageSchema = z.object({ type: z.string() });

function pong(): string {
  return JSON.stringify({ type: WS_EVENTS.PONG, data: { ts: Date.now() } });
}

// ---------------------------------------------------------------------------
// Fastify plugin
// ---------------------------------------------------------------------------

async function websocketPlugin(fastify: FastifyInstance): Promise<void> {
  await fastify.register(fastifyWebSocket, {
    options: { maxPayload: 4096 },
  });

  const registry = new ConnectionRegistry();

  // -----------------------------------------------------------------------
  // Subscribe to Redis and fan-out to WebSocket connections
  // (ioredis subscribers cannot issue other commands on the same connection)
  // -----------------------------------------------------------------------
  const sub = createRedisClient();
  await sub.connect();

  sub.on('pmessage', (_pattern: string, channel: string, message: string) => {
    const familyId = familyIdFromChannel(channel);
    if (familyId) registry.broadcast(familyId, message);
  });

  await sub.psubscribe(`${FAMILY_CHANNEL_PREFIX}*`);

  // -----------------------------------------------------------------------
  // GET /ws — WebSocket upgrade endpoint
  // -----------------------------------------------------------------------
  fastify.get(
    '/ws',
    { websocket: true, preHandler: [fastify.authenticate] },
    (socket, request) => {
      const user = request.user;
      const conn: WsConnection = { socket, userId: user.sub, familyId: user.family_id };
      registry.add(conn);

      fastify.log.info(`[ws] ${user.sub} connected (family ${user.family_id})`);

      // Acknowledge connection
      socket.send(pong());

      socket.on('message', (raw) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw.toString());
        } catch (err) {
          fastify.log.debug({ err }, '[ws] malformed frame dropped');
          return;
        }
        const msg = ClientMessageSchema.safeParse(parsed);
        if (msg.success && msg.data.type === WS_EVENTS.PING) socket.send(pong());
      });

      socket.on('close', () => {
        registry.remove(conn);
        fastify.log.info(`[ws] ${user.sub} disconnected`);
      });

      socket.on('error', (err) => {
        fastify.log.warn({ err }, '[ws] Socket error');
        registry.remove(conn);
      });
    },
  );

  // -----------------------------------------------------------------------
  // Graceful shutdown — close Redis connection
  // -----------------------------------------------------------------------
  fastify.addHook('onClose', async () => {
    await sub.punsubscribe();
    sub.disconnect();
  });
}

export default fp(websocketPlugin, { name: 'websocket-plugin', dependencies: ['auth'] });
