// =============================================================================
// Kinstep API — Fastify application factory
// Separated from server.ts to enable testing without starting a server.
// =============================================================================

import Fastify from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyHelmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import { config } from './config.js';
import { HttpError } from './errors.js';
import authPlugin from './plugins/auth.js';
import errorHandlerPlugin from './plugins/error-handler.js';
import jobsPlugin from './plugins/jobs.js';
import storePlugin from './plugins/store.js';
import websocketPlugin from './plugins/websocket.js';
import { registerRoutes } from './routes/index.js';
import {
  NoopEventPublisher,
  RedisEventPublisher,
  type FamilyEventPublisher,
} from './services/events.js';
import { createFamilyStore, type FamilyStore } from './services/store/index.js';
import { backgroundJobs, type JobStarter } from './workers/index.js';

export interface BuildAppOptions {
  /** Defaults to the store selected by DATA_SOURCE. */
  store?: FamilyStore;
  /** Defaults to Redis when real-time delivery is enabled. */
  events?: FamilyEventPublisher;
  /** Registers the /ws endpoint and its Redis subscriber. */
  realtime?: boolean;
  /** Jobs run against this app's store; defaults to the BullMQ jobs when IN_PROCESS_JOBS is on. */
  jobs?: readonly JobStarter[];
}

export async function buildApp(options: BuildAppOptions = {}) {
  const realtime = options.realtime ?? config.realtimeEnabled;

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      // Pino pretty-print in development
      ...(config.isDev
        ? {
            transport: {
              target: 'pino-pretty',
              options: { colorize: true, translateTime: 'SYS:HH:MM:ss' },
            },
          }
        : {
            // Health readings stay out of structured logs
            redact: {
              paths: [
                'req.headers.authorization',
                'req.headers.cookie',
                'req.query.token',
                'req.body.heart_rate',
                'req.body.resting_heart_rate',
                'req.body.mood_score',
              ],
              censor: '[Redacted]',
            },
          }),
    },
    // Trust X-Forwarded-For in production (behind load balancer)
    trustProxy: config.isProd,
  });

  // ------------------------------------------------------------------
  // Security headers
  // ------------------------------------------------------------------
  await fastify.register(fastifyHelmet, {
    hsts: config.isProd
      ? { maxAge: 31536000, includeSubDomains: true, preload: true }
      : false,
    noSniff: true,
    frameguard: { action: 'deny' },
    hidePoweredBy: true,
    contentSecurityPolicy: false, // CSP applied at the CDN
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  });

  await fastify.register(fastifyCors, {
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });

  // ------------------------------------------------------------------
  // Global rate limiting
  // ------------------------------------------------------------------
  await fastify.register(fastifyRateLimit, {
    global: true,
    max: 200,
    timeWindow: '1 minute',
    // Reconnecting dashboards retry the upgrade rapidly; it is auth-gated anyway
    allowList: (request) => request.headers.upgrade === 'websocket',
    // Thrown into the error handler, which renders the standard envelope
    errorResponseBuilder: (_request, context) =>
      new HttpError(429, 'RATE_LIMITED', `Too many requests. Retry after ${context.after}.`),
  });

  // ------------------------------------------------------------------
  // Plugins
  // ------------------------------------------------------------------
  await fastify.register(errorHandlerPlugin);
  await fastify.register(authPlugin);
  await fastify.register(storePlugin, {
    store: options.store ?? createFamilyStore(fastify.log),
    events: options.events ?? (realtime ? new RedisEventPublisher() : new NoopEventPublisher()),
  });
  if (realtime) await fastify.register(websocketPlugin);

  const jobs = options.jobs ?? (config.inProcessJobs ? backgroundJobs : []);
  if (jobs.length > 0) await fastify.register(jobsPlugin, { jobs });

  // ------------------------------------------------------------------
  // Routes
  // ------------------------------------------------------------------
  await registerRoutes(fastify);

  return fastify;
}

export type App = Awaited<ReturnType<typeof buildApp>>;
