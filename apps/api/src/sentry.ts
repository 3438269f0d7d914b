// =============================================================================
// Kinstep API — Sentry initialisation
// Call initSentry() first thing in server.ts / worker.ts.
//
// • Only active when SENTRY_DSN is set (skipped in dev/test).
// • Strips auth headers and health fields from events before they leave the
//   process.
// =============================================================================

import * as Sentry from '@sentry/node';
import { config } from './config.js';

// Fields whose values must never appear in Sentry events
const SCRUB_KEYS = new Set([
  'authorization', 'cookie', 'x-api-key', 'token',
  'heart_rate', 'resting_heart_rate', 'mood_score', 'sleep_hours',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scrubObject(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (SCRUB_KEYS.has(k.toLowerCase())) {
      out[k] = '[Filtered]';
    } else if (isRecord(v)) {
      out[k] = scrubObject(v);
    } else {
      out[k] = v;
    }
  }
  return out;
}

function scrubHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    out[k] = SCRUB_KEYS.has(k.toLowerCase()) ? '[Filtered]' : v;
  }
  return out;
}

export function initSentry(): void {
  if (!config.sentryDsn) return;

  const sentryRelease = process.env['SENTRY_RELEASE'];
  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.nodeEnv,
    ...(sentryRelease ? { release: sentryRelease } : {}),

    // Only sample 10% of traces in production to keep quota low
    tracesSampleRate: config.isProd ? 0.1 : 1.0,

    beforeSend(event) {
      if (event.request?.headers) {
        event.request.headers = scrubHeaders(event.request.headers);
      }
      if (event.request && isRecord(event.request.data)) {
        event.request.data = scrubObject(event.request.data);
      }
      return event;
    },
  });
}

/** Capture an exception with an optional extra context map. */
export function captureException(
  err: unknown,
  context?: Record<string, unknown>,
): void {
  if (!config.sentryDsn) return;
  Sentry.withScope((scope) => {
    if (context) scope.setContext('context', scrubObject(context));
    Sentry.captureException(err);
  });
}
