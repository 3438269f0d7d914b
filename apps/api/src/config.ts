// =============================================================================
// Kinstep API — Environment configuration
// All env vars are validated at startup. Missing required vars cause a crash.
// =============================================================================

type DataSource = 'sample' | 'postgres';

function required(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val === 'true';
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined) return fallback;
  const parsed = Number(val);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer, got "${val}"`);
  }
  return parsed;
}

function dataSource(): DataSource {
  const val = optional('DATA_SOURCE', 'sample');
  if (val === 'sample' || val === 'postgres') return val;
  throw new Error(`DATA_SOURCE must be "sample" or "postgres", got "${val}"`);
}

const nodeEnv = optional('NODE_ENV', 'development');
const source = dataSource();

export const config = {
  // Server
  port: Number(optional('API_PORT', '3000')),
  host: optional('API_HOST', '0.0.0.0'),
  nodeEnv,
  corsOrigin: optional('CORS_ORIGIN', 'http://localhost:5173'),
  logLevel: optional('LOG_LEVEL', nodeEnv === 'development' ? 'debug' : 'info'),

  // Data source — the record store is only contacted when DATA_SOURCE=postgres
  dataSource: source,
  databaseUrl: source === 'postgres' ? required('DATABASE_URL') : (process.env['DATABASE_URL'] ?? ''),

  // Auth — tokens are issued by the identity provider, verified here
  jwtSecret: required('JWT_SECRET'),

  // Redis (BullMQ + real-time fan-out)
  redisUrl: optional('REDIS_URL', 'redis://localhost:6379'),
  realtimeEnabled: optionalBool('REALTIME_ENABLED', true),

  // Simulated activity
  simulationIntervalMs: optionalInt('SIMULATION_INTERVAL_MS', 30_000),
  rolloverCron: optional('ROLLOVER_CRON', '5 0 * * *'),
  // Sample data is per-process, so the API has to run the jobs itself
  inProcessJobs: optionalBool('IN_PROCESS_JOBS', source === 'sample'),

  // Observability
  sentryDsn: process.env['SENTRY_DSN'] ?? '',

  get isDev(): boolean {
    return this.nodeEnv === 'development';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;
