// =============================================================================
// Kinstep — PostgreSQL client (postgres.js)
// =============================================================================

import postgres from 'postgres';

let client: postgres.Sql | null = null;

/**
 * Shared postgres.js connection pool, created on first use so that processes
 * running on the sample data source never need DATABASE_URL.
 *
 * Max connections default: 10. Adjust via DB_POOL_MAX env var.
 *
 * Usage:
 *   import { getSql } from '@kinstep/db';
 *   const sql = getSql();
 *   const rows = await sql`SELECT * FROM family_members WHERE id = ${id}`;
 */
export function getSql(): postgres.Sql {
  if (client) return client;

  const databaseUrl = process.env['DATABASE_URL'];
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  client = postgres(databaseUrl, {
    max: Number(process.env['DB_POOL_MAX'] ?? 10),
    idle_timeout: 30,
    connect_timeout: 10,
    // Prepared statements are disabled for PgBouncer transaction mode compatibility
    prepare: false,
    onnotice: () => {
      // Suppress NOTICE messages
    },
  });
  return client;
}

/**
 * Gracefully close all pool connections. Call during process shutdown.
 */
export async function closeDb(): Promise<void> {
  if (!client) return;
  const closing = client;
  client = null;
  await closing.end({ timeout: 5 });
}
