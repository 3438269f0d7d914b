// =============================================================================
// Kinstep — Migration CLI
// Usage: npm run db:migrate (from packages/db), with DATABASE_URL set.
// The sample data source keeps no schema, so there is nothing to migrate.
// =============================================================================

import { closeDb, getSql } from './client.js';
import { migrate } from './migrations.js';

void migrate(getSql())
  .then((applied) => {
    console.info(
      applied.length === 0
        ? '[migrate] Schema is up to date.'
        : `[migrate] Applied ${applied.length} migration(s).`,
    );
  })
  .catch((err: unknown) => {
    console.error('[migrate] Migration failed:', err);
    process.exitCode = 1;
  })
  .finally(() => closeDb());
