// =============================================================================
// Kinstep — Schema migrations
//
// Files in packages/db/migrations are named NNN_description.sql and applied in
// prefix order. Each runs in its own transaction together with its
// _migrations row, which keeps a sha256 of the file: an applied migration
// that was edited afterwards stops the run instead of being skipped silently.
// =============================================================================

import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type postgres from 'postgres';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../migrations', import.meta.url));

const FILENAME_PATTERN = /^(\d{3})_[a-z0-9_]+\.sql$/;

export interface MigrationFile {
  filename: string;
  checksum: string;
  sql: string;
}

export interface AppliedMigration {
  filename: string;
  checksum: string | null;
}

export function checksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export async function readMigrationFiles(dir: string = MIGRATIONS_DIR): Promise<MigrationFile[]> {
  const names = (await readdir(dir)).filter((f) => f.endsWith('.sql'));
  return Promise.all(
    names.map(async (filename) => {
      const sql = await readFile(join(dir, filename), 'utf-8');
      return { filename, checksum: checksum(sql), sql };
    }),
  );
}

/** Files still to apply, in order. Throws on bad names, duplicate prefixes or drift. */
export function planMigrations(
  files: readonly MigrationFile[],
  applied: readonly AppliedMigration[],
): MigrationFile[] {
  const byPrefix = new Map<string, string>();
  for (const { filename } of files) {
    const prefix = FILENAME_PATTERN.exec(filename)?.[1];
    if (!prefix) {
      throw new Error(`Migration file name must look like 001_description.sql: ${filename}`);
    }
    const clash = byPrefix.get(prefix);
    if (clash) throw new Error(`Migrations ${clash} and ${filename} share prefix ${prefix}`);
    byPrefix.set(prefix, filename);
  }

  const onDisk = new Map(files.map((f) => [f.filename, f]));
  for (const row of applied) {
    const file = onDisk.get(row.filename);
    if (!file) throw new Error(`Applied migration ${row.filename} is missing from disk`);
    if (row.checksum !== null && row.checksum !== file.checksum) {
      throw new Error(`Migration ${row.filename} was edited after it was applied`);
    }
  }

  const done = new Set(applied.map((row) => row.filename));
  return files
    .filter((f) => !done.has(f.filename))
    .sort((a, b) => a.filename.localeCompare(b.filename));
}

/** Applies pending migrations and returns their file names. */
export async function migrate(
  sql: postgres.Sql,
  log: { info(msg: string): void } = console,
  dir: string = MIGRATIONS_DIR,
): Promise<string[]> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      id          SERIAL      PRIMARY KEY,
      filename    TEXT        NOT NULL UNIQUE,
      checksum    TEXT,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;
  const applied = await sql<AppliedMigration[]>`
    SELECT filename, checksum FROM _migrations ORDER BY id
  `;

  const pending = planMigrations(await readMigrationFiles(dir), applied);
  for (const migration of pending) {
    log.info(`[migrate] applying ${migration.filename}`);
    // Multi-statement DDL needs unsafe (no prepared statements)
    await sql.begin(async (tx) => {
      await tx.unsafe(migration.sql);
      await tx`
        INSERT INTO _migrations (filename, checksum)
        VALUES (${migration.filename}, ${migration.checksum})
      `;
    });
  }
  return pending.map((m) => m.filename);
}
