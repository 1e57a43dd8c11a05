import type Database from 'better-sqlite3';
import type { Migration } from '../types.js';
import { DatabaseError, MigrationError, toError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { migration001 } from './001-initial-schema.js';

const migrations: Migration[] = [migration001];

const logger = createLogger('Migrations');

/** Schema version this build writes */
export const LATEST_SCHEMA_VERSION = migrations.reduce((max, m) => Math.max(max, m.version), 0);

/**
 * Bring the checkpoint store up to LATEST_SCHEMA_VERSION, one transaction
 * per migration. A store written by a newer build is refused untouched.
 */
export function runMigrations(db: Database.Database): void {
  const currentVersion = getCurrentVersion(db);
  if (currentVersion > LATEST_SCHEMA_VERSION) {
    throw new DatabaseError(
      `Checkpoint store has schema version ${currentVersion}; this citegraph supports up to ${LATEST_SCHEMA_VERSION}`,
    );
  }

  const pending = migrations
    .filter((m) => m.version > currentVersion)
    .sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    try {
      db.transaction(() => {
        migration.up(db);
      })();
    } catch (err) {
      throw new MigrationError(migration.version, toError(err));
    }
    logger.debug(`Checkpoint schema migrated to version ${migration.version}`);
  }
}

export function getCurrentVersion(db: Database.Database): number {
  const tableExists = db
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
    )
    .get() as { name: string } | undefined;

  if (!tableExists) {
    return 0;
  }

  const row = db
    .prepare('SELECT MAX(version) AS max_version FROM schema_version')
    .get() as { max_version: number | null } | undefined;

  return row?.max_version ?? 0;
}
