/**
 * Database Migrations - Versioned schema management
 *
 * Features:
 * - Sequential migration execution
 * - Up/down migrations (string SQL or programmatic)
 * - Migration tracking via _migrations table
 * - Rollback support (single, to-version, full reset)
 */

import type { Database } from './index';
import { createLogger } from '../utils/logger';

const logger = createLogger('migrations');

/** Migration definition */
export type MigrationStep = string | ((db: Database) => void);

export interface Migration {
  /** Migration version (sequential number) */
  version: number;
  /** Migration name for display */
  name: string;
  up: MigrationStep;
  down: MigrationStep;
}

export interface MigrationStatus {
  version: number;
  name: string;
  appliedAt: Date;
}

const MIGRATIONS: Migration[] = [
  // ── Migration 1: uploads, variants, products ────────────────────────────
  {
    version: 1,
    name: 'catalog_schema',
    up: `
      CREATE TABLE IF NOT EXISTS uploads (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        checksum TEXT NOT NULL UNIQUE,
        original_name TEXT NOT NULL,
        total_chunks INTEGER NOT NULL CHECK (total_chunks >= 1),
        received_chunks TEXT NOT NULL DEFAULT '[]',
        status TEXT NOT NULL DEFAULT 'uploading'
          CHECK (status IN ('uploading', 'processing', 'completed', 'failed')),
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS image_variants (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        upload_id INTEGER NOT NULL REFERENCES uploads(id) ON DELETE CASCADE,
        variant TEXT NOT NULL,
        path TEXT NOT NULL,
        width INTEGER NOT NULL,
        height INTEGER NOT NULL,
        checksum TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        UNIQUE (upload_id, variant)
      );

      CREATE TABLE IF NOT EXISTS products (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        sku TEXT NOT NULL UNIQUE,
        name TEXT NOT NULL,
        price REAL NOT NULL CHECK (price >= 0),
        primary_image_id INTEGER REFERENCES image_variants(id) ON DELETE SET NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_uploads_status ON uploads(status);
      CREATE INDEX IF NOT EXISTS idx_image_variants_upload ON image_variants(upload_id)
    `,
    down: `
      DROP TABLE IF EXISTS products;
      DROP TABLE IF EXISTS image_variants;
      DROP TABLE IF EXISTS uploads
    `,
  },
  // ── Migration 2: background job queue ───────────────────────────────────
  {
    version: 2,
    name: 'jobs',
    up: `
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        payload TEXT NOT NULL,
        dedupe_key TEXT,
        result TEXT,
        error TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        started_at INTEGER,
        completed_at INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_jobs_dedupe ON jobs(dedupe_key, status)
    `,
    down: 'DROP TABLE IF EXISTS jobs',
  },
];

// =============================================================================
// Migration Runner
// =============================================================================

export interface MigrationRunner {
  getCurrentVersion(): number;
  getAppliedMigrations(): MigrationStatus[];
  getPendingMigrations(): Migration[];

  /** Run all pending migrations */
  migrate(): void;

  /** Rollback to a specific version */
  rollbackTo(version: number): void;

  rollbackLast(): void;

  /** Rollback everything */
  reset(): void;
}

function runStep(db: Database, step: MigrationStep): void {
  if (typeof step === 'string') {
    // Migration SQL may contain multiple statements
    const statements = step
      .split(';')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    for (const sql of statements) {
      db.run(sql);
    }
  } else {
    step(db);
  }
}

export function createMigrationRunner(db: Database): MigrationRunner {
  db.run(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  function getCurrentVersion(): number {
    const version = db.query('SELECT MAX(version) AS version FROM _migrations')[0]?.version;
    return typeof version === 'number' ? version : 0;
  }

  function getAppliedMigrations(): MigrationStatus[] {
    return db
      .query('SELECT version, name, applied_at FROM _migrations ORDER BY version')
      .map((row) => ({
        version: Number(row.version),
        name: String(row.name),
        appliedAt: new Date(Number(row.applied_at)),
      }));
  }

  function getPendingMigrations(): Migration[] {
    const currentVersion = getCurrentVersion();
    return MIGRATIONS.filter((m) => m.version > currentVersion);
  }

  function applyMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration');
    try {
      db.transaction(() => {
        runStep(db, migration.up);
        db.run('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)', [
          migration.version,
          migration.name,
          Date.now(),
        ]);
      });
      logger.info({ version: migration.version }, 'Migration applied');
    } catch (error) {
      logger.error({ error, version: migration.version }, 'Migration failed');
      throw error;
    }
  }

  function revertMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Reverting migration');
    try {
      db.transaction(() => {
        runStep(db, migration.down);
        db.run('DELETE FROM _migrations WHERE version = ?', [migration.version]);
      });
      logger.info({ version: migration.version }, 'Migration reverted');
    } catch (error) {
      logger.error({ error, version: migration.version }, 'Rollback failed');
      throw error;
    }
  }

  const runner: MigrationRunner = {
    getCurrentVersion,
    getAppliedMigrations,
    getPendingMigrations,

    migrate() {
      const pending = getPendingMigrations();

      if (pending.length === 0) {
        logger.debug('Database is up to date');
        return;
      }

      logger.info({ count: pending.length }, 'Running migrations');
      for (const migration of pending) {
        applyMigration(migration);
      }
      logger.info({ version: getCurrentVersion() }, 'Migrations complete');
    },

    rollbackTo(version) {
      const current = getCurrentVersion();
      if (version >= current) {
        logger.info('Nothing to rollback');
        return;
      }

      const toRevert = MIGRATIONS.filter(
        (m) => m.version > version && m.version <= current,
      ).reverse();

      for (const migration of toRevert) {
        revertMigration(migration);
      }
    },

    rollbackLast() {
      const current = getCurrentVersion();
      if (current === 0) {
        logger.info('Nothing to rollback');
        return;
      }

      const migration = MIGRATIONS.find((m) => m.version === current);
      if (migration) {
        revertMigration(migration);
      }
    },

    reset() {
      runner.rollbackTo(0);
    },
  };

  return runner;
}

/** Get all defined migrations */
export function getMigrations(): Migration[] {
  return [...MIGRATIONS];
}
