/**
 * Database connection and migration management
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdir } from 'fs/promises';
import { SCHEMA_VERSION, SCHEMA_MIGRATION, FLOW_TABLES } from './schema.js';

/**
 * Database instance type
 */
export type DatabaseInstance = Database.Database;

/**
 * In-memory database path understood by SQLite
 */
export const MEMORY_DB_PATH = ':memory:';

/**
 * Open or create a database connection
 */
export async function openDatabase(dbPath: string): Promise<DatabaseInstance> {
  const inMemory = dbPath === MEMORY_DB_PATH;

  if (!inMemory) {
    await mkdir(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // Cascading deletes of child rows rely on this
  db.pragma('foreign_keys = ON');

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }

  return db;
}

/**
 * Close a database connection
 */
export function closeDatabase(db: DatabaseInstance): void {
  db.close();
}

/**
 * Get current schema version
 */
export function getSchemaVersion(db: DatabaseInstance): number {
  const table = db.prepare(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'"
  ).get();
  if (!table) {
    return 0;
  }

  const row = db.prepare(
    'SELECT version FROM schema_version ORDER BY version DESC LIMIT 1'
  ).get() as { version: number } | undefined;
  return row?.version ?? 0;
}

/**
 * Migration result
 */
export interface MigrationResult {
  applied: boolean;
  fromVersion: number;
  toVersion: number;
  message: string;
}

/**
 * Apply schema migrations
 */
export function applyMigrations(db: DatabaseInstance): MigrationResult {
  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= SCHEMA_VERSION) {
    return {
      applied: false,
      fromVersion: currentVersion,
      toVersion: currentVersion,
      message: 'Schema is up to date',
    };
  }

  runTransaction(db, () => {
    db.exec(SCHEMA_MIGRATION);
    db.prepare(
      'INSERT OR REPLACE INTO schema_version (version) VALUES (?)'
    ).run(SCHEMA_VERSION);
  });

  return {
    applied: true,
    fromVersion: currentVersion,
    toVersion: SCHEMA_VERSION,
    message: `Migrated from version ${currentVersion} to ${SCHEMA_VERSION}`,
  };
}

/**
 * Initialize database with schema
 */
export async function initDatabase(
  dbPath: string
): Promise<{ db: DatabaseInstance; migration: MigrationResult }> {
  const db = await openDatabase(dbPath);
  const migration = applyMigrations(db);
  return { db, migration };
}

/**
 * Check if database exists and has valid schema
 */
export function isDatabaseValid(db: DatabaseInstance): boolean {
  return getSchemaVersion(db) > 0;
}

/**
 * Database statistics
 */
export interface DatabaseStats {
  schemaVersion: number;
  flowCount: number;
  stepCount: number;
  roleCount: number;
  toolCount: number;
  requirementCount: number;
}

/**
 * Get database statistics
 */
export function getDatabaseStats(db: DatabaseInstance): DatabaseStats {
  const counts: Record<string, number> = {};

  for (const table of FLOW_TABLES) {
    const row = db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number };
    counts[table] = row.count;
  }

  return {
    schemaVersion: getSchemaVersion(db),
    flowCount: counts.process_flows,
    stepCount: counts.process_steps,
    roleCount: counts.process_roles,
    toolCount: counts.process_tools,
    requirementCount: counts.compliance_requirements,
  };
}

/**
 * Run a transaction
 * Everything written inside fn commits together or not at all
 */
export function runTransaction<T>(
  db: DatabaseInstance,
  fn: () => T
): T {
  return db.transaction(fn)();
}
