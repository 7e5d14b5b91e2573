/**
 * Helpers shared by CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { getConfig } from '../../config/index.js';
import { initDatabase, closeDatabase, type DatabaseInstance } from '../../db/connection.js';

/** Options for commands that touch the database */
export interface DatabaseCommandOptions {
  db?: string;
}

/**
 * Database path from --db, falling back to configuration
 */
export function resolveDbPath(options: DatabaseCommandOptions): string {
  return resolve(options.db ?? getConfig().dbPath);
}

/**
 * Open (and migrate) the database for the duration of fn
 */
export async function withDatabase<T>(
  options: DatabaseCommandOptions,
  fn: (db: DatabaseInstance) => T | Promise<T>
): Promise<T> {
  const { db } = await initDatabase(resolveDbPath(options));
  try {
    return await fn(db);
  } finally {
    closeDatabase(db);
  }
}

/**
 * Argument parser for flow identifiers
 */
export function parseFlowId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 1) {
    throw new InvalidArgumentError('Flow id must be a positive integer.');
  }
  return id;
}
