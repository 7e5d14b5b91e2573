/**
 * Database commands
 * db init, db stats
 */

import { Command } from 'commander';
import { initDatabase, closeDatabase, getDatabaseStats } from '../../db/connection.js';
import { errorMessage } from '../../utils/errors.js';
import { resolveDbPath, withDatabase, type DatabaseCommandOptions } from './shared.js';

/**
 * Register database commands on the program
 */
export function registerDbCommands(program: Command): void {
  const dbCmd = program
    .command('db')
    .description('Database operations');

  dbCmd
    .command('init')
    .description('Create the database and apply migrations')
    .option('--db <path>', 'Path to the SQLite database')
    .action(async (options: DatabaseCommandOptions) => {
      const dbPath = resolveDbPath(options);
      try {
        const { db, migration } = await initDatabase(dbPath);
        closeDatabase(db);

        console.log(`Database: ${dbPath}`);
        console.log(migration.message);
      } catch (err) {
        console.error('Failed to initialize database:', errorMessage(err));
        process.exitCode = 1;
      }
    });

  dbCmd
    .command('stats')
    .description('Show row counts for the flow tables')
    .option('--db <path>', 'Path to the SQLite database')
    .action(async (options: DatabaseCommandOptions) => {
      try {
        const stats = await withDatabase(options, (db) => getDatabaseStats(db));

        console.log(`Database: ${resolveDbPath(options)}`);
        console.log(`  Schema version: ${stats.schemaVersion}`);
        console.log(`  Process flows: ${stats.flowCount}`);
        console.log(`  Steps: ${stats.stepCount}`);
        console.log(`  Roles: ${stats.roleCount}`);
        console.log(`  Tools/systems: ${stats.toolCount}`);
        console.log(`  Compliance requirements: ${stats.requirementCount}`);
      } catch (err) {
        console.error('Failed to read database stats:', errorMessage(err));
        process.exitCode = 1;
      }
    });
}
