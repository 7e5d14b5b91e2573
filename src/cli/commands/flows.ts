/**
 * Flow commands
 * list, show, delete
 */

import { Command } from 'commander';
import { listProcessFlows, getProcessFlow, getRawProcessFlow, deleteProcessFlow } from '../../db/flows.js';
import { errorMessage } from '../../utils/errors.js';
import { withDatabase, parseFlowId, type DatabaseCommandOptions } from './shared.js';

/** Options for the list command */
export interface ListOptions extends DatabaseCommandOptions {
  json?: boolean;
}

/** Options for the show command */
export interface ShowOptions extends DatabaseCommandOptions {
  raw?: boolean;
}

/**
 * Register flow commands on the program
 */
export function registerFlowCommands(program: Command): void {
  program
    .command('list')
    .description('List stored process flows, newest first')
    .option('--db <path>', 'Path to the SQLite database')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions) => {
      try {
        const flows = await withDatabase(options, (db) => listProcessFlows(db));

        if (options.json) {
          console.log(JSON.stringify(flows, null, 2));
          return;
        }

        if (flows.length === 0) {
          console.log('No process flows stored.');
          return;
        }

        console.log(`Process flows (${flows.length}):`);
        for (const flow of flows) {
          console.log(`  #${flow.id} ${flow.processName || '(unnamed)'} - ${flow.stepCount} steps`);
          console.log(`      ${flow.sourceDocument} [${flow.extractionModel}] ${flow.createdAt}`);
        }
      } catch (err) {
        console.error('Failed to list process flows:', errorMessage(err));
        process.exitCode = 1;
      }
    });

  program
    .command('show')
    .description('Print a stored process flow as JSON')
    .argument('<id>', 'Process flow id', parseFlowId)
    .option('--db <path>', 'Path to the SQLite database')
    .option('--raw', 'Print the object recovered from the model output')
    .action(async (id: number, options: ShowOptions) => {
      try {
        const flow = await withDatabase(options, (db) =>
          options.raw ? getRawProcessFlow(db, id) : getProcessFlow(db, id)
        );

        if (!flow) {
          console.error(`Process flow not found: ${id}`);
          process.exitCode = 1;
          return;
        }

        console.log(JSON.stringify(flow, null, 2));
      } catch (err) {
        console.error('Failed to read process flow:', errorMessage(err));
        process.exitCode = 1;
      }
    });

  program
    .command('delete')
    .description('Delete a stored process flow and its child records')
    .argument('<id>', 'Process flow id', parseFlowId)
    .option('--db <path>', 'Path to the SQLite database')
    .action(async (id: number, options: DatabaseCommandOptions) => {
      try {
        const deleted = await withDatabase(options, (db) => deleteProcessFlow(db, id));

        if (!deleted) {
          console.error(`Process flow not found: ${id}`);
          process.exitCode = 1;
          return;
        }

        console.log(`Deleted process flow ${id}`);
      } catch (err) {
        console.error('Failed to delete process flow:', errorMessage(err));
        process.exitCode = 1;
      }
    });
}
