/**
 * Extract command
 * Reads a folder of documents and stores one process flow per document
 */

import { Command } from 'commander';
import { getConfig, validateConfig } from '../../config/index.js';
import { createFlowStore } from '../../db/flows.js';
import { readDocuments } from '../../documents/reader.js';
import { resolvePromptTemplate } from '../../extract/prompts.js';
import { createProviderFromConfig } from '../../llm/factory.js';
import { runFlowPipeline } from '../../pipeline/extract.js';
import { errorMessage } from '../../utils/errors.js';
import { withDatabase } from './shared.js';

/** Options for the extract command */
export interface ExtractCommandOptions {
  provider?: string;
  model?: string;
  db?: string;
  promptFile?: string;
  maxContentLength?: string;
  recursive: boolean;
}

/**
 * Register the extract command on the program
 */
export function registerExtractCommand(program: Command): void {
  program
    .command('extract <folder>')
    .description('Extract process flows from the documents in a folder')
    .option('--provider <name>', 'LLM provider (openai, anthropic, ollama, custom)')
    .option('--model <id>', 'Model identifier')
    .option('--db <path>', 'Path to the SQLite database')
    .option('--prompt-file <path>', 'Prompt template file')
    .option('--max-content-length <n>', 'Characters of each document sent to the model')
    .option('--no-recursive', 'Only read the top folder')
    .action(async (folder: string, options: ExtractCommandOptions) => {
      try {
        const base = getConfig();
        const config = validateConfig({
          ...base,
          provider: options.provider?.toLowerCase() ?? base.provider,
          model: options.model ?? base.model,
          dbPath: options.db ?? base.dbPath,
          promptFile: options.promptFile ?? base.promptFile,
          maxContentLength: options.maxContentLength ?? base.maxContentLength,
        });

        const provider = createProviderFromConfig(config);
        const template = await resolvePromptTemplate({ promptFile: config.promptFile });
        const documents = await readDocuments(folder, { recursive: options.recursive });

        console.log(`Extracting process flows from: ${folder}`);
        console.log(`Provider: ${provider.name} (${provider.model})`);
        console.log(`Documents: ${documents.length}`);
        console.log('');

        const result = await withDatabase({ db: config.dbPath }, (db) =>
          runFlowPipeline(
            documents,
            {
              provider,
              store: createFlowStore(db),
              template,
              maxContentLength: config.maxContentLength,
            },
            {
              onProgress: (progress) => {
                if (progress.state === 'pending') {
                  process.stdout.write(`\rExtracting: ${progress.current}/${progress.total} - ${progress.document}`);
                }
              },
            }
          )
        );
        if (documents.length > 0) {
          process.stdout.write('\r' + ' '.repeat(80) + '\r');
        }

        console.log('Extraction complete!');
        console.log(`  Persisted: ${result.ids.length}`);
        console.log(`  Failed: ${result.failures.length}`);
        console.log(`  Duration: ${result.duration}ms`);

        if (result.ids.length > 0) {
          console.log(`\nFlow ids: ${result.ids.join(', ')}`);
        }

        if (result.failures.length > 0) {
          console.log(`\nFailures (${result.failures.length}):`);
          for (const failure of result.failures) {
            console.log(`  ! ${failure.document} [${failure.stage}] ${failure.errorKind}: ${failure.message}`);
          }
          process.exitCode = 1;
        }
      } catch (err) {
        console.error('Failed to run extraction:', errorMessage(err));
        process.exitCode = 1;
      }
    });
}
