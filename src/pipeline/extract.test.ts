/**
 * Extraction pipeline tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { runFlowPipeline, FlowPipeline, type PipelineDocument, type PipelineProgress } from './extract.js';
import { initDatabase, closeDatabase, getDatabaseStats, type DatabaseInstance } from '../db/connection.js';
import { createFlowStore, getProcessFlow, getRawProcessFlow, type FlowStore } from '../db/flows.js';
import type { LLMProvider } from '../llm/provider.js';
import type { ProviderKind } from '../config/index.js';
import { StorageError, TransportError } from '../utils/errors.js';

/**
 * Replies to prompts from a script, one entry per call
 */
class ScriptedProvider implements LLMProvider {
  readonly name: ProviderKind = 'ollama';
  readonly prompts: string[] = [];

  constructor(
    private readonly replies: Array<string | Error>,
    readonly model: string = 'test-model'
  ) {}

  async send(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies[this.prompts.length - 1];
    if (reply === undefined) {
      throw new Error('No reply scripted');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

function captureLogger(): { logger: pino.Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'debug' }, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

function doc(name: string, content = `Procedure described in ${name}`): PipelineDocument {
  return { content, name, path: `/sops/${name}`, relativePath: name };
}

function flowReply(processName: string): string {
  return JSON.stringify({
    process_name: processName,
    process_description: `${processName} procedure`,
    steps: [{ step_number: 1, step_name: 'Start', next_steps: [2] }],
    roles: ['Clerk'],
    tools_systems: [],
    compliance_requirements: [],
  });
}

describe('runFlowPipeline', () => {
  let db: DatabaseInstance;
  let store: FlowStore;

  beforeEach(async () => {
    db = (await initDatabase(':memory:')).db;
    store = createFlowStore(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('should return an empty result for no documents', async () => {
    const provider = new ScriptedProvider([]);

    const result = await runFlowPipeline([], { provider, store, logger: captureLogger().logger });

    expect(result.ids).toEqual([]);
    expect(result.failures).toEqual([]);
    expect(result.outcomes).toEqual([]);
    expect(provider.prompts).toEqual([]);
  });

  it('should persist the other documents when one times out', async () => {
    const timeout = new TransportError('Request to ollama timed out after 120000ms', 'ollama', undefined, true);
    const provider = new ScriptedProvider([flowReply('Intake'), timeout, flowReply('Closure')]);
    const { logger, lines } = captureLogger();

    const result = await runFlowPipeline([doc('one.txt'), doc('two.txt'), doc('three.txt')], {
      provider,
      store,
      logger,
    });

    expect(result.ids).toEqual([1, 2]);
    expect(getProcessFlow(db, 1)?.sourceDocument).toBe('one.txt');
    expect(getProcessFlow(db, 2)?.sourceDocument).toBe('three.txt');
    expect(result.failures).toEqual([
      {
        document: 'two.txt',
        stage: 'sent',
        errorKind: 'TRANSPORT_ERROR',
        message: 'Request to ollama timed out after 120000ms',
      },
    ]);
    expect(result.outcomes.map((o) => o.state)).toEqual(['persisted', 'failed', 'persisted']);

    const errors = lines.filter((line) => line.level === 50);
    expect(errors).toHaveLength(1);
    expect(errors[0].msg).toBe('Document extraction failed');
    expect(errors[0].document).toBe('two.txt');
  });

  it('should record malformed output at the recovery stage', async () => {
    const provider = new ScriptedProvider(['I could not find a procedure in this document.']);
    const { logger, lines } = captureLogger();

    const result = await runFlowPipeline([doc('memo.txt')], { provider, store, logger });

    expect(result.ids).toEqual([]);
    expect(result.failures).toEqual([
      {
        document: 'memo.txt',
        stage: 'recovered',
        errorKind: 'MALFORMED_OUTPUT_ERROR',
        message: 'No JSON object found in response',
      },
    ]);
    const error = lines.find((line) => line.level === 50);
    expect(error?.rawExcerpt).toBe('I could not find a procedure in this document.');
    expect(getDatabaseStats(db).flowCount).toBe(0);
  });

  it('should record storage failures at the persistence stage', async () => {
    const failingStore: FlowStore = {
      save() {
        throw new StorageError('Failed to save process flow for a.txt: disk full');
      },
    };
    const provider = new ScriptedProvider([flowReply('Audit')]);

    const result = await runFlowPipeline([doc('a.txt')], {
      provider,
      store: failingStore,
      logger: captureLogger().logger,
    });

    expect(result.failures).toEqual([
      {
        document: 'a.txt',
        stage: 'persisted',
        errorKind: 'STORAGE_ERROR',
        message: 'Failed to save process flow for a.txt: disk full',
      },
    ]);
  });

  it('should report unknown errors with a generic kind', async () => {
    const provider = new ScriptedProvider([new Error('socket hang up')]);

    const result = await runFlowPipeline([doc('a.txt')], { provider, store, logger: captureLogger().logger });

    expect(result.failures[0].errorKind).toBe('UNKNOWN_ERROR');
    expect(result.failures[0].message).toBe('socket hang up');
  });

  it('should take identity from the document and the provider model', async () => {
    const reply = JSON.stringify({ process_name: 'Spoof', source_document: 'other.pdf', extraction_model: 'x' });
    const provider = new ScriptedProvider([reply], 'llama3:8b');

    const result = await runFlowPipeline([doc('real.md')], { provider, store, logger: captureLogger().logger });

    const stored = getProcessFlow(db, result.ids[0]);
    expect(stored?.sourceDocument).toBe('real.md');
    expect(stored?.documentPath).toBe('/sops/real.md');
    expect(stored?.extractionModel).toBe('llama3:8b');
    expect(getRawProcessFlow(db, result.ids[0])).toEqual({
      process_name: 'Spoof',
      source_document: 'other.pdf',
      extraction_model: 'x',
    });
  });

  it('should build prompts from the template and truncated content', async () => {
    const provider = new ScriptedProvider([flowReply('Short')]);

    await runFlowPipeline([doc('long.txt', 'abcdefghij')], {
      provider,
      store,
      template: 'Extract the process.',
      maxContentLength: 4,
      logger: captureLogger().logger,
    });

    expect(provider.prompts).toEqual(['Extract the process.\n\n--- Document: long.txt ---\n\nabcd']);
  });

  it('should use a substituted recovery function', async () => {
    const provider = new ScriptedProvider(['process: Payroll']);

    const result = await runFlowPipeline([doc('payroll.txt')], {
      provider,
      store,
      recover: (rawText) => ({ process_name: rawText.replace('process: ', '') }),
      logger: captureLogger().logger,
    });

    expect(getProcessFlow(db, result.ids[0])?.processName).toBe('Payroll');
  });

  it('should report every state transition', async () => {
    const provider = new ScriptedProvider([flowReply('Intake'), new TransportError('down', 'ollama', 503)]);
    const events: PipelineProgress[] = [];

    await runFlowPipeline(
      [doc('one.txt'), doc('two.txt')],
      { provider, store, logger: captureLogger().logger },
      { onProgress: (progress) => events.push(progress) }
    );

    expect(events.filter((e) => e.document === 'one.txt').map((e) => e.state)).toEqual([
      'pending',
      'prompted',
      'sent',
      'recovered',
      'normalized',
      'persisted',
    ]);
    expect(events.filter((e) => e.document === 'two.txt').map((e) => e.state)).toEqual([
      'pending',
      'prompted',
      'failed',
    ]);
    expect(events[events.length - 1]).toEqual({ document: 'two.txt', current: 2, total: 2, state: 'failed' });
  });

  it('should keep outcomes when the progress callback throws', async () => {
    const provider = new ScriptedProvider([flowReply('Intake'), new TransportError('down', 'ollama', 503), flowReply('Closure')]);
    const { logger, lines } = captureLogger();

    const result = await runFlowPipeline(
      [doc('one.txt'), doc('two.txt'), doc('three.txt')],
      { provider, store, logger },
      {
        onProgress: (progress) => {
          if (progress.state === 'persisted' || progress.state === 'failed') {
            throw new Error('display closed');
          }
        },
      }
    );

    expect(result.ids).toEqual([1, 2]);
    expect(result.failures.map((f) => f.document)).toEqual(['two.txt']);
    expect(result.outcomes.map((o) => o.state)).toEqual(['persisted', 'failed', 'persisted']);
    const warnings = lines.filter((line) => line.msg === 'Progress callback failed');
    expect(warnings.map((line) => line.state)).toEqual(['persisted', 'failed', 'persisted']);
  });
});

describe('FlowPipeline', () => {
  it('should return persisted ids from run', async () => {
    const { db } = await initDatabase(':memory:');
    const pipeline = new FlowPipeline({
      provider: new ScriptedProvider([flowReply('A'), flowReply('B')]),
      store: createFlowStore(db),
      logger: captureLogger().logger,
    });

    const ids = await pipeline.run([doc('a.txt'), doc('b.txt')]);

    expect(ids).toEqual([1, 2]);
    closeDatabase(db);
  });
});
