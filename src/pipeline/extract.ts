/**
 * Extraction pipeline
 * Drives each document through prompt, provider, recovery, normalization and storage
 */

import type { FlowStore } from '../db/flows.js';
import type { DocumentInput } from '../documents/reader.js';
import type { LLMProvider } from '../llm/provider.js';
import { buildPrompt, DEFAULT_MAX_CONTENT_LENGTH, DEFAULT_PROMPT_TEMPLATE } from '../extract/prompts.js';
import { recover as defaultRecover, type StructuralRecovery } from '../extract/recover.js';
import { normalizeFlow } from '../extract/normalize.js';
import { ProcflowError, MalformedOutputError, errorMessage, type ErrorCode } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Document fields the pipeline reads
 */
export type PipelineDocument = Omit<DocumentInput, 'extension'>;

/**
 * Per-document state, in the order a document moves through them
 */
export type DocumentState =
  | 'pending'
  | 'prompted'
  | 'sent'
  | 'recovered'
  | 'normalized'
  | 'persisted'
  | 'failed';

/**
 * Stage a document was trying to reach when it failed
 */
export type PipelineStage = Exclude<DocumentState, 'pending' | 'failed'>;

export type ErrorKind = ErrorCode | 'UNKNOWN_ERROR';

/**
 * Failure record for one document
 */
export interface PipelineFailure {
  document: string;
  stage: PipelineStage;
  errorKind: ErrorKind;
  message: string;
}

/**
 * Final outcome for one document
 */
export type DocumentOutcome =
  | { document: string; state: 'persisted'; flowId: number }
  | { document: string; state: 'failed'; failure: PipelineFailure };

/**
 * Pipeline progress, reported on every state transition
 */
export interface PipelineProgress {
  document: string;
  /** 1-based position in the batch */
  current: number;
  total: number;
  state: DocumentState;
}

/**
 * Collaborators for a run
 */
export interface PipelineDeps {
  provider: LLMProvider;
  store: FlowStore;
  template?: string;
  maxContentLength?: number;
  /** Replaces the default structural recovery */
  recover?: StructuralRecovery;
  logger?: Logger;
}

/**
 * Run options
 */
export interface PipelineOptions {
  onProgress?: (progress: PipelineProgress) => void;
}

/**
 * Pipeline result
 */
export interface PipelineResult {
  /** Identifiers of persisted flows, in input order */
  ids: number[];
  failures: PipelineFailure[];
  outcomes: DocumentOutcome[];
  duration: number;
}

function toErrorKind(error: unknown): ErrorKind {
  return error instanceof ProcflowError ? error.code : 'UNKNOWN_ERROR';
}

/**
 * Process one document; failures are logged and returned, never thrown
 */
async function processDocument(
  document: PipelineDocument,
  deps: Required<Omit<PipelineDeps, 'logger'>>,
  logger: Logger,
  enter: (state: DocumentState) => void
): Promise<DocumentOutcome> {
  const name = document.relativePath;
  let stage: PipelineStage = 'prompted';

  try {
    const prompt = buildPrompt(deps.template, document.name, document.content, deps.maxContentLength, logger);
    enter('prompted');

    stage = 'sent';
    const rawText = await deps.provider.send(prompt);
    enter('sent');

    stage = 'recovered';
    const recovered = deps.recover(rawText);
    enter('recovered');

    stage = 'normalized';
    const flow = normalizeFlow(
      recovered,
      document.name,
      document.path,
      document.relativePath,
      deps.provider.model
    );
    enter('normalized');

    stage = 'persisted';
    const flowId = deps.store.save(flow);
    enter('persisted');

    logger.info({ document: name, flowId, steps: flow.steps.length }, 'Extracted process flow');
    return { document: name, state: 'persisted', flowId };
  } catch (error) {
    const failure: PipelineFailure = {
      document: name,
      stage,
      errorKind: toErrorKind(error),
      message: errorMessage(error),
    };
    logger.error(
      error instanceof MalformedOutputError ? { ...failure, rawExcerpt: error.rawExcerpt } : failure,
      'Document extraction failed'
    );
    enter('failed');
    return { document: name, state: 'failed', failure };
  }
}

/**
 * Run the pipeline over documents, sequentially and in input order
 * A failing document is recorded and the batch continues
 */
export async function runFlowPipeline(
  documents: readonly PipelineDocument[],
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const startTime = Date.now();
  const logger = deps.logger ?? createLogger({ module: 'pipeline' });
  const progress = options.onProgress || (() => {});
  const resolved = {
    provider: deps.provider,
    store: deps.store,
    template: deps.template ?? DEFAULT_PROMPT_TEMPLATE,
    maxContentLength: deps.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH,
    recover: deps.recover ?? defaultRecover,
  };

  const result: PipelineResult = { ids: [], failures: [], outcomes: [], duration: 0 };

  logger.info(
    { documents: documents.length, provider: deps.provider.name, model: deps.provider.model },
    'Starting extraction'
  );

  for (let i = 0; i < documents.length; i++) {
    const document = documents[i];
    const enter = (state: DocumentState): void => {
      logger.debug({ document: document.relativePath, state }, 'Document state');
      try {
        progress({ document: document.relativePath, current: i + 1, total: documents.length, state });
      } catch (error) {
        logger.warn(
          { document: document.relativePath, state, error: errorMessage(error) },
          'Progress callback failed'
        );
      }
    };

    enter('pending');
    const outcome = await processDocument(document, resolved, logger, enter);

    result.outcomes.push(outcome);
    if (outcome.state === 'persisted') {
      result.ids.push(outcome.flowId);
    } else {
      result.failures.push(outcome.failure);
    }
  }

  result.duration = Date.now() - startTime;
  logger.info(
    { persisted: result.ids.length, failed: result.failures.length, duration: result.duration },
    'Extraction complete'
  );

  return result;
}

/**
 * Pipeline bound to its collaborators
 */
export class FlowPipeline {
  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions = {}
  ) {}

  /**
   * Run and return the identifiers of persisted flows
   */
  async run(documents: readonly PipelineDocument[]): Promise<number[]> {
    const result = await this.runDetailed(documents);
    return result.ids;
  }

  /**
   * Run and return the full result
   */
  runDetailed(documents: readonly PipelineDocument[]): Promise<PipelineResult> {
    return runFlowPipeline(documents, this.deps, this.options);
  }
}
