/**
 * Extraction prompts module
 * Prompt templates and prompt assembly for process-flow extraction
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Default cap on document characters sent to the model
 */
export const DEFAULT_MAX_CONTENT_LENGTH = 20000;

/**
 * System message for chat and messages style providers
 */
export const EXTRACTION_SYSTEM_PROMPT =
  'You are an expert at extracting structured process flows from SOP documents.';

/**
 * Default instruction template
 */
export const DEFAULT_PROMPT_TEMPLATE = `You are an expert at analyzing Standard Operating Procedures (SOPs) and extracting structured process flow information.

Read the document below and describe the procedure it defines as a single JSON object with this structure:

{
  "process_name": "Short name of the process",
  "process_description": "One or two sentences describing the purpose of the process",
  "steps": [
    {
      "step_number": 1,
      "step_name": "Short name of the step",
      "description": "What happens in this step",
      "responsible_role": "Role that performs the step",
      "inputs": ["Documents, data or materials the step needs"],
      "outputs": ["Documents, data or results the step produces"],
      "decision_points": ["Conditions that change what happens next"],
      "next_steps": [2]
    }
  ],
  "roles": ["Every role involved in the process"],
  "tools_systems": ["Every tool, system or application used"],
  "compliance_requirements": ["Regulations, policies or controls the process must satisfy"]
}

Guidelines:
- Number steps in the order they are performed, starting at 1
- next_steps lists the step_number values that can follow the step; leave it empty for the final step
- Only include information stated or clearly implied by the document
- Use empty strings or empty arrays when the document does not say
- Respond with the JSON object only, without commentary or markdown`;

const log = (): Logger => createLogger({ module: 'prompts' });

/**
 * Cut content to the character limit
 */
export function truncateContent(
  content: string,
  maxContentLength: number
): { content: string; truncated: boolean } {
  if (content.length <= maxContentLength) {
    return { content, truncated: false };
  }
  return { content: content.slice(0, maxContentLength), truncated: true };
}

/**
 * Build the prompt for one document
 * Content over the limit is truncated with a warning
 */
export function buildPrompt(
  template: string,
  documentName: string,
  documentContent: string,
  maxContentLength: number = DEFAULT_MAX_CONTENT_LENGTH,
  logger: Logger = log()
): string {
  const { content, truncated } = truncateContent(documentContent, maxContentLength);

  if (truncated) {
    logger.warn(
      { documentName, originalLength: documentContent.length, maxContentLength },
      'Document content too long, truncating'
    );
  }

  return `${template}\n\n--- Document: ${documentName} ---\n\n${content}`;
}

/**
 * Load a prompt template from a text file
 * @throws ConfigurationError if the file cannot be read
 */
export async function loadPromptTemplate(promptFile: string): Promise<string> {
  const path = resolve(promptFile);
  let template: string;

  try {
    template = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Prompt file could not be read: ${promptFile}`, errorMessage(error));
  }

  if (template.trim() === '') {
    throw new ConfigurationError(`Prompt file is empty: ${promptFile}`);
  }

  log().info({ promptFile: path }, 'Loaded prompt template from file');
  return template;
}

/**
 * Prompt template sources
 */
export interface PromptTemplateOptions {
  customPrompt?: string;
  promptFile?: string;
}

/**
 * Pick the template: file first, then custom text, then the default
 */
export async function resolvePromptTemplate(options: PromptTemplateOptions = {}): Promise<string> {
  if (options.promptFile) {
    return loadPromptTemplate(options.promptFile);
  }
  return options.customPrompt || DEFAULT_PROMPT_TEMPLATE;
}
