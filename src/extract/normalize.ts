/**
 * Flow normalization
 * Maps a recovered object onto the canonical ProcessFlow shape
 *
 * Every field schema carries a `.catch` fallback, so parsing never fails:
 * missing or malformed values degrade to '' / [] / 0.
 */

import { z } from 'zod';
import type { RecoveredObject } from './recover.js';

/**
 * Weak reference to another step (usually its step number)
 */
export type StepReference = number | string;

/**
 * One ordered action within a process flow
 */
export interface Step {
  stepNumber: number;
  stepName: string;
  description: string;
  responsibleRole: string;
  inputs: string[];
  outputs: string[];
  decisionPoints: string[];
  nextSteps: StepReference[];
}

/**
 * One extraction result
 */
export interface ProcessFlow {
  processName: string;
  processDescription: string;
  sourceDocument: string;
  documentPath: string;
  documentRelativePath: string;
  extractionModel: string;
  steps: Step[];
  roles: string[];
  toolsSystems: string[];
  complianceRequirements: string[];
  /** Recovered object exactly as the model produced it */
  rawData: RecoveredObject;
}

const text = z.string().catch('');

/**
 * Array of strings; other element types are dropped
 */
const textList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === 'string'));

/**
 * Unique strings in first-seen order
 */
const textSet = textList.transform((items) => [...new Set(items)]);

/**
 * Integers, or strings holding an integer
 */
const stepNumber = z
  .union([z.number().int(), z.string().trim().regex(/^-?\d+$/).transform(Number)])
  .catch(0);

const stepReferences = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.filter((item): item is StepReference => typeof item === 'string' || typeof item === 'number')
  );

/**
 * Step as the prompt asks the model to write it
 */
export const RecoveredStepSchema = z.object({
  step_number: stepNumber,
  step_name: text,
  description: text,
  responsible_role: text,
  inputs: textList,
  outputs: textList,
  decision_points: textList,
  next_steps: stepReferences,
});

const steps = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => {
      const parsed = RecoveredStepSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    })
  );

/**
 * Top-level flow as the prompt asks the model to write it
 */
export const RecoveredFlowSchema = z.object({
  process_name: text,
  process_description: text,
  steps,
  roles: textSet,
  tools_systems: textSet,
  compliance_requirements: textSet,
});

export type RecoveredFlow = z.infer<typeof RecoveredFlowSchema>;
export type RecoveredStep = z.infer<typeof RecoveredStepSchema>;

function toStep(step: RecoveredStep): Step {
  return {
    stepNumber: step.step_number,
    stepName: step.step_name,
    description: step.description,
    responsibleRole: step.responsible_role,
    inputs: step.inputs,
    outputs: step.outputs,
    decisionPoints: step.decision_points,
    nextSteps: step.next_steps,
  };
}

/**
 * Normalize a recovered object into a ProcessFlow
 * Document identity and model always come from the arguments
 */
export function normalizeFlow(
  obj: RecoveredObject,
  documentName: string,
  documentPath: string,
  documentRelativePath: string,
  modelId: string
): ProcessFlow {
  // safeParse cannot fail: each field falls back through .catch
  const parsed = RecoveredFlowSchema.safeParse(obj);
  const flow: RecoveredFlow = parsed.success
    ? parsed.data
    : RecoveredFlowSchema.parse({});

  return {
    processName: flow.process_name,
    processDescription: flow.process_description,
    sourceDocument: documentName,
    documentPath,
    documentRelativePath,
    extractionModel: modelId,
    steps: flow.steps.map(toStep),
    roles: flow.roles,
    toolsSystems: flow.tools_systems,
    complianceRequirements: flow.compliance_requirements,
    rawData: obj,
  };
}
