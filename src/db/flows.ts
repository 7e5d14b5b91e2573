/**
 * Process flow persistence
 * Writes a normalized flow and its child rows in one transaction, and reads them back
 */

import type { DatabaseInstance } from './connection.js';
import { runTransaction } from './connection.js';
import type { ProcessFlow, Step, StepReference } from '../extract/normalize.js';
import type { RecoveredObject } from '../extract/recover.js';
import { isRecoveredObject } from '../extract/recover.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

/**
 * Anything that can persist a flow and hand back its identifier
 */
export interface FlowStore {
  save(flow: ProcessFlow): number;
}

/**
 * Flow as reloaded from storage
 */
export interface StoredProcessFlow extends ProcessFlow {
  id: number;
  extractionTimestamp: string;
  createdAt: string;
}

/**
 * Flow summary for listings
 */
export interface ProcessFlowSummary {
  id: number;
  processName: string;
  processDescription: string;
  sourceDocument: string;
  extractionModel: string;
  stepCount: number;
  createdAt: string;
}

/**
 * process_flows row
 */
interface FlowRow {
  id: number;
  process_name: string;
  process_description: string | null;
  source_document: string;
  document_path: string | null;
  document_relative_path: string | null;
  extraction_model: string | null;
  extraction_timestamp: string;
  raw_data: string | null;
  created_at: string;
}

/**
 * process_steps row
 */
interface StepRow {
  step_number: number;
  step_name: string;
  description: string | null;
  responsible_role: string | null;
  inputs: string | null;
  outputs: string | null;
  decision_points: string | null;
  next_steps: string | null;
}

interface SummaryRow {
  id: number;
  process_name: string;
  process_description: string | null;
  source_document: string;
  extraction_model: string | null;
  step_count: number;
  created_at: string;
}

const log = () => createLogger({ module: 'flow-store' });

/**
 * Insert a flow and all its children atomically
 * @returns Identifier of the new process_flows row
 * @throws StorageError if any write fails; nothing is kept in that case
 */
export function saveProcessFlow(db: DatabaseInstance, flow: ProcessFlow): number {
  let flowId: number;

  try {
    flowId = runTransaction(db, () => {
      const result = db.prepare(`
        INSERT INTO process_flows (
          process_name, process_description, source_document,
          document_path, document_relative_path, extraction_model, raw_data
        ) VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        flow.processName,
        flow.processDescription,
        flow.sourceDocument,
        flow.documentPath,
        flow.documentRelativePath,
        flow.extractionModel,
        JSON.stringify(flow.rawData)
      );

      const id = Number(result.lastInsertRowid);

      const insertStep = db.prepare(`
        INSERT INTO process_steps (
          process_flow_id, step_number, step_name, description,
          responsible_role, inputs, outputs, decision_points, next_steps
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      for (const step of flow.steps) {
        insertStep.run(
          id,
          step.stepNumber,
          step.stepName,
          step.description,
          step.responsibleRole,
          JSON.stringify(step.inputs),
          JSON.stringify(step.outputs),
          JSON.stringify(step.decisionPoints),
          JSON.stringify(step.nextSteps)
        );
      }

      const insertRole = db.prepare(
        'INSERT INTO process_roles (process_flow_id, role_name) VALUES (?, ?)'
      );
      for (const role of flow.roles) {
        insertRole.run(id, role);
      }

      const insertTool = db.prepare(
        'INSERT INTO process_tools (process_flow_id, tool_name) VALUES (?, ?)'
      );
      for (const tool of flow.toolsSystems) {
        insertTool.run(id, tool);
      }

      const insertRequirement = db.prepare(
        'INSERT INTO compliance_requirements (process_flow_id, requirement) VALUES (?, ?)'
      );
      for (const requirement of flow.complianceRequirements) {
        insertRequirement.run(id, requirement);
      }

      return id;
    });
  } catch (error) {
    throw new StorageError(
      `Failed to save process flow for ${flow.sourceDocument}: ${errorMessage(error)}`,
      error
    );
  }

  log().info(
    { flowId, processName: flow.processName, steps: flow.steps.length },
    'Inserted process flow'
  );
  return flowId;
}

/**
 * Parse a JSON text column, falling back when it is empty or corrupt
 */
function parseJsonColumn(value: string | null): unknown {
  if (value === null || value === '') {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

function parseStringList(value: string | null): string[] {
  const parsed = parseJsonColumn(value);
  return Array.isArray(parsed)
    ? parsed.filter((item): item is string => typeof item === 'string')
    : [];
}

function parseReferenceList(value: string | null): StepReference[] {
  const parsed = parseJsonColumn(value);
  return Array.isArray(parsed)
    ? parsed.filter((item): item is StepReference => typeof item === 'string' || typeof item === 'number')
    : [];
}

function toStep(row: StepRow): Step {
  return {
    stepNumber: row.step_number,
    stepName: row.step_name,
    description: row.description ?? '',
    responsibleRole: row.responsible_role ?? '',
    inputs: parseStringList(row.inputs),
    outputs: parseStringList(row.outputs),
    decisionPoints: parseStringList(row.decision_points),
    nextSteps: parseReferenceList(row.next_steps),
  };
}

function toRawData(value: string | null): RecoveredObject {
  const parsed = parseJsonColumn(value);
  return isRecoveredObject(parsed) ? parsed : {};
}

/**
 * Reload a flow from the normalized tables
 */
export function getProcessFlow(db: DatabaseInstance, flowId: number): StoredProcessFlow | null {
  const row = db.prepare('SELECT * FROM process_flows WHERE id = ?').get(flowId) as FlowRow | undefined;
  if (!row) {
    return null;
  }

  const steps = db.prepare(`
    SELECT step_number, step_name, description, responsible_role,
           inputs, outputs, decision_points, next_steps
    FROM process_steps
    WHERE process_flow_id = ?
    ORDER BY id
  `).all(flowId) as StepRow[];

  const roles = db.prepare(
    'SELECT role_name FROM process_roles WHERE process_flow_id = ? ORDER BY id'
  ).all(flowId) as Array<{ role_name: string }>;

  const tools = db.prepare(
    'SELECT tool_name FROM process_tools WHERE process_flow_id = ? ORDER BY id'
  ).all(flowId) as Array<{ tool_name: string }>;

  const requirements = db.prepare(
    'SELECT requirement FROM compliance_requirements WHERE process_flow_id = ? ORDER BY id'
  ).all(flowId) as Array<{ requirement: string }>;

  return {
    id: row.id,
    processName: row.process_name,
    processDescription: row.process_description ?? '',
    sourceDocument: row.source_document,
    documentPath: row.document_path ?? '',
    documentRelativePath: row.document_relative_path ?? '',
    extractionModel: row.extraction_model ?? '',
    extractionTimestamp: row.extraction_timestamp,
    createdAt: row.created_at,
    steps: steps.map(toStep),
    roles: roles.map((r) => r.role_name),
    toolsSystems: tools.map((t) => t.tool_name),
    complianceRequirements: requirements.map((r) => r.requirement),
    rawData: toRawData(row.raw_data),
  };
}

/**
 * Get the recovered object stored with a flow
 */
export function getRawProcessFlow(db: DatabaseInstance, flowId: number): RecoveredObject | null {
  const row = db.prepare('SELECT raw_data FROM process_flows WHERE id = ?').get(flowId) as
    | { raw_data: string | null }
    | undefined;
  return row ? toRawData(row.raw_data) : null;
}

/**
 * List all flows, newest first
 */
export function listProcessFlows(db: DatabaseInstance): ProcessFlowSummary[] {
  const rows = db.prepare(`
    SELECT f.id, f.process_name, f.process_description, f.source_document,
           f.extraction_model, f.created_at,
           (SELECT COUNT(*) FROM process_steps s WHERE s.process_flow_id = f.id) AS step_count
    FROM process_flows f
    ORDER BY f.created_at DESC, f.id DESC
  `).all() as SummaryRow[];

  return rows.map((row) => ({
    id: row.id,
    processName: row.process_name,
    processDescription: row.process_description ?? '',
    sourceDocument: row.source_document,
    extractionModel: row.extraction_model ?? '',
    stepCount: row.step_count,
    createdAt: row.created_at,
  }));
}

/**
 * Find flows extracted from a document
 */
export function findFlowIdsByDocument(db: DatabaseInstance, sourceDocument: string): number[] {
  const rows = db.prepare(
    'SELECT id FROM process_flows WHERE source_document = ? ORDER BY id'
  ).all(sourceDocument) as Array<{ id: number }>;
  return rows.map((r) => r.id);
}

/**
 * Delete a flow; child rows go with it through ON DELETE CASCADE
 * @returns true if a flow was deleted
 */
export function deleteProcessFlow(db: DatabaseInstance, flowId: number): boolean {
  try {
    const result = db.prepare('DELETE FROM process_flows WHERE id = ?').run(flowId);
    return result.changes > 0;
  } catch (error) {
    throw new StorageError(`Failed to delete process flow ${flowId}: ${errorMessage(error)}`, error);
  }
}

/**
 * FlowStore backed by a SQLite connection
 */
export function createFlowStore(db: DatabaseInstance): FlowStore {
  return {
    save: (flow) => saveProcessFlow(db, flow),
  };
}
