/**
 * SQLite database schema
 * Defines tables for process flows and their child collections
 */

/**
 * Schema version for migrations
 */
export const SCHEMA_VERSION = 1;

/**
 * Tables holding flow data, parent first
 */
export const FLOW_TABLES = [
  'process_flows',
  'process_steps',
  'process_roles',
  'process_tools',
  'compliance_requirements',
] as const;

export type FlowTable = (typeof FLOW_TABLES)[number];

/**
 * Migration to create all tables
 */
export const SCHEMA_MIGRATION = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Process flows: one row per extraction
CREATE TABLE IF NOT EXISTS process_flows (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  process_name TEXT NOT NULL,
  process_description TEXT,
  source_document TEXT NOT NULL,
  document_path TEXT,
  document_relative_path TEXT,
  extraction_model TEXT,
  extraction_timestamp TEXT NOT NULL DEFAULT (datetime('now')),
  raw_data TEXT, -- recovered object as JSON, kept for audit and replay
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Steps: ordered actions, list columns hold JSON arrays
CREATE TABLE IF NOT EXISTS process_steps (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  process_flow_id INTEGER NOT NULL,
  step_number INTEGER NOT NULL,
  step_name TEXT NOT NULL,
  description TEXT,
  responsible_role TEXT,
  inputs TEXT,
  outputs TEXT,
  decision_points TEXT,
  next_steps TEXT,
  FOREIGN KEY (process_flow_id) REFERENCES process_flows(id) ON DELETE CASCADE
);

-- Roles involved in a flow
CREATE TABLE IF NOT EXISTS process_roles (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  process_flow_id INTEGER NOT NULL,
  role_name TEXT NOT NULL,
  FOREIGN KEY (process_flow_id) REFERENCES process_flows(id) ON DELETE CASCADE
);

-- Tools and systems used by a flow
CREATE TABLE IF NOT EXISTS process_tools (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  process_flow_id INTEGER NOT NULL,
  tool_name TEXT NOT NULL,
  FOREIGN KEY (process_flow_id) REFERENCES process_flows(id) ON DELETE CASCADE
);

-- Compliance requirements a flow must satisfy
CREATE TABLE IF NOT EXISTS compliance_requirements (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  process_flow_id INTEGER NOT NULL,
  requirement TEXT NOT NULL,
  FOREIGN KEY (process_flow_id) REFERENCES process_flows(id) ON DELETE CASCADE
);

-- Indexes for common queries
CREATE INDEX IF NOT EXISTS idx_process_flows_document ON process_flows(source_document);
CREATE INDEX IF NOT EXISTS idx_process_steps_flow ON process_steps(process_flow_id);
CREATE INDEX IF NOT EXISTS idx_process_roles_flow ON process_roles(process_flow_id);
CREATE INDEX IF NOT EXISTS idx_process_tools_flow ON process_tools(process_flow_id);
CREATE INDEX IF NOT EXISTS idx_compliance_requirements_flow ON compliance_requirements(process_flow_id);
`;
