/**
 * Table Harvest: Canonical Data Types
 *
 * Shared shapes for extracted tables, run manifests, errors and log events.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// TableResult - The only output of the extraction engine
// ============================================================================

export interface TableResult {
  headers: string[];           // Empty when the table had no header row
  rows: string[][];            // Data rows, each at the width it was parsed with
}

// ============================================================================
// RunManifest - Audit record for a harvesting run
// ============================================================================

export type RunStep = "extract" | "export" | "enrich" | "report" | "compliance" | "render";

export interface RunManifest {
  run_id: string;              // UUID v7 (time-ordered)
  created_at: string;          // ISO8601
  updated_at?: string;
  status: "running" | "completed" | "failed";

  config_hash: string;         // SHA256 of config.json

  steps: Partial<Record<RunStep, StepRecord>>;

  totals: {
    tables_extracted: number;
    rows_extracted: number;
    rows_enriched: number;
    errors_encountered: number;
  };
}

export interface StepRecord {
  started_at: string;
  completed_at?: string;
  status: "running" | "completed" | "failed";
  outputs: string[];           // Paths relative to the run directory
  errors: ErrorRecord[];
}

export interface ErrorRecord {
  timestamp: string;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
}

// ============================================================================
// Configuration
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface TableHarvestConfig {
  version: string;

  storage: {
    runs_dir: string;
  };

  extract: {
    target_table: number;      // 1-based occurrence index
  };

  files: {
    csv: string;
    contacts: string;
    report: string;
  };

  enrich: {
    owner_column: string;
    email_column: string;
    not_found_value: string;
    fallback_group_column: number;
    min_group_name_length: number;
    sample_rows: number;
  };

  logging: {
    level: LogLevel;
  };
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "PARSE_ERROR"
  | "EMPTY_CONTENT"
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "CONFIG_INVALID"
  | "RUN_NOT_FOUND"
  | "COLUMN_NOT_FOUND";

export interface ToolError {
  success: false;
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export interface EventLogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}
