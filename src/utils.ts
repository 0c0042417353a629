/**
 * Table Harvest: Core Utilities
 *
 * Deterministic utilities for hashing, file operations, ID generation,
 * structured errors and logging.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { createHash } from "crypto";
import { v7 as uuidv7 } from "uuid";
import * as fs from "fs/promises";
import * as path from "path";
import type { EventLogEntry, ErrorCode, LogLevel, ToolError } from "./types.js";

// ============================================================================
// Hashing Utilities (Deterministic)
// ============================================================================

/**
 * Generate SHA256 hash of content
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * JSON.stringify with object keys sorted at every level
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Generate config hash for manifest
 */
export function hashConfig(config: unknown): string {
  return sha256(stableStringify(config));
}

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generate time-ordered UUID v7 for run IDs
 */
export function generateRunId(): string {
  return uuidv7();
}

// ============================================================================
// File Operations
// ============================================================================

/**
 * Ensure a directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a path relative to a base directory, refusing to escape it
 */
export function resolveInside(baseDir: string, relativePath: string): string {
  const resolved = path.resolve(baseDir, relativePath);
  const relative = path.relative(baseDir, resolved);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error(`Path escapes run directory: ${relativePath}`);
  }
  return resolved;
}

/**
 * Append records to a JSONL file
 */
export async function appendJsonl(filePath: string, records: unknown[]): Promise<void> {
  const lines = records.map(r => JSON.stringify(r)).join("\n") + "\n";
  await fs.appendFile(filePath, lines, "utf-8");
}

/**
 * Write JSON file (pretty-printed)
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/**
 * Read JSON file
 */
export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    success: false,
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

export function isToolError(value: unknown): value is ToolError {
  return typeof value === "object" && value !== null && "isError" in value && value.isError === true;
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// Logging
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create an event log entry
 */
export function createLogEntry(
  level: LogLevel,
  scope: string,
  message: string,
  data?: unknown
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    scope,
    message,
    data,
  };
}

/**
 * Synchronous structured logger. The extraction engine never awaits, so
 * neither does this.
 */
export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

export type LogSink = (entry: EventLogEntry) => void;

// stdout carries the MCP transport, so log lines go to stderr
const stderrSink: LogSink = entry => {
  console.error(JSON.stringify(entry));
};

export function createLogger(
  scope: string,
  options: { level?: LogLevel; sink?: LogSink } = {}
): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? stderrSink;

  const emit = (level: LogLevel, message: string, data?: unknown): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink(createLogEntry(level, scope, message, data));
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
    child: childScope => createLogger(`${scope}.${childScope}`, options),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/**
 * Logger class for run operations
 */
export class RunLogger {
  private logsDir: string;

  constructor(runDir: string) {
    this.logsDir = path.join(runDir, "logs");
  }

  async init(): Promise<void> {
    await ensureDir(this.logsDir);
  }

  async log(entry: EventLogEntry): Promise<void> {
    const file = entry.level === "error" ? "errors.ndjson" : "events.ndjson";
    await appendJsonl(path.join(this.logsDir, file), [entry]);
  }

  async info(scope: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("info", scope, message, data));
  }

  async warn(scope: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("warn", scope, message, data));
  }

  async error(scope: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("error", scope, message, data));
  }
}

// ============================================================================
// Time Utilities
// ============================================================================

/**
 * Get current ISO8601 timestamp
 */
export function now(): string {
  return new Date().toISOString();
}
