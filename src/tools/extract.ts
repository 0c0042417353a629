/**
 * Table Harvest: Table Extraction Tool
 *
 * Runs the streaming table parser over an HTML document held in a run and
 * records the extracted table as extracted/table.json.
 *
 * An empty result is a normal outcome ("no table data extracted") and is
 * reported with `found: false`. Input that cannot be tokenized is a
 * PARSE_ERROR.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { TableHarvestConfig, TableResult, ToolError } from "../types.js";
import { ExtractTableInputSchema, type ExtractTableInput } from "../schemas.js";
import { getRunManager } from "../run-manager.js";
import { extractTable, isEmptyTable, MalformedInputError } from "../table/index.js";
import { createLogger, createToolError, isToolError, now, type Logger } from "../utils.js";
import { loadHtmlSource, writeRunFile } from "./run-files.js";

// ============================================================================
// Types
// ============================================================================

export interface TableStats {
  header_count: number;
  row_count: number;
  /** Widest data row; can differ from header_count before rectangularization */
  max_row_width: number;
  duration_ms: number;
}

export interface ExtractTableResult {
  success: true;
  run_id: string;
  found: boolean;
  message: string;
  source: string;
  headers: string[];
  rows: string[][];
  stats: TableStats;
  output_path: string;
}

// ============================================================================
// Shared Extraction Step
// ============================================================================

export function engineLogger(config: TableHarvestConfig): Logger {
  return createLogger("table", { level: config.logging.level });
}

/**
 * Extract one table, turning tokenizer failures into a PARSE_ERROR.
 */
export function extractOrError(
  html: string,
  targetTable: number,
  logger: Logger
): { table: TableResult; stats: TableStats } | ToolError {
  const start = performance.now();
  try {
    const table = extractTable(html, { targetTable, logger });
    return {
      table,
      stats: {
        header_count: table.headers.length,
        row_count: table.rows.length,
        max_row_width: table.rows.reduce((max, row) => Math.max(max, row.length), 0),
        duration_ms: Math.round(performance.now() - start),
      },
    };
  } catch (err) {
    if (err instanceof MalformedInputError) {
      return createToolError("PARSE_ERROR", `Input could not be parsed as HTML: ${err.message}`, {
        recoverable: false,
        suggestion: "Check that the document is HTML and not truncated or binary",
      });
    }
    throw err;
  }
}

// ============================================================================
// Main Implementation
// ============================================================================

/**
 * Extract the first table with content from an HTML document.
 *
 * @example
 * ```typescript
 * const result = await extractHtmlTable({
 *   html: "<table><tr><th>Name</th></tr><tr><td>Ada</td></tr></table>",
 * });
 * // result.headers -> ["Name"], result.rows -> [["Ada"]]
 * ```
 */
export async function extractHtmlTable(input: ExtractTableInput): Promise<ExtractTableResult | ToolError> {
  const parsed = ExtractTableInputSchema.parse(input);
  const manager = getRunManager();
  const config = manager.getConfig();
  const { runId, runDir, logger } = await manager.ensureRun(parsed.run_id);

  await manager.startStep(runId, "extract");

  const source = await loadHtmlSource(runDir, parsed);
  if (isToolError(source)) {
    await manager.completeStep(runId, "extract", {
      errors: [{ timestamp: now(), code: source.code, message: source.message, recoverable: source.recoverable }],
    });
    return source;
  }

  const targetTable = parsed.target_table ?? config.extract.target_table;
  const extracted = extractOrError(source.html, targetTable, engineLogger(config));
  if (isToolError(extracted)) {
    await logger.error("extract", extracted.message, { source: source.source });
    await manager.completeStep(runId, "extract", {
      errors: [{ timestamp: now(), code: extracted.code, message: extracted.message, recoverable: false }],
    });
    return extracted;
  }

  const { table, stats } = extracted;
  const found = !isEmptyTable(table);

  const outputPath = await writeRunFile(runDir, "extracted/table.json", JSON.stringify(table, null, 2));
  if (isToolError(outputPath)) {
    await manager.completeStep(runId, "extract", {
      errors: [{ timestamp: now(), code: outputPath.code, message: outputPath.message, recoverable: outputPath.recoverable }],
    });
    return outputPath;
  }

  const message = found
    ? `Extracted table with ${stats.header_count} headers and ${stats.row_count} rows`
    : "No table data extracted";

  if (found) {
    await logger.info("extract", message, { source: source.source, target_table: targetTable });
  } else {
    await logger.warn("extract", message, { source: source.source, target_table: targetTable });
  }

  await manager.completeStep(runId, "extract", {
    outputs: ["extracted/table.json"],
    totals: { tables_extracted: found ? 1 : 0, rows_extracted: stats.row_count },
  });

  return {
    success: true,
    run_id: runId,
    found,
    message,
    source: source.source,
    headers: table.headers,
    rows: table.rows,
    stats,
    output_path: outputPath,
  };
}
