/**
 * Table Harvest: Compliance Status Counter
 *
 * Counts "N/A" and "No" statuses in one column of the first table of a
 * published wiki page. Status cells usually hold a status macro
 * (`<span data-macro-name="status">`); plain cell text is the fallback.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as cheerio from "cheerio";
import type { ToolError } from "../types.js";
import { CountComplianceInputSchema, type CountComplianceInput } from "../schemas.js";
import { getRunManager } from "../run-manager.js";
import { createToolError, isToolError, now } from "../utils.js";
import { loadHtmlSource } from "./run-files.js";

export interface ComplianceCounts {
  na: number;
  no: number;
}

/**
 * Count N/A and No statuses in the named column of the first table.
 * The first row supplies the header labels (from its th cells).
 */
export function countComplianceStatuses(html: string, column: string = "Enabled"): ComplianceCounts | ToolError {
  const $ = cheerio.load(html);

  const table = $("table").first();
  if (table.length === 0) {
    return createToolError("PARSE_ERROR", "Could not find table in HTML content.");
  }

  const rows = table.find("tr");
  const headerRow = rows.first();
  if (headerRow.length === 0) {
    return createToolError("PARSE_ERROR", "Could not find header row in the table.");
  }

  const headers = headerRow.children("th").map((_, th) => $(th).text().trim()).get();
  const columnIndex = headers.indexOf(column);
  if (columnIndex === -1) {
    return createToolError("COLUMN_NOT_FOUND", `Could not find '${column}' column header in the table.`, {
      details: { headers },
    });
  }

  const counts: ComplianceCounts = { na: 0, no: 0 };

  rows.slice(1).each((_, row) => {
    const cells = $(row).children("td, th");
    if (cells.length <= columnIndex) return;

    const cell = cells.eq(columnIndex);
    const statusMacro = cell.find('span[data-macro-name="status"]').first();
    const status = (statusMacro.length > 0 ? statusMacro : cell).text().trim();

    if (status === "N/A") {
      counts.na++;
    } else if (status === "No") {
      counts.no++;
    }
  });

  return counts;
}

// ============================================================================
// Count Tool
// ============================================================================

export interface CountComplianceResult extends ComplianceCounts {
  success: true;
  run_id: string;
  column: string;
  source: string;
}

export async function countCompliance(input: CountComplianceInput): Promise<CountComplianceResult | ToolError> {
  const parsed = CountComplianceInputSchema.parse(input);
  const manager = getRunManager();
  const { runId, runDir, logger } = await manager.ensureRun(parsed.run_id);

  await manager.startStep(runId, "compliance");

  const fail = async (error: ToolError): Promise<ToolError> => {
    await logger.error("compliance", error.message, error.details);
    await manager.completeStep(runId, "compliance", {
      errors: [{ timestamp: now(), code: error.code, message: error.message, recoverable: error.recoverable }],
    });
    return error;
  };

  const source = await loadHtmlSource(runDir, parsed);
  if (isToolError(source)) return fail(source);

  const counts = countComplianceStatuses(source.html, parsed.column);
  if (isToolError(counts)) return fail(counts);

  await logger.info("compliance", `Counted ${counts.na} N/A and ${counts.no} No`, { column: parsed.column });
  await manager.completeStep(runId, "compliance", {});

  return {
    success: true,
    run_id: runId,
    column: parsed.column,
    source: source.source,
    ...counts,
  };
}
