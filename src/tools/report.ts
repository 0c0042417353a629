/**
 * Table Harvest: Report Processing Tool
 *
 * Report exports arrive as JSON with the rendered HTML of the first widget
 * in `widgets[0].content`. Processing runs extract -> CSV -> enrich. A failed
 * enrichment leaves the plain CSV in place and is reported as a warning.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import type { ToolError } from "../types.js";
import { ProcessReportInputSchema, type ProcessReportInput } from "../schemas.js";
import { getRunManager } from "../run-manager.js";
import { isEmptyTable, rectangularize } from "../table/index.js";
import { createToolError, errorMessage, isToolError, now } from "../utils.js";
import { toCsv } from "./csv.js";
import { enrichRunCsv, type EnrichOutcome } from "./enrich.js";
import { engineLogger, extractOrError } from "./extract.js";
import { readRunFile, writeRunFile } from "./run-files.js";

// ============================================================================
// Report Format
// ============================================================================

const ReportWidgetSchema = z.object({
  content: z.string().optional(),
}).passthrough();

export const ReportSchema = z.object({
  widgets: z.array(ReportWidgetSchema),
}).passthrough();

/**
 * Pull the HTML of the first widget out of a report JSON document.
 */
export function reportHtml(reportJson: string): string | ToolError {
  let data: unknown;
  try {
    data = JSON.parse(reportJson);
  } catch (err) {
    return createToolError("PARSE_ERROR", `Error parsing report JSON: ${errorMessage(err)}`);
  }

  const report = ReportSchema.safeParse(data);
  if (!report.success || report.data.widgets.length === 0) {
    return createToolError("PARSE_ERROR", "No 'widgets' array found in report JSON or widgets array is empty", {
      details: report.success ? undefined : report.error.issues,
    });
  }

  const content = report.data.widgets[0].content;
  if (!content) {
    return createToolError("PARSE_ERROR", "No 'content' field found in first widget");
  }

  return content;
}

// ============================================================================
// Process Tool
// ============================================================================

export interface ProcessReportResult {
  success: true;
  run_id: string;
  csv_path: string;
  output_path: string;
  header_count: number;
  row_count: number;
  enrichment: EnrichOutcome | null;
  warnings: string[];
}

export async function processReport(input: ProcessReportInput): Promise<ProcessReportResult | ToolError> {
  const parsed = ProcessReportInputSchema.parse(input);
  const manager = getRunManager();
  const config = manager.getConfig();
  const { runId, runDir, logger } = await manager.ensureRun(parsed.run_id);

  await manager.startStep(runId, "report");

  const fail = async (error: ToolError): Promise<ToolError> => {
    await logger.error("report", error.message, error.details);
    await manager.completeStep(runId, "report", {
      errors: [{ timestamp: now(), code: error.code, message: error.message, recoverable: error.recoverable }],
    });
    return error;
  };

  let reportJson: string | ToolError;
  if (parsed.report_json !== undefined) {
    reportJson = parsed.report_json;
    const saved = await writeRunFile(runDir, `raw/${config.files.report}`, reportJson);
    if (isToolError(saved)) return fail(saved);
  } else {
    reportJson = await readRunFile(runDir, parsed.report_path ?? `raw/${config.files.report}`);
  }
  if (isToolError(reportJson)) return fail(reportJson);

  const html = reportHtml(reportJson);
  if (isToolError(html)) return fail(html);

  const extracted = extractOrError(html, parsed.target_table ?? config.extract.target_table, engineLogger(config));
  if (isToolError(extracted)) return fail(extracted);

  if (isEmptyTable(extracted.table)) {
    return fail(createToolError("EMPTY_CONTENT", "No table data extracted from report HTML", {
      recoverable: true,
      suggestion: "The report may have no rows for the selected period",
    }));
  }

  const table = rectangularize(extracted.table);
  const csvPath = `output/${parsed.csv_filename ?? config.files.csv}`;
  const outputPath = await writeRunFile(runDir, csvPath, toCsv(table));
  if (isToolError(outputPath)) return fail(outputPath);

  await logger.info("report", `Saved ${table.rows.length} rows to ${csvPath}`);

  const warnings: string[] = [];
  const enrichment = await enrichRunCsv(runDir, {
    csvPath,
    contactsPath: parsed.contacts_path ?? `raw/${config.files.contacts}`,
    contactsCsv: parsed.contacts_csv,
  }, config);

  if (isToolError(enrichment)) {
    const warning = `Contact enrichment failed, basic table extraction succeeded: ${enrichment.message}`;
    warnings.push(warning);
    await logger.warn("report", warning, { code: enrichment.code });
  } else {
    await logger.info("report", `Lookup statistics: ${enrichment.stats.found} found, ${enrichment.stats.not_found} not found`);
  }

  const enriched = isToolError(enrichment) ? null : enrichment;
  await manager.completeStep(runId, "report", {
    outputs: [csvPath],
    totals: {
      tables_extracted: 1,
      rows_extracted: table.rows.length,
      rows_enriched: enriched ? enriched.stats.found + enriched.stats.not_found : 0,
    },
  });

  return {
    success: true,
    run_id: runId,
    csv_path: csvPath,
    output_path: outputPath,
    header_count: table.headers.length,
    row_count: table.rows.length,
    enrichment: enriched,
    warnings,
  };
}
