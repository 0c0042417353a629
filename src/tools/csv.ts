/**
 * Table Harvest: CSV Codec and Export Tool
 *
 * Serializes extracted tables to CSV (rectangularized to the header width)
 * and reads CSV back for enrichment and page rendering.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { TableResult, ToolError } from "../types.js";
import { ExportCsvInputSchema, type ExportCsvInput } from "../schemas.js";
import { getRunManager } from "../run-manager.js";
import { isEmptyTable, rectangularize } from "../table/index.js";
import { createToolError, isToolError, now } from "../utils.js";
import { engineLogger, extractOrError } from "./extract.js";
import { loadHtmlSource, writeRunFile } from "./run-files.js";

// ============================================================================
// CSV Writing
// ============================================================================

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field when it contains a delimiter, quote or line break.
 *
 * @example
 * escapeCsvField('Simple "basic" widget') // returns '"Simple ""basic"" widget"'
 */
export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize a table. Rows are padded or truncated to the header width; the
 * header line is omitted when there are no headers.
 */
export function toCsv(table: TableResult): string {
  const { headers, rows } = rectangularize(table);
  const records = headers.length > 0 ? [headers, ...rows] : rows;
  return records.map(record => record.map(escapeCsvField).join(",") + "\n").join("");
}

// ============================================================================
// CSV Parsing
// ============================================================================

/**
 * Parse CSV text into records. Handles quoted fields with embedded
 * delimiters, doubled quotes and line breaks; accepts \n and \r\n.
 *
 * @example
 * parseCsv('Product,Description\n"Widget A","A great, amazing widget"\n')
 * // returns [["Product", "Description"], ["Widget A", "A great, amazing widget"]]
 */
export function parseCsv(text: string, delimiter: string = ","): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      record.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines carry no record
  return records.filter(r => !(r.length === 1 && r[0] === ""));
}

/**
 * Parse CSV with a header line into keyed records (like a dict reader).
 * Missing trailing fields read as "".
 */
export function parseCsvRecords(text: string): { headers: string[]; records: Array<Record<string, string>> } {
  const [headers = [], ...rows] = parseCsv(text);
  const records = rows.map(row => {
    const record: Record<string, string> = {};
    headers.forEach((header, index) => {
      record[header] = row[index] ?? "";
    });
    return record;
  });
  return { headers, records };
}

/**
 * Read a CSV back into a table: first record is the header row.
 */
export function csvToTable(text: string): TableResult {
  const [headers = [], ...rows] = parseCsv(text);
  return { headers, rows };
}

// ============================================================================
// Export Tool
// ============================================================================

export interface ExportCsvResult {
  success: true;
  run_id: string;
  output_path: string;
  csv_path: string;
  header_count: number;
  row_count: number;
}

/**
 * Extract a table and save it as CSV under output/.
 * An empty extraction is an EMPTY_CONTENT error: there is nothing to write.
 */
export async function exportTableCsv(input: ExportCsvInput): Promise<ExportCsvResult | ToolError> {
  const parsed = ExportCsvInputSchema.parse(input);
  const manager = getRunManager();
  const config = manager.getConfig();
  const { runId, runDir, logger } = await manager.ensureRun(parsed.run_id);

  await manager.startStep(runId, "export");

  const fail = async (error: ToolError): Promise<ToolError> => {
    await logger.error("export", error.message, error.details);
    await manager.completeStep(runId, "export", {
      errors: [{ timestamp: now(), code: error.code, message: error.message, recoverable: error.recoverable }],
    });
    return error;
  };

  const source = await loadHtmlSource(runDir, parsed);
  if (isToolError(source)) return fail(source);

  const extracted = extractOrError(
    source.html,
    parsed.target_table ?? config.extract.target_table,
    engineLogger(config)
  );
  if (isToolError(extracted)) return fail(extracted);

  if (isEmptyTable(extracted.table)) {
    return fail(createToolError("EMPTY_CONTENT", "No table data extracted", {
      details: { source: source.source },
      recoverable: true,
      suggestion: "The report may be empty; check target_table or the exported page",
    }));
  }

  const csvPath = `output/${parsed.csv_filename ?? config.files.csv}`;
  const table = rectangularize(extracted.table);
  const outputPath = await writeRunFile(runDir, csvPath, toCsv(table));
  if (isToolError(outputPath)) return fail(outputPath);

  await logger.info("export", `Saved ${table.rows.length} rows to ${csvPath}`);
  await manager.completeStep(runId, "export", {
    outputs: [csvPath],
    totals: { tables_extracted: 1, rows_extracted: table.rows.length },
  });

  return {
    success: true,
    run_id: runId,
    output_path: outputPath,
    csv_path: csvPath,
    header_count: table.headers.length,
    row_count: table.rows.length,
  };
}
