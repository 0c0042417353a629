/**
 * Table Harvest: Change Page Rendering
 *
 * Renders a weekend change list (CSV) as a wiki page in storage format:
 * call-out changes in a visible table, everything else folded into an
 * expand macro.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ToolError } from "../types.js";
import { RenderChangePageInputSchema, type RenderChangePageInput } from "../schemas.js";
import { getRunManager } from "../run-manager.js";
import { createToolError, isToolError, now } from "../utils.js";
import { parseCsvRecords } from "./csv.js";
import { openRun, readRunFile, writeRunFile } from "./run-files.js";

export type ChangeRecord = Record<string, string>;

export const REQUIRED_CHANGE_COLUMNS = ["Change ID", "Summary", "Assignee", "Impact", "Risk", "Date", "Tags"] as const;

const TAG_COLUMN = "Tags";
const CALL_OUT_TAG = "Call_out";
const STATUS_COLUMN = "Implement status";
const COMMENT_COLUMN = "Comment (Mandatory)";
const RATED_COLUMNS = new Set(["Impact", "Risk"]);

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

// ============================================================================
// Row Grouping
// ============================================================================

export function splitByTag(
  records: ChangeRecord[],
  tagColumn: string = TAG_COLUMN,
  tagValue: string = CALL_OUT_TAG
): { callOut: ChangeRecord[]; other: ChangeRecord[] } {
  const callOut: ChangeRecord[] = [];
  const other: ChangeRecord[] = [];
  for (const record of records) {
    if ((record[tagColumn] ?? "").trim() === tagValue) {
      callOut.push(record);
    } else {
      other.push(record);
    }
  }
  return { callOut, other };
}

// ============================================================================
// Storage Format
// ============================================================================

/**
 * Escape a cell value; Impact and Risk values get a traffic-light background.
 */
export function formatCell(value: string, column: string): string {
  if (!RATED_COLUMNS.has(column)) return escapeHtml(value);

  const lower = value.toLowerCase();
  let color = "#ccffcc";
  if (lower.includes("high") || lower.includes("critical")) {
    color = "#ffcccc";
  } else if (lower.includes("medium") || lower.includes("moderate")) {
    color = "#ffe6cc";
  }

  return `<span style="background-color: ${color}; padding: 2px 4px;">${escapeHtml(value)}</span>`;
}

/**
 * Render change records as a table. The tag column is dropped and two
 * empty columns are appended for the implementer to fill in.
 *
 * @param columns - Column order; defaults to the keys of the first record
 */
export function renderTable(records: ChangeRecord[], columns?: string[]): string {
  const [first] = records;
  if (!first) return "<p>No data available</p>";

  const headers = (columns ?? Object.keys(first)).filter(column => column !== TAG_COLUMN);
  if (!headers.includes(STATUS_COLUMN)) headers.push(STATUS_COLUMN);
  if (!headers.includes(COMMENT_COLUMN)) headers.push(COMMENT_COLUMN);

  const parts = ['<table data-layout="default">', "<thead><tr>"];
  for (const header of headers) {
    parts.push(header === COMMENT_COLUMN
      ? '<th><p>Comment <span style="color: red;">Mandatory</span></p></th>'
      : `<th><p><strong>${escapeHtml(header)}</strong></p></th>`);
  }
  parts.push("</tr></thead>", "<tbody>");

  for (const record of records) {
    parts.push("<tr>");
    for (const header of headers) {
      parts.push(`<td><p>${formatCell(record[header] ?? "", header)}</p></td>`);
    }
    parts.push("</tr>");
  }

  parts.push("</tbody>", "</table>");
  return parts.join("");
}

export function renderExpandSection(title: string, body: string): string {
  return [
    "",
    '<ac:structured-macro ac:name="expand" ac:schema-version="1">',
    `<ac:parameter ac:name="title">${escapeHtml(title)}</ac:parameter>`,
    "<ac:rich-text-body>",
    body,
    "</ac:rich-text-body>",
    "</ac:structured-macro>",
    "",
  ].join("\n");
}

export function renderChangePage(records: ChangeRecord[], columns?: string[]): string {
  const { callOut, other } = splitByTag(records);

  const parts = [
    "<h2>Weekend Change Summary</h2>",
    "<h3>Critical Changes (Call Out Required)</h3>",
    callOut.length > 0 ? renderTable(callOut, columns) : "<p>No critical changes requiring call out.</p>",
    other.length > 0
      ? renderExpandSection("Standard Changes", renderTable(other, columns))
      : "<p>No standard changes scheduled.</p>",
  ];

  return parts.join("");
}

/**
 * Title for the coming Saturday's change note (the same day on a Saturday).
 * Dates are taken in UTC.
 */
export function weekendPageTitle(date: Date = new Date()): string {
  const daysUntilSaturday = (6 - date.getUTCDay() + 7) % 7;
  const saturday = new Date(date.getTime() + daysUntilSaturday * 24 * 60 * 60 * 1000);
  return `Weekend Change Note - ${saturday.toISOString().slice(0, 10)}`;
}

// ============================================================================
// Render Tool
// ============================================================================

export interface RenderChangePageResult {
  success: true;
  run_id: string;
  title: string;
  output_path: string;
  call_out_count: number;
  other_count: number;
}

export async function renderChangePageTool(input: RenderChangePageInput): Promise<RenderChangePageResult | ToolError> {
  const parsed = RenderChangePageInputSchema.parse(input);
  const manager = getRunManager();
  const config = manager.getConfig();
  const run = await openRun(parsed.run_id);
  if (isToolError(run)) return run;
  const { runDir, logger } = run;

  await manager.startStep(parsed.run_id, "render");

  const fail = async (error: ToolError): Promise<ToolError> => {
    await logger.error("render", error.message, error.details);
    await manager.completeStep(parsed.run_id, "render", {
      errors: [{ timestamp: now(), code: error.code, message: error.message, recoverable: error.recoverable }],
    });
    return error;
  };

  const csvPath = parsed.csv_path ?? `output/${config.files.csv}`;
  const csvText = await readRunFile(runDir, csvPath);
  if (isToolError(csvText)) return fail(csvText);

  const { headers, records } = parseCsvRecords(csvText);
  const missing = REQUIRED_CHANGE_COLUMNS.filter(column => !headers.includes(column));
  if (missing.length > 0) {
    return fail(createToolError("CONFIG_INVALID", `Missing required columns: ${missing.join(", ")}`, {
      details: { required: REQUIRED_CHANGE_COLUMNS, found: headers },
      recoverable: true,
    }));
  }

  const { callOut, other } = splitByTag(records);
  const page = renderChangePage(records, headers);
  const title = weekendPageTitle(parsed.date ? new Date(`${parsed.date}T00:00:00Z`) : new Date());

  const outputPath = await writeRunFile(runDir, "output/page.xhtml", page);
  if (isToolError(outputPath)) return fail(outputPath);

  await logger.info("render", `Rendered '${title}'`, { call_out: callOut.length, other: other.length });
  await manager.completeStep(parsed.run_id, "render", { outputs: ["output/page.xhtml"] });

  return {
    success: true,
    run_id: parsed.run_id,
    title,
    output_path: outputPath,
    call_out_count: callOut.length,
    other_count: other.length,
  };
}
