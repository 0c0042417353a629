#!/usr/bin/env node
/**
 * Table Harvest MCP: Main Server Entry Point
 *
 * Extracts tables from report and wiki HTML, exports them as CSV, enriches
 * them with contact data and renders change pages.
 * Pipeline: Extract -> Export -> Enrich -> Render
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { fileURLToPath } from "url";
import * as path from "path";

import { extractHtmlTable } from "./tools/extract.js";
import { exportTableCsv } from "./tools/csv.js";
import { enrichContacts } from "./tools/enrich.js";
import { processReport } from "./tools/report.js";
import { countCompliance } from "./tools/compliance.js";
import { renderChangePageTool } from "./tools/confluence.js";
import { runList, runStatus } from "./tools/utilities.js";

import {
  CountComplianceSchema,
  EnrichContactsSchema,
  ExportCsvSchema,
  ExtractTableSchema,
  ProcessReportSchema,
  RenderChangePageSchema,
  RunListSchema,
  RunStatusSchema,
} from "./schemas.js";

import { loadConfig } from "./config.js";
import { initRunManager } from "./run-manager.js";
import { createLogger, errorMessage, formatErrorResponse, isToolError } from "./utils.js";

// Runs are stored under the installation directory, not the caller's cwd
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const SERVER_BASE_DIR = path.resolve(__dirname, "..");

const server = new McpServer({
  name: "table-harvest-mcp",
  version: "0.1.0",
});

function toToolResponse(result: object): { isError?: true; content: Array<{ type: "text"; text: string }> } {
  if (isToolError(result)) {
    return formatErrorResponse(result);
  }
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
}

// ============================================================================
// EXTRACTION TOOLS
// ============================================================================

server.tool(
  "tableharvest_extract_table",
  "Extract one table from an HTML document. Cells resolve to the text of their first nested element (div, span, a, p, strong, em, b, i) or their own text. Tables with no content are skipped and the next table is used.",
  ExtractTableSchema.shape,
  async (args) => toToolResponse(await extractHtmlTable(args))
);

server.tool(
  "tableharvest_export_csv",
  "Extract a table from HTML and save it as CSV in the run's output directory. Rows are padded or truncated to the header width.",
  ExportCsvSchema.shape,
  async (args) => toToolResponse(await exportTableCsv(args))
);

server.tool(
  "tableharvest_process_report",
  "Process a report export (JSON with widgets[0].content HTML): extract the table, save CSV and enrich it with contact data. Enrichment failures are returned as warnings.",
  ProcessReportSchema.shape,
  async (args) => toToolResponse(await processReport(args))
);

// ============================================================================
// ENRICHMENT AND RENDERING TOOLS
// ============================================================================

server.tool(
  "tableharvest_enrich_contacts",
  "Fill the Owner and Email columns of a run CSV from a contact mapping CSV (AssignmentGroup, Contact, Email).",
  EnrichContactsSchema.shape,
  async (args) => toToolResponse(await enrichContacts(args))
);

server.tool(
  "tableharvest_count_compliance",
  "Count 'N/A' and 'No' statuses in a column of the first table of a wiki page.",
  CountComplianceSchema.shape,
  async (args) => toToolResponse(await countCompliance(args))
);

server.tool(
  "tableharvest_render_change_page",
  "Render a weekend change list CSV as a storage-format page: call-out changes in a table, others in an expand section.",
  RenderChangePageSchema.shape,
  async (args) => toToolResponse(await renderChangePageTool(args))
);

// ============================================================================
// UTILITY TOOLS
// ============================================================================

server.tool(
  "tableharvest_run_status",
  "Get the status of a run: per-step status, outputs, errors and totals.",
  RunStatusSchema.shape,
  async (args) => toToolResponse(await runStatus(args))
);

server.tool(
  "tableharvest_run_list",
  "List runs newest first, optionally filtered by status.",
  RunListSchema.shape,
  async (args) => toToolResponse(await runList(args))
);

// ============================================================================
// SERVER STARTUP
// ============================================================================

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  const manager = initRunManager(SERVER_BASE_DIR, config);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("Table Harvest MCP server started", { runs_dir: manager.getRunsDir() });
}

main().catch((error) => {
  logger.error("Fatal error", { error: errorMessage(error) });
  process.exit(1);
});
