/**
 * Table Harvest: Contact Enrichment
 *
 * Report tables carry an assignment group per row but their first two
 * columns are placeholders. Enrichment renames them to Owner/Email and fills
 * them from a contact mapping CSV keyed by assignment group.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { TableHarvestConfig, TableResult, ToolError } from "../types.js";
import { EnrichContactsInputSchema, type EnrichContactsInput } from "../schemas.js";
import { getRunManager } from "../run-manager.js";
import { rectangularize } from "../table/index.js";
import { createLogger, createToolError, isToolError, now, type Logger, silentLogger } from "../utils.js";
import { csvToTable, parseCsvRecords, toCsv } from "./csv.js";
import { openRun, readRunFile, writeRunFile } from "./run-files.js";

// ============================================================================
// Types
// ============================================================================

export interface ContactInfo {
  contact: string;
  email: string;
}

export type ContactMapping = Map<string, ContactInfo>;

export interface EnrichStats {
  found: number;
  not_found: number;
}

export const REQUIRED_CONTACT_COLUMNS = ["AssignmentGroup", "Contact", "Email"] as const;

// ============================================================================
// Contact Mapping
// ============================================================================

/**
 * Parse the contact mapping CSV. Rows with a blank AssignmentGroup are
 * skipped; later rows for the same group replace earlier ones.
 */
export function loadContactMapping(csvText: string, logger: Logger = silentLogger): ContactMapping | ToolError {
  const { headers, records } = parseCsvRecords(csvText);

  const missing = REQUIRED_CONTACT_COLUMNS.filter(col => !headers.includes(col));
  if (missing.length > 0) {
    return createToolError("CONFIG_INVALID", `Contact mapping file missing required columns: ${missing.join(", ")}`, {
      details: { required: REQUIRED_CONTACT_COLUMNS, found: headers },
      recoverable: true,
    });
  }

  const mapping: ContactMapping = new Map();
  records.forEach((record, index) => {
    const group = (record.AssignmentGroup ?? "").trim();
    if (!group) {
      // +2: 1-based, after the header line
      logger.warn("Empty AssignmentGroup in contact mapping", { row: index + 2 });
      return;
    }
    mapping.set(group, {
      contact: (record.Contact ?? "").trim(),
      email: (record.Email ?? "").trim(),
    });
  });

  return mapping;
}

// ============================================================================
// Column Detection
// ============================================================================

/**
 * Locate the assignment group column: by header name first, then by the
 * configured fallback index when its sampled values look like group names.
 *
 * @returns Column index, or null when no column qualifies
 */
export function findAssignmentGroupColumn(
  table: TableResult,
  enrich: TableHarvestConfig["enrich"]
): number | null {
  const byName = table.headers.findIndex(
    header => header.includes("AssignmentGroup") || header.toLowerCase().includes("assignment")
  );
  if (byName !== -1) return byName;

  const fallback = enrich.fallback_group_column;
  if (table.headers.length <= fallback) return null;

  const samples = table.rows
    .slice(0, enrich.sample_rows)
    .map(row => (row[fallback] ?? "").trim())
    .filter(value => value.length > 0);

  return samples.some(value => value.length > enrich.min_group_name_length) ? fallback : null;
}

// ============================================================================
// Enrichment
// ============================================================================

/**
 * Rename columns 0/1 to the owner/email labels and fill them per row from
 * the mapping. Returns a new table.
 */
export function enrichTable(
  table: TableResult,
  mapping: ContactMapping,
  groupColumn: number,
  enrich: TableHarvestConfig["enrich"]
): { table: TableResult; stats: EnrichStats } {
  const squared = rectangularize(table);
  const stats: EnrichStats = { found: 0, not_found: 0 };

  const headers = [...squared.headers];
  if (headers.length > 0) headers[0] = enrich.owner_column;
  if (headers.length > 1) headers[1] = enrich.email_column;

  const rows = squared.rows.map(row => {
    const group = (row[groupColumn] ?? "").trim();
    const info = group ? mapping.get(group) : undefined;

    if (info) {
      stats.found++;
    } else {
      stats.not_found++;
    }

    const enriched = [...row];
    if (enriched.length > 0) enriched[0] = info?.contact ?? enrich.not_found_value;
    if (enriched.length > 1) enriched[1] = info?.email ?? enrich.not_found_value;
    return enriched;
  });

  return { table: { headers, rows }, stats };
}

// ============================================================================
// Enrichment Step (shared by the enrich and report tools)
// ============================================================================

export interface EnrichOutcome {
  csv_path: string;
  group_column: number;
  group_header: string;
  stats: EnrichStats;
}

/**
 * Read a run CSV, enrich it and write it back in place.
 */
export async function enrichRunCsv(
  runDir: string,
  options: { csvPath: string; contactsPath: string; contactsCsv?: string },
  config: TableHarvestConfig
): Promise<EnrichOutcome | ToolError> {
  const contactsText = options.contactsCsv ?? await readRunFile(runDir, options.contactsPath);
  if (isToolError(contactsText)) return contactsText;

  const mapping = loadContactMapping(contactsText, createLogger("enrich", { level: config.logging.level }));
  if (isToolError(mapping)) return mapping;
  if (mapping.size === 0) {
    return createToolError("EMPTY_CONTENT", "No contact mapping data available for enrichment", {
      recoverable: true,
    });
  }

  const csvText = await readRunFile(runDir, options.csvPath);
  if (isToolError(csvText)) return csvText;

  const table = csvToTable(csvText);
  if (table.headers.length === 0) {
    return createToolError("EMPTY_CONTENT", `CSV file is empty: ${options.csvPath}`, { recoverable: true });
  }

  const groupColumn = findAssignmentGroupColumn(table, config.enrich);
  if (groupColumn === null) {
    return createToolError("COLUMN_NOT_FOUND", "AssignmentGroup column not found in CSV", {
      details: { available_columns: table.headers },
      recoverable: true,
      suggestion: `Add an 'AssignmentGroup' column or put group names in column ${config.enrich.fallback_group_column + 1}`,
    });
  }

  const { table: enriched, stats } = enrichTable(table, mapping, groupColumn, config.enrich);

  const written = await writeRunFile(runDir, options.csvPath, toCsv(enriched));
  if (isToolError(written)) return written;

  return {
    csv_path: options.csvPath,
    group_column: groupColumn,
    group_header: table.headers[groupColumn] ?? "",
    stats,
  };
}

// ============================================================================
// Enrich Tool
// ============================================================================

export interface EnrichContactsResult extends EnrichOutcome {
  success: true;
  run_id: string;
}

export async function enrichContacts(input: EnrichContactsInput): Promise<EnrichContactsResult | ToolError> {
  const parsed = EnrichContactsInputSchema.parse(input);
  const manager = getRunManager();
  const config = manager.getConfig();
  const run = await openRun(parsed.run_id);
  if (isToolError(run)) return run;
  const { runDir, logger } = run;

  await manager.startStep(parsed.run_id, "enrich");

  const outcome = await enrichRunCsv(runDir, {
    csvPath: parsed.csv_path ?? `output/${config.files.csv}`,
    contactsPath: parsed.contacts_path ?? `raw/${config.files.contacts}`,
    contactsCsv: parsed.contacts_csv,
  }, config);

  if (isToolError(outcome)) {
    await logger.error("enrich", outcome.message, outcome.details);
    await manager.completeStep(parsed.run_id, "enrich", {
      errors: [{ timestamp: now(), code: outcome.code, message: outcome.message, recoverable: outcome.recoverable }],
    });
    return outcome;
  }

  await logger.info("enrich", `Lookup statistics: ${outcome.stats.found} found, ${outcome.stats.not_found} not found`, {
    group_column: outcome.group_column,
  });
  await manager.completeStep(parsed.run_id, "enrich", {
    outputs: [outcome.csv_path],
    totals: { rows_enriched: outcome.stats.found + outcome.stats.not_found },
  });

  return { success: true, run_id: parsed.run_id, ...outcome };
}
