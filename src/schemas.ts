/**
 * Table Harvest: Zod Schemas for Tool Input Validation
 *
 * Every tool has a strict schema that enforces type safety and provides
 * clear error messages for invalid inputs.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";

// ============================================================================
// Common Schemas
// ============================================================================

export const RunIdSchema = z.string().uuid().describe("Run directory identifier");

const OptionalRunIdSchema = RunIdSchema.optional()
  .describe("Run directory identifier (a new run is created when omitted)");

const TargetTableSchema = z.number().int().min(1).optional()
  .describe("1-based table occurrence to extract; empty tables are skipped (default from config)");

const HtmlSourceShape = {
  html: z.string().optional()
    .describe("Inline HTML document"),
  input_path: z.string().optional()
    .describe("Path to an HTML file, relative to the run directory (e.g. raw/report.html)"),
};

// ============================================================================
// Extraction Schemas
// ============================================================================

export const ExtractTableInputSchema = z.object({
  run_id: OptionalRunIdSchema,
  ...HtmlSourceShape,
  target_table: TargetTableSchema,
}).strict();

export const ExportCsvInputSchema = z.object({
  run_id: OptionalRunIdSchema,
  ...HtmlSourceShape,
  target_table: TargetTableSchema,
  csv_filename: z.string().regex(/^[\w.-]+\.csv$/).optional()
    .describe("Output file name under output/ (default from config)"),
}).strict();

// ============================================================================
// Enrichment & Report Schemas
// ============================================================================

export const EnrichContactsInputSchema = z.object({
  run_id: RunIdSchema,
  csv_path: z.string().optional()
    .describe("Extracted table CSV, relative to the run directory (default output/<csv file>)"),
  contacts_path: z.string().optional()
    .describe("Contact mapping CSV with AssignmentGroup, Contact, Email columns (default raw/<contacts file>)"),
  contacts_csv: z.string().optional()
    .describe("Inline contact mapping CSV; takes precedence over contacts_path"),
}).strict();

export const ProcessReportInputSchema = z.object({
  run_id: OptionalRunIdSchema,
  report_json: z.string().optional()
    .describe("Inline report JSON ({ widgets: [{ content: '<html>' }] })"),
  report_path: z.string().optional()
    .describe("Report JSON file relative to the run directory (default raw/<report file>)"),
  target_table: TargetTableSchema,
  csv_filename: z.string().regex(/^[\w.-]+\.csv$/).optional(),
  contacts_path: z.string().optional(),
  contacts_csv: z.string().optional(),
}).strict();

// ============================================================================
// Page Schemas
// ============================================================================

export const CountComplianceInputSchema = z.object({
  run_id: OptionalRunIdSchema,
  ...HtmlSourceShape,
  column: z.string().min(1).default("Enabled")
    .describe("Header of the status column to count"),
}).strict();

export const RenderChangePageInputSchema = z.object({
  run_id: RunIdSchema,
  csv_path: z.string().optional()
    .describe("Change list CSV relative to the run directory (default output/<csv file>)"),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional()
    .describe("Reference date (YYYY-MM-DD) for the page title; defaults to today"),
}).strict();

// ============================================================================
// Utility Schemas
// ============================================================================

export const RunStatusInputSchema = z.object({
  run_id: RunIdSchema,
}).strict();

export const RunListInputSchema = z.object({
  status: z.enum(["all", "running", "completed", "failed"]).default("all"),
  limit: z.number().int().min(1).max(1000).default(50),
}).strict();

// ============================================================================
// Type Exports
// ============================================================================

export type ExtractTableInput = z.input<typeof ExtractTableInputSchema>;
export type ExportCsvInput = z.input<typeof ExportCsvInputSchema>;
export type EnrichContactsInput = z.input<typeof EnrichContactsInputSchema>;
export type ProcessReportInput = z.input<typeof ProcessReportInputSchema>;
export type CountComplianceInput = z.input<typeof CountComplianceInputSchema>;
export type RenderChangePageInput = z.input<typeof RenderChangePageInputSchema>;
export type RunStatusInput = z.input<typeof RunStatusInputSchema>;
export type RunListInput = z.input<typeof RunListInputSchema>;

// ============================================================================
// Schema Aliases (for MCP tool registration)
// ============================================================================

export const ExtractTableSchema = ExtractTableInputSchema;
export const ExportCsvSchema = ExportCsvInputSchema;
export const EnrichContactsSchema = EnrichContactsInputSchema;
export const ProcessReportSchema = ProcessReportInputSchema;
export const CountComplianceSchema = CountComplianceInputSchema;
export const RenderChangePageSchema = RenderChangePageInputSchema;
export const RunStatusSchema = RunStatusInputSchema;
export const RunListSchema = RunListInputSchema;
