/**
 * Table Harvest: Configuration
 *
 * Defaults merged with overrides from TABLE_HARVEST_* environment variables.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import type { TableHarvestConfig } from "./types.js";

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: TableHarvestConfig = {
  version: "1.0.0",

  storage: {
    runs_dir: "runs",
  },

  extract: {
    target_table: 1,
  },

  files: {
    csv: "extracted_table.csv",
    contacts: "assignment_group_contact.csv",
    report: "report_output.json",
  },

  enrich: {
    owner_column: "Owner",
    email_column: "Email",
    not_found_value: "Not Found",
    fallback_group_column: 3,
    min_group_name_length: 2,
    sample_rows: 3,
  },

  logging: {
    level: "info",
  },
};

// ============================================================================
// Environment Overrides
// ============================================================================

const EnvSchema = z.object({
  TABLE_HARVEST_RUNS_DIR: z.string().min(1).optional(),
  TABLE_HARVEST_TARGET_TABLE: z.coerce.number().int().min(1).optional(),
  TABLE_HARVEST_CSV_FILE: z.string().min(1).optional(),
  TABLE_HARVEST_CONTACTS_FILE: z.string().min(1).optional(),
  TABLE_HARVEST_REPORT_FILE: z.string().min(1).optional(),
  TABLE_HARVEST_GROUP_COLUMN: z.coerce.number().int().min(0).optional(),
  TABLE_HARVEST_MIN_GROUP_LENGTH: z.coerce.number().int().min(0).optional(),
  TABLE_HARVEST_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type ConfigOverrides = {
  [K in keyof TableHarvestConfig]?: TableHarvestConfig[K] extends object
    ? Partial<TableHarvestConfig[K]>
    : TableHarvestConfig[K];
};

/**
 * Merge overrides section by section onto the defaults
 */
export function mergeConfig(overrides: ConfigOverrides = {}): TableHarvestConfig {
  return {
    version: overrides.version ?? DEFAULT_CONFIG.version,
    storage: { ...DEFAULT_CONFIG.storage, ...overrides.storage },
    extract: { ...DEFAULT_CONFIG.extract, ...overrides.extract },
    files: { ...DEFAULT_CONFIG.files, ...overrides.files },
    enrich: { ...DEFAULT_CONFIG.enrich, ...overrides.enrich },
    logging: { ...DEFAULT_CONFIG.logging, ...overrides.logging },
  };
}

/**
 * Build configuration from environment variables.
 * Throws a ZodError when a variable is set to an invalid value.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): TableHarvestConfig {
  const parsed = EnvSchema.parse(env);

  return mergeConfig({
    storage: parsed.TABLE_HARVEST_RUNS_DIR ? { runs_dir: parsed.TABLE_HARVEST_RUNS_DIR } : undefined,
    extract: parsed.TABLE_HARVEST_TARGET_TABLE !== undefined
      ? { target_table: parsed.TABLE_HARVEST_TARGET_TABLE }
      : undefined,
    files: {
      ...(parsed.TABLE_HARVEST_CSV_FILE ? { csv: parsed.TABLE_HARVEST_CSV_FILE } : {}),
      ...(parsed.TABLE_HARVEST_CONTACTS_FILE ? { contacts: parsed.TABLE_HARVEST_CONTACTS_FILE } : {}),
      ...(parsed.TABLE_HARVEST_REPORT_FILE ? { report: parsed.TABLE_HARVEST_REPORT_FILE } : {}),
    },
    enrich: {
      ...(parsed.TABLE_HARVEST_GROUP_COLUMN !== undefined
        ? { fallback_group_column: parsed.TABLE_HARVEST_GROUP_COLUMN }
        : {}),
      ...(parsed.TABLE_HARVEST_MIN_GROUP_LENGTH !== undefined
        ? { min_group_name_length: parsed.TABLE_HARVEST_MIN_GROUP_LENGTH }
        : {}),
    },
    logging: parsed.TABLE_HARVEST_LOG_LEVEL ? { level: parsed.TABLE_HARVEST_LOG_LEVEL } : undefined,
  });
}
