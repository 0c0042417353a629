/**
 * Table Harvest: Utility Tools
 *
 * Run management utilities: status and list.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { RunManifest, ToolError } from "../types.js";
import {
  RunListInputSchema,
  RunStatusInputSchema,
  type RunListInput,
  type RunStatusInput,
} from "../schemas.js";
import { getRunManager } from "../run-manager.js";
import { createToolError, errorMessage, isToolError } from "../utils.js";
import { openRun } from "./run-files.js";

// ============================================================================
// Run Status
// ============================================================================

export interface RunStatusResult {
  run_id: string;
  status: RunManifest["status"];
  created_at: string;
  updated_at?: string;
  steps: {
    [key: string]: {
      status: string;
      duration_ms?: number;
      outputs: string[];
      errors: number;
    };
  };
  totals: RunManifest["totals"];
}

export async function runStatus(input: RunStatusInput): Promise<RunStatusResult | ToolError> {
  const parsed = RunStatusInputSchema.parse(input);
  const run = await openRun(parsed.run_id);
  if (isToolError(run)) return run;
  const { manifest } = run;

  const steps: RunStatusResult["steps"] = {};
  for (const [stepName, step] of Object.entries(manifest.steps)) {
    if (!step) continue;
    steps[stepName] = {
      status: step.status,
      duration_ms: step.completed_at
        ? new Date(step.completed_at).getTime() - new Date(step.started_at).getTime()
        : undefined,
      outputs: step.outputs,
      errors: step.errors.length,
    };
  }

  return {
    run_id: manifest.run_id,
    status: manifest.status,
    created_at: manifest.created_at,
    updated_at: manifest.updated_at,
    steps,
    totals: manifest.totals,
  };
}

// ============================================================================
// Run List
// ============================================================================

export interface RunListResult {
  runs: Array<{
    run_id: string;
    status: string;
    created_at: string;
  }>;
  total: number;
}

export async function runList(input: RunListInput): Promise<RunListResult | ToolError> {
  const parsed = RunListInputSchema.parse(input);

  try {
    const runs = await getRunManager().listRuns({ status: parsed.status, limit: parsed.limit });
    return { runs, total: runs.length };
  } catch (err) {
    return createToolError("READ_FAILED", `Failed to list runs: ${errorMessage(err)}`, {
      recoverable: true,
    });
  }
}
