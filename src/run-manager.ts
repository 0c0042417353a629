/**
 * Table Harvest: Run Manager
 *
 * Manages run directories, manifests, and step bookkeeping.
 * Each run is an isolated workspace holding the raw input, the extracted
 * table, the produced CSV/page files and the event logs.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import * as fs from "fs/promises";
import type { ErrorRecord, RunManifest, RunStep, StepRecord, TableHarvestConfig } from "./types.js";
import { mergeConfig, type ConfigOverrides } from "./config.js";
import {
  generateRunId,
  ensureDir,
  pathExists,
  writeJson,
  readJson,
  hashConfig,
  now,
  RunLogger,
} from "./utils.js";

export class RunNotFoundError extends Error {
  override readonly name = "RunNotFoundError";

  constructor(readonly runId: string) {
    super(`Run not found: ${runId}`);
  }
}

export interface RunContext {
  runId: string;
  runDir: string;
  logger: RunLogger;
}

// ============================================================================
// Run Manager Class
// ============================================================================

export class RunManager {
  private baseDir: string;
  private config: TableHarvestConfig;

  constructor(baseDir: string, config?: ConfigOverrides) {
    this.baseDir = baseDir;
    this.config = mergeConfig(config);
  }

  // --------------------------------------------------------------------------
  // Run Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Create a new run directory with all subdirectories
   */
  async createRun(runId?: string): Promise<RunContext> {
    const id = runId || generateRunId();
    const runDir = this.getRunDir(id);

    await ensureDir(path.join(runDir, "raw"));
    await ensureDir(path.join(runDir, "extracted"));
    await ensureDir(path.join(runDir, "output"));

    const manifest: RunManifest = {
      run_id: id,
      created_at: now(),
      status: "running",
      config_hash: hashConfig(this.config),
      steps: {},
      totals: {
        tables_extracted: 0,
        rows_extracted: 0,
        rows_enriched: 0,
        errors_encountered: 0,
      },
    };

    await writeJson(path.join(runDir, "manifest.json"), manifest);
    await writeJson(path.join(runDir, "config.json"), this.config);

    const logger = new RunLogger(runDir);
    await logger.init();

    return { runId: id, runDir, logger };
  }

  /**
   * Ensure a run exists, creating it if necessary.
   * Tools call this so they can be used with or without a prior run.
   */
  async ensureRun(runId?: string): Promise<RunContext> {
    if (runId && await pathExists(this.getManifestPath(runId))) {
      const runDir = this.getRunDir(runId);
      return { runId, runDir, logger: new RunLogger(runDir) };
    }
    return this.createRun(runId);
  }

  /**
   * Get an existing run's context
   */
  async getRun(runId: string): Promise<{ runDir: string; manifest: RunManifest; logger: RunLogger }> {
    const manifestPath = this.getManifestPath(runId);

    if (!await pathExists(manifestPath)) {
      throw new RunNotFoundError(runId);
    }

    const runDir = this.getRunDir(runId);
    const manifest = await readJson<RunManifest>(manifestPath);
    return { runDir, manifest, logger: new RunLogger(runDir) };
  }

  /**
   * Update run manifest
   */
  async updateManifest(runId: string, updates: Partial<RunManifest>): Promise<RunManifest> {
    const { manifest } = await this.getRun(runId);

    const updated: RunManifest = {
      ...manifest,
      ...updates,
      updated_at: now(),
      totals: { ...manifest.totals, ...updates.totals },
      steps: { ...manifest.steps, ...updates.steps },
    };

    await writeJson(this.getManifestPath(runId), updated);
    return updated;
  }

  /**
   * Mark a step as started
   */
  async startStep(runId: string, step: RunStep): Promise<StepRecord> {
    const record: StepRecord = {
      started_at: now(),
      status: "running",
      outputs: [],
      errors: [],
    };

    await this.updateManifest(runId, { steps: { [step]: record } });
    return record;
  }

  /**
   * Mark a step as finished and add to the run totals
   */
  async completeStep(
    runId: string,
    step: RunStep,
    result: {
      outputs?: string[];
      errors?: ErrorRecord[];
      totals?: Partial<RunManifest["totals"]>;
    }
  ): Promise<RunManifest> {
    const { manifest } = await this.getRun(runId);
    const started = manifest.steps[step];
    const errors = result.errors ?? [];

    const record: StepRecord = {
      started_at: started?.started_at ?? now(),
      completed_at: now(),
      status: errors.length > 0 ? "failed" : "completed",
      outputs: result.outputs ?? [],
      errors,
    };

    const added = result.totals ?? {};
    const totals: RunManifest["totals"] = {
      tables_extracted: manifest.totals.tables_extracted + (added.tables_extracted ?? 0),
      rows_extracted: manifest.totals.rows_extracted + (added.rows_extracted ?? 0),
      rows_enriched: manifest.totals.rows_enriched + (added.rows_enriched ?? 0),
      errors_encountered: manifest.totals.errors_encountered + (added.errors_encountered ?? 0) + errors.length,
    };

    const steps = { ...manifest.steps, [step]: record };
    const failed = Object.values(steps).some(s => s?.status === "failed");
    const running = Object.values(steps).some(s => s?.status === "running");

    return this.updateManifest(runId, {
      steps,
      totals,
      status: failed ? "failed" : running ? "running" : "completed",
    });
  }

  // --------------------------------------------------------------------------
  // Path Helpers
  // --------------------------------------------------------------------------

  getRunsDir(): string {
    return path.resolve(this.baseDir, this.config.storage.runs_dir);
  }

  getRunDir(runId: string): string {
    return path.join(this.getRunsDir(), runId);
  }

  getManifestPath(runId: string): string {
    return path.join(this.getRunDir(runId), "manifest.json");
  }

  getRawDir(runId: string): string {
    return path.join(this.getRunDir(runId), "raw");
  }

  getExtractedDir(runId: string): string {
    return path.join(this.getRunDir(runId), "extracted");
  }

  getOutputDir(runId: string): string {
    return path.join(this.getRunDir(runId), "output");
  }

  // --------------------------------------------------------------------------
  // Run Queries
  // --------------------------------------------------------------------------

  /**
   * List all runs, newest first
   */
  async listRuns(options?: {
    status?: "all" | RunManifest["status"];
    limit?: number;
  }): Promise<Array<{ run_id: string; status: string; created_at: string }>> {
    const runsDir = this.getRunsDir();

    if (!await pathExists(runsDir)) {
      return [];
    }

    const entries = await fs.readdir(runsDir, { withFileTypes: true });
    const runs: Array<{ run_id: string; status: string; created_at: string }> = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const manifestPath = path.join(runsDir, entry.name, "manifest.json");
      if (!await pathExists(manifestPath)) continue;

      let manifest: RunManifest;
      try {
        manifest = await readJson<RunManifest>(manifestPath);
      } catch {
        // Skip unreadable manifests
        continue;
      }
      if (typeof manifest.run_id !== "string" || typeof manifest.created_at !== "string") continue;

      if (options?.status && options.status !== "all" && manifest.status !== options.status) {
        continue;
      }

      runs.push({
        run_id: manifest.run_id,
        status: manifest.status,
        created_at: manifest.created_at,
      });
    }

    runs.sort((a, b) => b.created_at.localeCompare(a.created_at));

    return options?.limit ? runs.slice(0, options.limit) : runs;
  }

  // --------------------------------------------------------------------------
  // Configuration Access
  // --------------------------------------------------------------------------

  getConfig(): TableHarvestConfig {
    return this.config;
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let globalManager: RunManager | null = null;

export function initRunManager(baseDir: string, config?: ConfigOverrides): RunManager {
  globalManager = new RunManager(baseDir, config);
  return globalManager;
}

export function getRunManager(): RunManager {
  if (!globalManager) {
    throw new Error("RunManager not initialized. Call initRunManager first.");
  }
  return globalManager;
}
