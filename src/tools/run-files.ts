/**
 * Table Harvest: Run File Access
 *
 * Reads and writes files inside a run directory, reporting failures as
 * ToolErrors instead of throwing.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { RunManifest, ToolError } from "../types.js";
import { getRunManager, RunNotFoundError } from "../run-manager.js";
import { createToolError, ensureDir, errorMessage, resolveInside, type RunLogger } from "../utils.js";

/**
 * Open an existing run, reporting an unknown id as RUN_NOT_FOUND
 */
export async function openRun(
  runId: string
): Promise<{ runDir: string; manifest: RunManifest; logger: RunLogger } | ToolError> {
  try {
    return await getRunManager().getRun(runId);
  } catch (err) {
    if (err instanceof RunNotFoundError) {
      return createToolError("RUN_NOT_FOUND", err.message, {
        recoverable: false,
        suggestion: "Create the run with an extract, export or report tool first",
      });
    }
    throw err;
  }
}

export async function readRunFile(runDir: string, relativePath: string): Promise<string | ToolError> {
  let filePath: string;
  try {
    filePath = resolveInside(runDir, relativePath);
  } catch (err) {
    return createToolError("READ_FAILED", errorMessage(err), {
      details: { path: relativePath },
      suggestion: "Use a path relative to the run directory",
    });
  }

  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    return createToolError("READ_FAILED", `Failed to read file: ${relativePath}`, {
      details: { path: filePath, error: errorMessage(err) },
      recoverable: false,
      suggestion: "Verify the path is correct and the file exists in the run directory",
    });
  }
}

/**
 * Write a file inside the run directory, returning its absolute path
 */
export async function writeRunFile(
  runDir: string,
  relativePath: string,
  content: string
): Promise<string | ToolError> {
  try {
    const filePath = resolveInside(runDir, relativePath);
    await ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, content, "utf-8");
    return filePath;
  } catch (err) {
    return createToolError("WRITE_FAILED", `Failed to write file: ${relativePath}`, {
      details: { error: errorMessage(err) },
    });
  }
}

/**
 * Resolve the HTML for a tool call: inline `html` is saved under raw/ so the
 * run keeps its input; otherwise `input_path` is read from the run.
 */
export async function loadHtmlSource(
  runDir: string,
  input: { html?: string; input_path?: string }
): Promise<{ html: string; source: string } | ToolError> {
  if (input.html !== undefined && input.input_path !== undefined) {
    return createToolError("CONFIG_INVALID", "Provide either html or input_path, not both", {
      recoverable: true,
    });
  }

  if (input.html !== undefined) {
    const saved = await writeRunFile(runDir, "raw/input.html", input.html);
    if (typeof saved !== "string") return saved;
    return { html: input.html, source: "raw/input.html" };
  }

  if (input.input_path !== undefined) {
    const html = await readRunFile(runDir, input.input_path);
    if (typeof html !== "string") return html;
    return { html, source: input.input_path };
  }

  return createToolError("CONFIG_INVALID", "No HTML source given", {
    recoverable: true,
    suggestion: "Pass html inline or input_path pointing at a file in the run directory",
  });
}
