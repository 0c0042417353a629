/**
 * Table Harvest: Table Extraction
 *
 * Entry point of the extraction engine: preprocess, then parse.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { TableResult } from "../types.js";
import { silentLogger, type Logger } from "../utils.js";
import { cleanMalformedHtml } from "./preprocess.js";
import { TableParser } from "./parser.js";

export { cleanMalformedHtml } from "./preprocess.js";
export { TableParser, type TableParserOptions } from "./parser.js";
export { CellContext, MEANINGFUL_TAGS, type CellKind } from "./cell.js";
export { MalformedInputError } from "./errors.js";
export { rectangularize } from "./rectangular.js";

export interface ExtractTableOptions {
  /** 1-based table occurrence to start from (default 1) */
  targetTable?: number;
  logger?: Logger;
}

/**
 * Extract one table from an HTML document.
 *
 * Returns `{ headers: [], rows: [] }` when no table at or after
 * `targetTable` has content. Throws MalformedInputError when the
 * document cannot be tokenized.
 *
 * @example
 * extractTable("<table><tr><th>Name</th></tr><tr><td><b>Ada</b> (admin)</td></tr></table>")
 * // returns { headers: ["Name"], rows: [["Ada"]] }
 */
export function extractTable(html: string, options: ExtractTableOptions = {}): TableResult {
  const logger = options.logger ?? silentLogger;

  if (!html) {
    logger.warn("No HTML content provided for table extraction");
    return { headers: [], rows: [] };
  }

  const cleaned = cleanMalformedHtml(html);
  logger.debug("Cleaned malformed HTML", { original_length: html.length, cleaned_length: cleaned.length });

  const parser = new TableParser({ targetTable: options.targetTable, logger });
  const result = parser.parse(cleaned);

  if (parser.tablesSeen === 0) {
    logger.warn("No table found in HTML content");
  } else if (isEmptyTable(result)) {
    logger.warn("No table with content found", { tables_seen: parser.tablesSeen });
  } else {
    logger.info("Extracted table", {
      table: parser.currentTarget,
      headers: result.headers.length,
      rows: result.rows.length,
    });
  }

  return result;
}

export function isEmptyTable(result: TableResult): boolean {
  return result.headers.length === 0 && result.rows.length === 0;
}
