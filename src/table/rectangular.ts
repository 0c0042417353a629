/**
 * Table Harvest: Rectangularization
 *
 * The parser stores rows at the width they were parsed with. Anything that
 * reads columns by position (CSV export, enrichment) squares the table first.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { TableResult } from "../types.js";

/**
 * Pad or truncate every row to the header width.
 * Without headers the rows are copied as they are.
 *
 * @example
 * rectangularize({ headers: ["A", "B"], rows: [["1"], ["1", "2", "3"]] })
 * // returns { headers: ["A", "B"], rows: [["1", ""], ["1", "2"]] }
 */
export function rectangularize(table: TableResult): TableResult {
  const width = table.headers.length;
  const headers = [...table.headers];

  if (width === 0) {
    return { headers, rows: table.rows.map(row => [...row]) };
  }

  const rows = table.rows.map(row => {
    const squared = row.slice(0, width);
    while (squared.length < width) {
      squared.push("");
    }
    return squared;
  });

  return { headers, rows };
}
