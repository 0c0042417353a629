/**
 * Table Harvest: Streaming Table Parser
 *
 * Tag-driven state machine over the htmlparser2 tokenizer. Extracts exactly
 * one table: the first occurrence at or after the requested index that has
 * any non-blank row. Empty occurrences are skipped by advancing the target
 * index mid-parse.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { Parser } from "htmlparser2";
import type { TableResult } from "../types.js";
import { silentLogger, type Logger } from "../utils.js";
import { CellContext } from "./cell.js";
import { MalformedInputError } from "./errors.js";

// Longest text excerpt written to debug logs
const MAX_LOG_TEXT = 50;

type ScanPhase = "seeking" | "in-table" | "done";

type TableSection = "none" | "head" | "body";

/**
 * State of the target table. Built fresh each time a target table opens.
 */
interface TableState {
  section: TableSection;
  row: string[] | null;
  cell: CellContext | null;
  headers: string[] | null;
  rows: string[][];
  /** Tables opened inside the target table and not yet closed */
  nestedTables: number;
}

export interface TableParserOptions {
  /** 1-based table occurrence to extract (default 1) */
  targetTable?: number;
  logger?: Logger;
}

function createTableState(): TableState {
  return {
    section: "none",
    row: null,
    cell: null,
    headers: null,
    rows: [],
    nestedTables: 0,
  };
}

function excerpt(text: string): string {
  return text.length > MAX_LOG_TEXT ? `${text.slice(0, MAX_LOG_TEXT)}...` : text;
}

export class TableParser {
  private readonly tokenizer: Parser;
  private readonly logger: Logger;

  private targetTable: number;
  private tableCount = 0;
  private phase: ScanPhase = "seeking";
  private table: TableState = createTableState();
  private result: TableResult | null = null;
  private failure: MalformedInputError | null = null;
  private ended = false;

  constructor(options: TableParserOptions = {}) {
    const target = options.targetTable ?? 1;
    if (!Number.isInteger(target) || target < 1) {
      throw new RangeError(`targetTable must be a positive integer, got ${target}`);
    }
    this.targetTable = target;
    this.logger = options.logger ?? silentLogger;

    this.tokenizer = new Parser(
      {
        onopentag: name => this.handleOpenTag(name),
        onclosetag: name => this.handleCloseTag(name),
        ontext: text => this.handleText(text),
        onerror: error => {
          this.failure ??= new MalformedInputError(`Tokenizer failed: ${error.message}`, { cause: error });
        },
      },
      { decodeEntities: true, lowerCaseTags: true }
    );
  }

  /** Occurrence index currently targeted; advances past empty tables */
  get currentTarget(): number {
    return this.targetTable;
  }

  /** Number of table start tags seen so far */
  get tablesSeen(): number {
    return this.tableCount;
  }

  write(chunk: string): void {
    this.run(() => this.tokenizer.write(chunk));
  }

  /**
   * Flush the tokenizer and return the extracted table, or empty headers
   * and rows when no table at or after the target index had content.
   */
  end(): TableResult {
    this.run(() => this.tokenizer.end());
    this.ended = true;
    return this.result ?? { headers: [], rows: [] };
  }

  parse(html: string): TableResult {
    this.write(html);
    return this.end();
  }

  private run(step: () => void): void {
    if (this.ended) {
      throw new MalformedInputError("Parser already finished; create a new TableParser per document");
    }
    try {
      step();
    } catch (err) {
      if (err instanceof MalformedInputError) throw err;
      throw new MalformedInputError(
        `Tokenizer failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    if (this.failure) {
      throw this.failure;
    }
  }

  // --------------------------------------------------------------------------
  // Tag events
  // --------------------------------------------------------------------------

  private handleOpenTag(name: string): void {
    if (this.phase === "done") return;

    if (name === "table") {
      this.handleTableStart();
      return;
    }
    if (this.phase !== "in-table") return;

    const table = this.table;
    if (table.nestedTables > 0) {
      table.cell?.openTag(name);
      return;
    }

    switch (name) {
      case "thead":
        table.section = "head";
        break;
      case "tbody":
        table.section = "body";
        break;
      case "tr":
        table.row = [];
        table.cell = null;
        break;
      case "th":
      case "td":
        if (table.row) {
          table.cell = new CellContext(name === "th" ? "header" : "data");
        }
        break;
      default:
        table.cell?.openTag(name);
    }
  }

  private handleCloseTag(name: string): void {
    if (this.phase !== "in-table") return;

    const table = this.table;
    if (name === "table") {
      if (table.nestedTables > 0) {
        table.nestedTables--;
        return;
      }
      this.handleTableEnd();
      return;
    }
    if (table.nestedTables > 0) {
      table.cell?.closeTag(name);
      return;
    }

    switch (name) {
      case "thead":
        if (table.section === "head") table.section = "none";
        break;
      case "tbody":
        if (table.section === "body") table.section = "none";
        break;
      case "tr":
        if (table.row) this.handleRowEnd(table.row);
        break;
      case "th":
      case "td":
        if (table.cell && table.cell.kind === (name === "th" ? "header" : "data")) {
          this.handleCellEnd(table.cell);
        }
        break;
      default:
        table.cell?.closeTag(name);
    }
  }

  private handleText(text: string): void {
    const cell = this.phase === "in-table" ? this.table.cell : null;
    if (cell) {
      cell.appendText(text);
    } else if (this.phase !== "done" && text.trim()) {
      this.logger.debug("Ignoring text outside cells", { text: excerpt(text) });
    }
  }

  // --------------------------------------------------------------------------
  // Structure
  // --------------------------------------------------------------------------

  private handleTableStart(): void {
    this.tableCount++;

    if (this.phase === "in-table") {
      this.table.nestedTables++;
      this.logger.debug("Nested table inside target table", { table: this.tableCount });
      return;
    }

    if (this.tableCount === this.targetTable) {
      this.phase = "in-table";
      this.table = createTableState();
      this.logger.debug("Found target table", { table: this.tableCount });
    }
  }

  private handleTableEnd(): void {
    const { headers, rows } = this.table;

    if (headers || rows.length > 0) {
      this.result = { headers: headers ?? [], rows };
      this.phase = "done";
      this.logger.debug("Target table closed with data", {
        table: this.tableCount,
        headers: headers?.length ?? 0,
        rows: rows.length,
      });
      return;
    }

    this.logger.debug("Target table was empty, retargeting", {
      table: this.targetTable,
      next: this.targetTable + 1,
    });
    this.targetTable++;
    this.phase = "seeking";
    this.table = createTableState();
  }

  private handleRowEnd(row: string[]): void {
    const table = this.table;
    table.row = null;
    table.cell = null;

    if (!row.some(cell => cell.trim())) {
      this.logger.debug("Discarding blank row");
      return;
    }

    const headerCandidate =
      table.section === "head" || (table.headers === null && table.section !== "body");

    if (headerCandidate && table.headers === null) {
      table.headers = row;
      this.logger.debug("Recorded header row", { headers: row });
    } else {
      table.rows.push(row);
      this.logger.debug("Added data row", { row });
    }
  }

  private handleCellEnd(cell: CellContext): void {
    const value = cell.resolve();
    this.table.row?.push(value);
    this.table.cell = null;
    this.logger.debug("Resolved cell", {
      kind: cell.kind,
      value: excerpt(value),
      nested: cell.captured !== null,
    });
  }
}
