/**
 * Table Harvest: Markup Preprocessor
 *
 * Structural-tag rewrites applied before tokenizing report HTML.
 * Text inside cells is never touched.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// <table class="a"></table id="b">  ->  <table class="a" id="b">
const SPLIT_TABLE_OPEN = /<table([^>]*?)><\/table\s+([^>]*?)>/gi;

// <td class="a"/>  ->  <td class="a"></td>
const SELF_CLOSING_CELL = /<(td|th)\b([^>]*?)\/>/gi;

const DOUBLED_TABLE_CLOSE = /<\/table>\s*<\/table>/gi;

/**
 * Repair the malformed table markup report exporters are known to emit.
 *
 * @example
 * cleanMalformedHtml('<table border="1"></table class="list"><tr><td/></tr></table></table>')
 * // returns '<table border="1" class="list"><tr><td></td></tr></table>'
 */
export function cleanMalformedHtml(html: string): string {
  if (!html) return html;

  return html
    .replace(SPLIT_TABLE_OPEN, "<table$1 $2>")
    .replace(SELF_CLOSING_CELL, "<$1$2></$1>")
    .replace(DOUBLED_TABLE_CLOSE, "</table>");
}
