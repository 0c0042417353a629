/**
 * Tool Layer Tests
 *
 * Each test gets its own runs directory under a temp dir.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { initRunManager, type RunManager } from '../src/run-manager.js';
import { extractHtmlTable } from '../src/tools/extract.js';
import { exportTableCsv } from '../src/tools/csv.js';
import { enrichContacts } from '../src/tools/enrich.js';
import { processReport, reportHtml } from '../src/tools/report.js';
import { countCompliance } from '../src/tools/compliance.js';
import { renderChangePageTool } from '../src/tools/confluence.js';
import { runList, runStatus } from '../src/tools/utilities.js';
import { isToolError } from '../src/utils.js';
import type { ToolError } from '../src/types.js';

const REPORT_TABLE =
  '<table><thead><tr><th><div>Name</div></th><th><span>Age</span></th><th>City</th></tr></thead>' +
  '<tbody><tr><td><div>John Doe</div></td><td><div>30</div><div>thirty</div></td><td><span>New York</span></td></tr>' +
  '<tr><td><a>Jane Smith</a></td><td><div>25</div><div>twenty-five</div></td><td>Los Angeles</td></tr></tbody></table>';

const INCIDENT_TABLE =
  '<table><thead><tr><th>Caller</th><th>Mail</th><th>Number</th><th>Assignment group</th></tr></thead><tbody>' +
  '<tr><td>x</td><td>y</td><td>INC001</td><td><a href="#">Network Ops</a></td></tr>' +
  '<tr><td>x</td><td>y</td><td>INC002</td><td>Unknown Team</td></tr>' +
  '</tbody></table>';

const CONTACTS = 'AssignmentGroup,Contact,Email\nNetwork Ops,Ann Lee,ann@example.com\n';

function success<T extends object>(result: T | ToolError): T {
  if (isToolError(result)) {
    throw new Error(`${result.code}: ${result.message}`);
  }
  return result;
}

function failure(result: unknown): ToolError {
  if (!isToolError(result)) {
    throw new Error('Expected a tool error');
  }
  return result;
}

let tempDir: string;
let manager: RunManager;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(tmpdir(), 'table-harvest-test-'));
  manager = initRunManager(tempDir, { logging: { level: 'error' } });
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

// ============================================================================
// Extract
// ============================================================================

describe('extractHtmlTable', () => {
  it('extracts the table and saves it in the run', async () => {
    const result = success(await extractHtmlTable({ html: REPORT_TABLE }));

    expect(result.found).toBe(true);
    expect(result.message).toBe('Extracted table with 3 headers and 2 rows');
    expect(result.source).toBe('raw/input.html');
    expect(result.headers).toEqual(['Name', 'Age', 'City']);
    expect(result.stats.max_row_width).toBe(3);

    const saved = JSON.parse(await readFile(path.join(manager.getExtractedDir(result.run_id), 'table.json'), 'utf-8'));
    expect(saved.rows).toEqual([['John Doe', '30', 'New York'], ['Jane Smith', '25', 'Los Angeles']]);
  });

  it('reports no table as a soft outcome', async () => {
    const result = success(await extractHtmlTable({ html: '<p>Empty report</p>' }));

    expect(result.found).toBe(false);
    expect(result.message).toBe('No table data extracted');
    expect(result.rows).toEqual([]);
  });

  it('reads the HTML from a file in an existing run', async () => {
    const first = success(await extractHtmlTable({ html: '<p>placeholder</p>' }));
    await writeFile(path.join(manager.getRawDir(first.run_id), 'page.html'), REPORT_TABLE, 'utf-8');

    const second = success(await extractHtmlTable({ run_id: first.run_id, input_path: 'raw/page.html' }));

    expect(second.run_id).toBe(first.run_id);
    expect(second.rows).toHaveLength(2);
  });

  it('rejects both inline HTML and a path', async () => {
    const error = failure(await extractHtmlTable({ html: REPORT_TABLE, input_path: 'raw/page.html' }));
    expect(error.code).toBe('CONFIG_INVALID');
  });

  it('rejects paths outside the run directory', async () => {
    const error = failure(await extractHtmlTable({ input_path: '../../secret.html' }));
    expect(error.code).toBe('READ_FAILED');
  });
});

// ============================================================================
// Export
// ============================================================================

describe('exportTableCsv', () => {
  it('writes the table as CSV', async () => {
    const result = success(await exportTableCsv({ html: REPORT_TABLE }));

    expect(result.csv_path).toBe('output/extracted_table.csv');
    expect(await readFile(result.output_path, 'utf-8')).toBe(
      'Name,Age,City\nJohn Doe,30,New York\nJane Smith,25,Los Angeles\n'
    );
  });

  it('reports an empty extraction as a recoverable error', async () => {
    const error = failure(await exportTableCsv({ html: '<table><tr><td></td></tr></table>' }));

    expect(error.code).toBe('EMPTY_CONTENT');
    expect(error.message).toBe('No table data extracted');
    expect(error.recoverable).toBe(true);
  });
});

// ============================================================================
// Enrich
// ============================================================================

describe('enrichContacts', () => {
  it('fills owner and email from inline contacts', async () => {
    const exported = success(await exportTableCsv({ html: INCIDENT_TABLE }));

    const result = success(await enrichContacts({ run_id: exported.run_id, contacts_csv: CONTACTS }));

    expect(result.group_column).toBe(3);
    expect(result.group_header).toBe('Assignment group');
    expect(result.stats).toEqual({ found: 1, not_found: 1 });
    expect(await readFile(exported.output_path, 'utf-8')).toBe(
      'Owner,Email,Number,Assignment group\n' +
      'Ann Lee,ann@example.com,INC001,Network Ops\n' +
      'Not Found,Not Found,INC002,Unknown Team\n'
    );
  });

  it('reports an unknown run', async () => {
    const error = failure(await enrichContacts({ run_id: '0190f0e0-0000-7000-8000-000000000000' }));
    expect(error.code).toBe('RUN_NOT_FOUND');
  });

  it('reports a table without a group column', async () => {
    const exported = success(await exportTableCsv({ html: REPORT_TABLE }));

    const error = failure(await enrichContacts({ run_id: exported.run_id, contacts_csv: CONTACTS }));

    expect(error.code).toBe('COLUMN_NOT_FOUND');
  });
});

// ============================================================================
// Report
// ============================================================================

describe('reportHtml', () => {
  it('returns the content of the first widget', () => {
    expect(reportHtml(JSON.stringify({ widgets: [{ content: '<table></table>' }, { content: 'x' }] })))
      .toBe('<table></table>');
  });

  it('rejects invalid JSON and missing widgets or content', () => {
    expect(failure(reportHtml('not json')).code).toBe('PARSE_ERROR');
    expect(failure(reportHtml('{"widgets":[]}')).message)
      .toBe("No 'widgets' array found in report JSON or widgets array is empty");
    expect(failure(reportHtml('{"widgets":[{}]}')).message)
      .toBe("No 'content' field found in first widget");
  });
});

describe('processReport', () => {
  it('extracts, exports and enriches a report', async () => {
    const result = success(await processReport({
      report_json: JSON.stringify({ widgets: [{ content: INCIDENT_TABLE }] }),
      contacts_csv: CONTACTS,
    }));

    expect(result.warnings).toEqual([]);
    expect(result.row_count).toBe(2);
    expect(result.enrichment?.stats).toEqual({ found: 1, not_found: 1 });
    expect(await readFile(result.output_path, 'utf-8')).toBe(
      'Owner,Email,Number,Assignment group\n' +
      'Ann Lee,ann@example.com,INC001,Network Ops\n' +
      'Not Found,Not Found,INC002,Unknown Team\n'
    );
  });

  it('keeps the plain CSV when enrichment fails', async () => {
    const result = success(await processReport({
      report_json: JSON.stringify({ widgets: [{ content: INCIDENT_TABLE }] }),
    }));

    expect(result.enrichment).toBeNull();
    expect(result.warnings).toEqual([
      'Contact enrichment failed, basic table extraction succeeded: Failed to read file: raw/assignment_group_contact.csv',
    ]);
    expect(await readFile(result.output_path, 'utf-8')).toBe(
      'Caller,Mail,Number,Assignment group\n' +
      'x,y,INC001,Network Ops\n' +
      'x,y,INC002,Unknown Team\n'
    );
  });

  it('reports a report without table rows', async () => {
    const error = failure(await processReport({
      report_json: JSON.stringify({ widgets: [{ content: '<p>No records</p>' }] }),
    }));
    expect(error.code).toBe('EMPTY_CONTENT');
  });
});

// ============================================================================
// Compliance and Rendering
// ============================================================================

describe('countCompliance', () => {
  it('counts statuses on a page', async () => {
    const html =
      '<table><tr><th>Control</th><th>Enabled</th></tr>' +
      '<tr><td>a</td><td><span data-macro-name="status">N/A</span></td></tr>' +
      '<tr><td>b</td><td>No</td></tr></table>';

    const result = success(await countCompliance({ html }));

    expect(result).toMatchObject({ column: 'Enabled', na: 1, no: 1 });
  });
});

describe('renderChangePageTool', () => {
  const CHANGES =
    'Change ID,Summary,Assignee,Impact,Risk,Date,Tags\n' +
    'CHG1,Core switch upgrade,Ann,High,Medium,2024-06-15,Call_out\n' +
    'CHG2,Patch web tier,Bo,Low,Low,2024-06-15,\n' +
    'CHG3,Rotate certificates,Cy,Low,Low,2024-06-16,Routine\n';

  it('renders the page into the run', async () => {
    const run = success(await extractHtmlTable({ html: '<p>seed</p>' }));
    await writeFile(path.join(manager.getOutputDir(run.run_id), 'changes.csv'), CHANGES, 'utf-8');

    const result = success(await renderChangePageTool({
      run_id: run.run_id,
      csv_path: 'output/changes.csv',
      date: '2024-06-12',
    }));

    expect(result.title).toBe('Weekend Change Note - 2024-06-15');
    expect(result.call_out_count).toBe(1);
    expect(result.other_count).toBe(2);

    const page = await readFile(result.output_path, 'utf-8');
    expect(page.startsWith('<h2>Weekend Change Summary</h2>')).toBe(true);
    expect(page).toContain('<td><p><span style="background-color: #ffcccc; padding: 2px 4px;">High</span></p></td>');
  });

  it('rejects a change list without the required columns', async () => {
    const run = success(await extractHtmlTable({ html: '<p>seed</p>' }));
    await writeFile(path.join(manager.getOutputDir(run.run_id), 'changes.csv'), 'Change ID,Summary\nCHG1,x\n', 'utf-8');

    const error = failure(await renderChangePageTool({ run_id: run.run_id, csv_path: 'output/changes.csv' }));

    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.message).toBe('Missing required columns: Assignee, Impact, Risk, Date, Tags');
  });
});

// ============================================================================
// Run Utilities
// ============================================================================

describe('run utilities', () => {
  it('summarizes the steps of a run', async () => {
    const exported = success(await exportTableCsv({ html: REPORT_TABLE }));

    const status = success(await runStatus({ run_id: exported.run_id }));

    expect(status.status).toBe('completed');
    expect(status.steps.export.status).toBe('completed');
    expect(status.steps.export.outputs).toEqual(['output/extracted_table.csv']);
    expect(status.totals.rows_extracted).toBe(2);
  });

  it('marks a run with a failed step as failed', async () => {
    const error = failure(await exportTableCsv({ html: '<p>none</p>' }));
    expect(error.code).toBe('EMPTY_CONTENT');

    const listed = success(await runList({ status: 'failed' }));
    expect(listed.total).toBe(1);
  });

  it('skips runs whose manifest cannot be read', async () => {
    const run = success(await extractHtmlTable({ html: REPORT_TABLE }));
    await mkdir(path.join(manager.getRunsDir(), 'broken'), { recursive: true });
    await writeFile(path.join(manager.getRunsDir(), 'broken', 'manifest.json'), '{', 'utf-8');

    const listed = success(await runList({}));

    expect(listed.runs.map(r => r.run_id)).toEqual([run.run_id]);
  });

  it('resumes an existing run with the same context as the one that created it', async () => {
    const created = await manager.createRun();
    const resumed = await manager.ensureRun(created.runId);

    expect(Object.keys(resumed).sort()).toEqual(['logger', 'runDir', 'runId']);
    expect(resumed.runId).toBe(created.runId);
    expect(resumed.runDir).toBe(created.runDir);
  });

  it('lists runs newest first', async () => {
    const first = success(await extractHtmlTable({ html: REPORT_TABLE }));
    await new Promise(resolve => setTimeout(resolve, 5));
    const second = success(await extractHtmlTable({ html: REPORT_TABLE }));

    const listed = success(await runList({}));

    expect(listed.runs.map(r => r.run_id)).toEqual([second.run_id, first.run_id]);
  });
});
