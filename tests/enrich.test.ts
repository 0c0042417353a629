/**
 * Contact Enrichment Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../src/config.js';
import {
  enrichTable,
  findAssignmentGroupColumn,
  loadContactMapping,
  type ContactMapping,
} from '../src/tools/enrich.js';
import { createLogger, isToolError } from '../src/utils.js';
import type { EventLogEntry } from '../src/types.js';

const enrich = DEFAULT_CONFIG.enrich;

describe('loadContactMapping', () => {
  it('maps assignment groups to contacts', () => {
    const mapping = loadContactMapping(
      'AssignmentGroup,Contact,Email\nNetwork Ops, Ann Lee ,ann@example.com\nDesk,Bo,bo@example.com\n'
    );

    expect(isToolError(mapping)).toBe(false);
    if (isToolError(mapping)) return;
    expect(mapping.get('Network Ops')).toEqual({ contact: 'Ann Lee', email: 'ann@example.com' });
    expect(mapping.size).toBe(2);
  });

  it('reports missing columns', () => {
    const result = loadContactMapping('AssignmentGroup,Contact\nNet,Ann\n');

    expect(isToolError(result)).toBe(true);
    if (!isToolError(result)) return;
    expect(result.code).toBe('CONFIG_INVALID');
    expect(result.message).toBe('Contact mapping file missing required columns: Email');
  });

  it('skips rows with a blank group and logs their line', () => {
    const entries: EventLogEntry[] = [];
    const logger = createLogger('enrich', { sink: entry => entries.push(entry) });

    const mapping = loadContactMapping('AssignmentGroup,Contact,Email\nNet,Ann,a@example.com\n ,Bo,b@example.com\n', logger);

    if (isToolError(mapping)) throw new Error(mapping.message);
    expect([...mapping.keys()]).toEqual(['Net']);
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('warn');
    expect(entries[0].data).toEqual({ row: 3 });
  });
});

describe('findAssignmentGroupColumn', () => {
  it('finds the column by header name', () => {
    const table = { headers: ['Owner', 'Email', 'Number', 'Assignment group'], rows: [] };
    expect(findAssignmentGroupColumn(table, enrich)).toBe(3);
  });

  it('prefers an exact AssignmentGroup header position', () => {
    const table = { headers: ['AssignmentGroup', 'x'], rows: [] };
    expect(findAssignmentGroupColumn(table, enrich)).toBe(0);
  });

  it('falls back to the fixed column when its values look like groups', () => {
    const table = {
      headers: ['A', 'B', 'C', 'D'],
      rows: [['', '', '', ''], ['', '', '', 'Network Ops']],
    };
    expect(findAssignmentGroupColumn(table, enrich)).toBe(3);
  });

  it('rejects the fallback when sampled values are too short', () => {
    const table = { headers: ['A', 'B', 'C', 'D'], rows: [['', '', '', 'ab']] };
    expect(findAssignmentGroupColumn(table, enrich)).toBeNull();
  });

  it('only samples the first rows', () => {
    const table = {
      headers: ['A', 'B', 'C', 'D'],
      rows: [['', '', '', ''], ['', '', '', ''], ['', '', '', ''], ['', '', '', 'Network Ops']],
    };
    expect(findAssignmentGroupColumn(table, enrich)).toBeNull();
  });

  it('returns null when the table is too narrow for the fallback', () => {
    expect(findAssignmentGroupColumn({ headers: ['A', 'B', 'C'], rows: [['', '', 'Network Ops']] }, enrich))
      .toBeNull();
  });
});

describe('enrichTable', () => {
  it('renames identity columns and fills them from the mapping', () => {
    const mapping: ContactMapping = new Map([
      ['Net', { contact: 'Ann', email: 'ann@example.com' }],
    ]);
    const table = {
      headers: ['x', 'y', 'Group'],
      rows: [['', '', 'Net'], ['', '', 'Unknown'], ['1']],
    };

    const { table: enriched, stats } = enrichTable(table, mapping, 2, enrich);

    expect(enriched).toEqual({
      headers: ['Owner', 'Email', 'Group'],
      rows: [
        ['Ann', 'ann@example.com', 'Net'],
        ['Not Found', 'Not Found', 'Unknown'],
        ['Not Found', 'Not Found', ''],
      ],
    });
    expect(stats).toEqual({ found: 1, not_found: 2 });
  });
});
