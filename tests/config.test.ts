/**
 * Configuration and Logging Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, mergeConfig } from '../src/config.js';
import { createLogger, resolveInside } from '../src/utils.js';
import type { EventLogEntry } from '../src/types.js';

describe('mergeConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('merges each section separately', () => {
    const config = mergeConfig({ enrich: { sample_rows: 5 } });

    expect(config.enrich.sample_rows).toBe(5);
    expect(config.enrich.owner_column).toBe('Owner');
    expect(config.files).toEqual(DEFAULT_CONFIG.files);
  });
});

describe('loadConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads TABLE_HARVEST_* variables', () => {
    const config = loadConfig({
      TABLE_HARVEST_TARGET_TABLE: '2',
      TABLE_HARVEST_CSV_FILE: 'changes.csv',
      TABLE_HARVEST_GROUP_COLUMN: '4',
      TABLE_HARVEST_LOG_LEVEL: 'debug',
    });

    expect(config.extract.target_table).toBe(2);
    expect(config.files.csv).toBe('changes.csv');
    expect(config.files.contacts).toBe(DEFAULT_CONFIG.files.contacts);
    expect(config.enrich.fallback_group_column).toBe(4);
    expect(config.logging.level).toBe('debug');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ TABLE_HARVEST_TARGET_TABLE: '0' })).toThrow();
    expect(() => loadConfig({ TABLE_HARVEST_LOG_LEVEL: 'verbose' })).toThrow();
  });
});

describe('createLogger', () => {
  it('drops entries below the level and scopes children', () => {
    const entries: EventLogEntry[] = [];
    const logger = createLogger('server', { level: 'warn', sink: entry => entries.push(entry) });

    logger.info('hidden');
    logger.child('runs').error('failed', { id: 1 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'error', scope: 'server.runs', message: 'failed', data: { id: 1 } });
  });
});

describe('resolveInside', () => {
  it('rejects paths leaving the base directory', () => {
    expect(() => resolveInside('/tmp/run', '../other/file.txt')).toThrow('Path escapes run directory');
  });
});
