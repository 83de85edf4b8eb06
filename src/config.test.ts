import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  it('falls back to defaults for unset and blank values', () => {
    const config = loadConfig({ BQ_DATASET_ID: '', BQ_PROJECT_ID: '   ' });

    expect(config.source.csvPath).toBe('data/sales_data.csv');
    expect(config.source.postgres).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'etl',
      password: 'etlpass',
      database: 'salesdb',
    });
    expect(config.destination).toEqual({
      projectId: undefined,
      datasetId: 'sales_data',
      tableId: 'sales',
      rawTableId: 'orders_raw',
      inlineTableId: 'inline_sales',
      location: 'US',
    });
    expect(config.schemaVersion).toBe('1');
    expect(config.loadTimeoutMs).toBe(600_000);
    expect(config.reportLimit).toBe(5);
    expect(Object.keys(config)).toEqual([
      'source',
      'destination',
      'schemaVersion',
      'loadTimeoutMs',
      'loadPollIntervalMs',
      'reportLimit',
    ]);
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ POSTGRES_PORT: '6543', REPORT_LIMIT: '10', LOAD_TIMEOUT_MS: '5000' });

    expect(config.source.postgres.port).toBe(6543);
    expect(config.reportLimit).toBe(10);
    expect(config.loadTimeoutMs).toBe(5000);
  });

  it('returns a frozen configuration', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.destination)).toBe(true);
  });

  it('rejects an unknown schema version', () => {
    expect(() => loadConfig({ SCHEMA_VERSION: '2' })).toThrow(ConfigError);
    try {
      loadConfig({ SCHEMA_VERSION: '2' });
    } catch (error) {
      expect(error instanceof ConfigError && error.issues).toEqual(['SCHEMA_VERSION: unknown schema version']);
    }
  });

  it('rejects table names that are not plain identifiers', () => {
    expect(() => loadConfig({ BQ_TABLE_ID: 'sales; drop' })).toThrow(
      'invalid configuration: BQ_TABLE_ID: must be a plain identifier'
    );
  });
});
