import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, type EtlConfig } from '../config.js';
import { PipelineRunError, RunAbortedError } from '../errors.js';
import { writeSampleSalesCsv } from '../extract/samples.js';
import { MemoryWarehouse } from '../load/memory-warehouse.js';
import { DiagnosticLog } from '../utils/diagnostics.js';
import { runCsvSalesPipeline } from './csv-sales.js';

const LOADED_AT = new Date('2026-02-21T10:00:00.000Z');

function transitions(log: DiagnosticLog): string[] {
  return log.events.filter((event) => event.stage === 'pipeline' && event.severity === 'info').map((e) => e.message);
}

describe('runCsvSalesPipeline', () => {
  let tmpDir: string;
  let config: EtlConfig;

  beforeEach(async () => {
    tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'sales-etl-pipeline-'));
    const csvPath = path.join(tmpDir, 'sales_data.csv');
    await writeSampleSalesCsv(csvPath);
    config = loadConfig({ SOURCE_CSV_PATH: csvPath, BQ_PROJECT_ID: 'test-project', LOAD_POLL_INTERVAL_MS: '1' });
  });

  afterEach(async () => {
    await fsp.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads the cleaned sample batch and reports the top customers', async () => {
    const warehouse = new MemoryWarehouse();
    const log = new DiagnosticLog();

    const result = await runCsvSalesPipeline({ config, warehouse, log, clock: () => LOADED_AT });

    expect(result).toEqual({
      pipeline: 'csv-sales',
      state: 'Done',
      extracted: 6,
      transformed: 5,
      rejected: 1,
      loaded: 5,
      loadedAt: '2026-02-21T10:00:00.000Z',
      jobId: 'memory-job-1',
      report: {
        status: 'ok',
        lines: [
          '  John Doe: $2,219.97 (2 orders)',
          '  Alice Brown: $1,215.00 (1 orders)',
          '  Bob Wilson: $750.00 (1 orders)',
          '  Jane Smith: $127.50 (1 orders)',
        ],
      },
    });
    expect(transitions(log)).toEqual([
      'NotStarted -> Extracted',
      'Extracted -> Transformed',
      'Transformed -> DatasetEnsured',
      'DatasetEnsured -> TableEnsured',
      'TableEnsured -> Loaded',
      'Loaded -> Verified',
      'Verified -> Done',
    ]);

    const stored = warehouse.rows('sales_data', 'sales');
    expect(stored).toHaveLength(5);
    expect(stored[0]).toEqual({
      order_id: 'ORD001',
      customer: 'John Doe',
      product: 'Laptop',
      quantity: 2,
      price: 899.99,
      order_date: '2026-02-15',
      total_amount: 1799.98,
      discount_rate: 0.1,
      final_amount: 1619.98,
      category: 'High Value',
      loaded_at: '2026-02-21T10:00:00.000Z',
    });
  });

  it('appends a second batch on a repeated run', async () => {
    const warehouse = new MemoryWarehouse();

    await runCsvSalesPipeline({ config, warehouse, log: new DiagnosticLog(), clock: () => LOADED_AT });
    const second = await runCsvSalesPipeline({ config, warehouse, log: new DiagnosticLog(), clock: () => LOADED_AT });

    expect(warehouse.rows('sales_data', 'sales')).toHaveLength(10);
    expect(warehouse.created).toEqual({ datasets: 1, tables: 1 });
    expect(second.jobId).toBe('memory-job-2');
    expect(second.report).toEqual({
      status: 'ok',
      lines: [
        '  John Doe: $4,439.94 (4 orders)',
        '  Alice Brown: $2,430.00 (2 orders)',
        '  Bob Wilson: $1,500.00 (2 orders)',
        '  Jane Smith: $255.00 (2 orders)',
      ],
    });
  });

  it('finishes the run when only the report query fails', async () => {
    const warehouse = new MemoryWarehouse({ failQueryWith: 'permission denied' });
    const log = new DiagnosticLog();

    const result = await runCsvSalesPipeline({ config, warehouse, log });

    expect(result.state).toBe('Done');
    expect(result.loaded).toBe(5);
    expect(result.report).toEqual({ status: 'failed', error: 'permission denied' });
    expect(transitions(log).slice(-1)).toEqual(['Loaded -> Done']);
  });

  it('halts before extraction when the file is missing', async () => {
    const warehouse = new MemoryWarehouse();
    const attempt = runCsvSalesPipeline(
      { config, warehouse, log: new DiagnosticLog() },
      path.join(tmpDir, 'missing.csv')
    );

    await expect(attempt).rejects.toBeInstanceOf(PipelineRunError);
    await expect(attempt).rejects.toMatchObject({ state: 'NotStarted' });
    expect(warehouse.created).toEqual({ datasets: 0, tables: 0 });
  });

  it('keeps the created dataset and table when the load fails', async () => {
    const warehouse = new MemoryWarehouse({ failLoadWith: 'quota exceeded' });
    const log = new DiagnosticLog();

    await expect(runCsvSalesPipeline({ config, warehouse, log })).rejects.toMatchObject({ state: 'TableEnsured' });
    expect(warehouse.created).toEqual({ datasets: 1, tables: 1 });
    expect(warehouse.rows('sales_data', 'sales')).toEqual([]);
    expect(log.events.at(-1)?.message).toBe(
      'Run halted in state TableEnsured: load job memory-job-1 failed: quota exceeded'
    );
  });

  it('submits no load job when the run is aborted before it starts', async () => {
    const warehouse = new MemoryWarehouse();
    const controller = new AbortController();
    controller.abort();

    const attempt = runCsvSalesPipeline({ config, warehouse, log: new DiagnosticLog(), signal: controller.signal });

    await expect(attempt).rejects.toMatchObject({ state: 'NotStarted' });
    await expect(attempt).rejects.toHaveProperty('cause', expect.any(RunAbortedError));
    expect(warehouse.created).toEqual({ datasets: 0, tables: 0 });
    expect(warehouse.cancelledJobs).toEqual([]);
  });
});
