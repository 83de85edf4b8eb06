import { ConfigError } from '../errors.js';
import { extractRecentOrders } from '../extract/postgres.js';
import { appendBatch, ensureDataset } from '../load/loader.js';
import type { WarehouseRow, WarehouseValue } from '../load/warehouse.js';
import type { PipelineResult } from '../types/run.js';
import type { SourceRow } from '../types/sales.js';
import { runStages, tableTarget, type PipelineContext } from './context.js';

function toWarehouseValue(value: unknown): WarehouseValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return JSON.stringify(value);
}

export function toWarehouseRow(row: SourceRow): WarehouseRow {
  const result: WarehouseRow = {};
  for (const [key, value] of Object.entries(row)) {
    result[key] = toWarehouseValue(value);
  }
  return result;
}

/** Copies the last window of source orders as-is; the destination schema is detected by the warehouse. */
export async function runRecentOrdersPipeline(context: PipelineContext): Promise<PipelineResult> {
  const { config, warehouse, log, openSourcePool } = context;
  const target = tableTarget(config, config.destination.rawTableId);

  return runStages(log, async (run) => {
    if (!openSourcePool) {
      throw new ConfigError('recent-orders needs a relational source connection');
    }
    const rows = await extractRecentOrders(
      openSourcePool,
      {
        table: config.source.ordersTable,
        dateColumn: config.source.dateColumn,
        windowMinutes: config.source.windowMinutes,
      },
      log
    );
    run.advance('Extracted');

    const batch = rows.map(toWarehouseRow);
    run.advance('Transformed');

    await ensureDataset(warehouse, target, log);
    run.advance('DatasetEnsured');

    const { jobId, loaded } = await appendBatch(warehouse, target, batch, {
      timeoutMs: config.loadTimeoutMs,
      pollIntervalMs: config.loadPollIntervalMs,
      signal: context.signal,
      log,
    });
    run.advance('Loaded');
    run.advance('Done');

    return {
      pipeline: 'recent-orders',
      state: run.state,
      extracted: rows.length,
      transformed: batch.length,
      rejected: 0,
      loaded,
      loadedAt: null,
      jobId,
      report: { status: 'skipped' },
    };
  }, context.signal);
}
