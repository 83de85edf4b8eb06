import { extractSalesCsv } from '../extract/csv.js';
import { appendBatch, ensureDataset, ensureTable } from '../load/loader.js';
import { reportTopCustomers } from '../load/report.js';
import { SALES_SCHEMAS } from '../load/schema.js';
import { stampBatch, transformSales } from '../transform/sales.js';
import type { PipelineResult } from '../types/run.js';
import { runStages, tableTarget, type PipelineContext } from './context.js';

export async function runCsvSalesPipeline(
  context: PipelineContext,
  csvPath: string = context.config.source.csvPath
): Promise<PipelineResult> {
  const { config, warehouse, log } = context;
  const target = tableTarget(config, config.destination.tableId);
  const schema = SALES_SCHEMAS[config.schemaVersion];

  return runStages(log, async (run) => {
    const raw = await extractSalesCsv(csvPath, log);
    run.advance('Extracted');

    const { records, rejected } = transformSales(raw, log);
    run.advance('Transformed');

    await ensureDataset(warehouse, target, log);
    run.advance('DatasetEnsured');

    await ensureTable(warehouse, target, schema, log);
    run.advance('TableEnsured');

    const loadedAt = (context.clock ?? (() => new Date()))();
    const batch = stampBatch(records, loadedAt);
    const { jobId, loaded } = await appendBatch(warehouse, target, batch, {
      schema,
      timeoutMs: config.loadTimeoutMs,
      pollIntervalMs: config.loadPollIntervalMs,
      signal: context.signal,
      log,
    });
    run.advance('Loaded');

    const report = await reportTopCustomers(warehouse, target, config.reportLimit, log);
    if (report.status === 'ok') {
      run.advance('Verified');
    }
    run.advance('Done');

    return {
      pipeline: 'csv-sales',
      state: run.state,
      extracted: raw.length,
      transformed: records.length,
      rejected,
      loaded,
      loadedAt: loadedAt.toISOString(),
      jobId,
      report,
    };
  }, context.signal);
}
