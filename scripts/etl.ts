#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { loadConfig, type EtlConfig } from '../src/config.js';
import { createSourcePool } from '../src/db.js';
import { errorMessage } from '../src/errors.js';
import { writeSampleSalesCsv } from '../src/extract/samples.js';
import { BigQueryWarehouse } from '../src/load/bigquery-warehouse.js';
import { MemoryWarehouse } from '../src/load/memory-warehouse.js';
import type { WarehouseClient } from '../src/load/warehouse.js';
import { runPipeline } from '../src/pipelines/index.js';
import type { PipelineName, PipelineResult } from '../src/types/run.js';
import { consoleSink, DiagnosticLog } from '../src/utils/diagnostics.js';

const USAGE = `usage: etl <command> [options]

commands:
  csv [--file <path>]     CSV sales file -> transform -> BigQuery (default command)
  recent-orders           last window of Postgres orders -> BigQuery
  inline                  built-in sample sales -> BigQuery
  sample [--file <path>]  write the sample sales CSV

options:
  --dry-run               load into an in-memory warehouse instead of BigQuery
  --help                  show this message`;

const COMMANDS: Record<string, PipelineName> = {
  csv: 'csv-sales',
  'recent-orders': 'recent-orders',
  inline: 'inline-sales',
};

const BANNER = '='.repeat(60);

function createWarehouse(config: EtlConfig, dryRun: boolean): WarehouseClient {
  if (dryRun) {
    return new MemoryWarehouse();
  }
  return new BigQueryWarehouse({ projectId: config.destination.projectId, location: config.destination.location });
}

function printSummary(result: PipelineResult): void {
  console.log(
    `Extracted ${result.extracted}, transformed ${result.transformed}, rejected ${result.rejected}, loaded ${result.loaded}`
  );
  if (result.report.status === 'failed') {
    console.log(`Verification report failed: ${result.report.error}`);
  }
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const [command = 'csv'] = positionals;
  const config = loadConfig();
  const dryRun = values['dry-run'] ?? false;

  if (command === 'sample') {
    const target = values.file ?? config.source.csvPath;
    const rows = await writeSampleSalesCsv(target);
    console.log(`Wrote ${rows} sample rows to ${target}`);
    return 0;
  }

  const pipeline = COMMANDS[command];
  if (!pipeline) {
    console.error(`unknown command "${command}"\n\n${USAGE}`);
    return 2;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('[PIPELINE] Interrupted, cancelling...');
    controller.abort();
  });

  console.log(BANNER);
  console.log(`Starting ${pipeline} pipeline${dryRun ? ' (dry run)' : ''}`);
  console.log(BANNER);

  const result = await runPipeline(
    pipeline,
    {
      config,
      warehouse: createWarehouse(config, dryRun),
      log: new DiagnosticLog([consoleSink]),
      openSourcePool: () => createSourcePool(config.source.postgres),
      signal: controller.signal,
    },
    { csvPath: values.file }
  );

  printSummary(result);
  console.log(BANNER);
  console.log('ETL Pipeline Complete!');
  console.log(BANNER);
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[PIPELINE] failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
);
