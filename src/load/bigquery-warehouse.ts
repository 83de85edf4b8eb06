import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BigQuery, type Job } from '@google-cloud/bigquery';
import { z } from 'zod';
import type { TableSchema } from './schema.js';
import type { LoadJob, LoadJobRequest, LoadJobStatus, WarehouseClient } from './warehouse.js';

const jobMetadataSchema = z.object({
  status: z
    .object({
      state: z.string().optional(),
      errorResult: z.object({ message: z.string().optional() }).nullish(),
    })
    .optional(),
  statistics: z
    .object({
      load: z.object({ outputRows: z.coerce.number().optional() }).optional(),
    })
    .optional(),
});

export function toLoadJobStatus(metadata: unknown): LoadJobStatus {
  const { status, statistics } = jobMetadataSchema.parse(metadata);
  const state = status?.state === 'DONE' ? 'DONE' : status?.state === 'RUNNING' ? 'RUNNING' : 'PENDING';
  const errorMessage = status?.errorResult ? status.errorResult.message ?? 'load job failed' : undefined;
  return { state, errorMessage, outputRows: statistics?.load?.outputRows };
}

function toTableFields(schema: TableSchema) {
  return schema.map((field) => ({ name: field.name, type: field.type, mode: field.mode }));
}

class BigQueryLoadJob implements LoadJob {
  readonly id: string;
  private readonly job: Job;

  constructor(job: Job) {
    this.job = job;
    this.id = job.id ?? 'unknown';
  }

  async status(): Promise<LoadJobStatus> {
    const [metadata] = await this.job.getMetadata();
    return toLoadJobStatus(metadata);
  }

  async cancel(): Promise<void> {
    await this.job.cancel();
  }
}

export type BigQueryWarehouseOptions = {
  projectId?: string;
  location: string;
};

export class BigQueryWarehouse implements WarehouseClient {
  private readonly client: BigQuery;
  private readonly location: string;

  constructor({ projectId, location }: BigQueryWarehouseOptions) {
    this.client = new BigQuery({ projectId, location });
    this.location = location;
  }

  async getDataset(datasetId: string): Promise<void> {
    await this.client.dataset(datasetId).get();
  }

  async createDataset(datasetId: string, options: { location: string }): Promise<void> {
    await this.client.createDataset(datasetId, { location: options.location });
  }

  async getTable(datasetId: string, tableId: string): Promise<void> {
    await this.client.dataset(datasetId).table(tableId).get();
  }

  async createTable(datasetId: string, tableId: string, schema: TableSchema): Promise<void> {
    await this.client.dataset(datasetId).createTable(tableId, { schema: { fields: toTableFields(schema) } });
  }

  // Rows go up as newline-delimited JSON from a temp file; the file is only needed until the job is created.
  async startLoadJob(datasetId: string, tableId: string, request: LoadJobRequest): Promise<LoadJob> {
    const tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'sales-etl-load-'));
    const filePath = path.join(tmpDir, 'batch.ndjson');

    try {
      await fsp.writeFile(filePath, request.rows.map((row) => JSON.stringify(row)).join('\n'), 'utf8');
      const [job] = await this.client
        .dataset(datasetId)
        .table(tableId)
        .createLoadJob(filePath, {
          sourceFormat: 'NEWLINE_DELIMITED_JSON',
          writeDisposition: request.writeDisposition,
          ...(request.schema ? { schema: { fields: toTableFields(request.schema) } } : { autodetect: true }),
        });
      return new BigQueryLoadJob(job);
    } finally {
      await fsp.rm(tmpDir, { recursive: true, force: true });
    }
  }

  async query(sql: string): Promise<unknown[]> {
    const [rows] = await this.client.query({ query: sql, location: this.location });
    return rows;
  }
}
