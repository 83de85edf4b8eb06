import { parseTopCustomersQuery } from './report.js';
import type { TableSchema } from './schema.js';
import type { LoadJob, LoadJobRequest, LoadJobStatus, WarehouseClient, WarehouseRow } from './warehouse.js';

type MemoryTable = {
  schema?: TableSchema;
  rows: WarehouseRow[];
};

export type MemoryWarehouseOptions = {
  /** Number of status polls a load job reports as RUNNING before it is DONE. */
  pollsUntilDone?: number;
  failLoadWith?: string;
  failQueryWith?: string;
};

class WarehouseApiError extends Error {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
  }
}

function missingRequiredField(rows: readonly WarehouseRow[], schema: TableSchema | undefined): string | null {
  if (!schema) return null;
  for (const [index, row] of rows.entries()) {
    for (const field of schema) {
      if (field.mode === 'REQUIRED' && (row[field.name] === undefined || row[field.name] === null)) {
        return `row ${index}: missing required field ${field.name}`;
      }
    }
  }
  return null;
}

/**
 * In-process warehouse used by the tests and by `--dry-run`. It keeps tables in
 * memory, applies appends when a load job completes and answers the
 * top-customers report query.
 */
export class MemoryWarehouse implements WarehouseClient {
  readonly datasets = new Map<string, { location: string }>();
  readonly tables = new Map<string, MemoryTable>();
  readonly cancelledJobs: string[] = [];
  readonly created = { datasets: 0, tables: 0 };

  private readonly options: MemoryWarehouseOptions;
  private jobCounter = 0;

  constructor(options: MemoryWarehouseOptions = {}) {
    this.options = options;
  }

  rows(datasetId: string, tableId: string): WarehouseRow[] {
    return this.tables.get(`${datasetId}.${tableId}`)?.rows ?? [];
  }

  async getDataset(datasetId: string): Promise<void> {
    if (!this.datasets.has(datasetId)) {
      throw new WarehouseApiError(404, `Not found: Dataset ${datasetId}`);
    }
  }

  async createDataset(datasetId: string, options: { location: string }): Promise<void> {
    if (this.datasets.has(datasetId)) {
      throw new WarehouseApiError(409, `Already Exists: Dataset ${datasetId}`);
    }
    this.datasets.set(datasetId, { location: options.location });
    this.created.datasets += 1;
  }

  async getTable(datasetId: string, tableId: string): Promise<void> {
    await this.getDataset(datasetId);
    if (!this.tables.has(`${datasetId}.${tableId}`)) {
      throw new WarehouseApiError(404, `Not found: Table ${datasetId}.${tableId}`);
    }
  }

  async createTable(datasetId: string, tableId: string, schema: TableSchema): Promise<void> {
    await this.getDataset(datasetId);
    const key = `${datasetId}.${tableId}`;
    if (this.tables.has(key)) {
      throw new WarehouseApiError(409, `Already Exists: Table ${key}`);
    }
    this.tables.set(key, { schema, rows: [] });
    this.created.tables += 1;
  }

  async startLoadJob(datasetId: string, tableId: string, request: LoadJobRequest): Promise<LoadJob> {
    await this.getDataset(datasetId);
    this.jobCounter += 1;
    const id = `memory-job-${this.jobCounter}`;
    const key = `${datasetId}.${tableId}`;
    const rows = request.rows.map((row) => ({ ...row }));
    const pollsUntilDone = this.options.pollsUntilDone ?? 1;
    let polls = 0;
    let finished: LoadJobStatus | null = null;
    let cancelled = false;

    const complete = (): LoadJobStatus => {
      if (cancelled) {
        return { state: 'DONE', errorMessage: 'Job cancelled' };
      }
      if (this.options.failLoadWith) {
        return { state: 'DONE', errorMessage: this.options.failLoadWith };
      }
      const table = this.tables.get(key) ?? { schema: request.schema, rows: [] };
      const problem = missingRequiredField(rows, table.schema ?? request.schema);
      if (problem) {
        return { state: 'DONE', errorMessage: problem };
      }
      table.rows.push(...rows);
      this.tables.set(key, table);
      return { state: 'DONE', outputRows: rows.length };
    };

    return {
      id,
      status: async () => {
        if (finished) return finished;
        polls += 1;
        if (!cancelled && polls < pollsUntilDone) {
          return { state: 'RUNNING' };
        }
        finished = complete();
        return finished;
      },
      cancel: async () => {
        cancelled = true;
        this.cancelledJobs.push(id);
      },
    };
  }

  async query(sql: string): Promise<unknown[]> {
    if (this.options.failQueryWith) {
      throw new Error(this.options.failQueryWith);
    }
    const request = parseTopCustomersQuery(sql);
    if (!request) {
      throw new Error('memory warehouse only answers the top-customers report query');
    }
    const [datasetId, tableId] = request.table.split('.').slice(-2);
    await this.getTable(datasetId, tableId);

    const totals = new Map<string, { customer: string; total_sales: number; order_count: number }>();
    for (const row of this.rows(datasetId, tableId)) {
      const customer = String(row.customer);
      const entry = totals.get(customer) ?? { customer, total_sales: 0, order_count: 0 };
      entry.total_sales += Number(row.final_amount);
      entry.order_count += 1;
      totals.set(customer, entry);
    }
    return [...totals.values()].sort((a, b) => b.total_sales - a.total_sales).slice(0, request.limit);
  }
}
