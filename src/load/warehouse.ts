import type { TableSchema } from './schema.js';

export type WarehouseValue = string | number | boolean | null;

export type WarehouseRow = Record<string, WarehouseValue>;

export type TableTarget = {
  projectId?: string;
  datasetId: string;
  tableId: string;
  location: string;
};

export type LoadJobRequest = {
  rows: readonly WarehouseRow[];
  /** Explicit schema; when absent the warehouse detects one from the rows. */
  schema?: TableSchema;
  writeDisposition: 'WRITE_APPEND';
};

export type LoadJobState = 'PENDING' | 'RUNNING' | 'DONE';

export type LoadJobStatus = {
  state: LoadJobState;
  errorMessage?: string;
  outputRows?: number;
};

export type LoadJob = {
  readonly id: string;
  status(): Promise<LoadJobStatus>;
  cancel(): Promise<void>;
};

/**
 * The destination as the loader sees it. Lookups of datasets and tables that do
 * not exist reject with an error whose `code` is 404 (see {@link isNotFound}).
 */
export type WarehouseClient = {
  getDataset(datasetId: string): Promise<void>;
  createDataset(datasetId: string, options: { location: string }): Promise<void>;
  getTable(datasetId: string, tableId: string): Promise<void>;
  createTable(datasetId: string, tableId: string, schema: TableSchema): Promise<void>;
  startLoadJob(datasetId: string, tableId: string, request: LoadJobRequest): Promise<LoadJob>;
  query(sql: string): Promise<unknown[]>;
};

export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 404;
}

export function qualifiedName(target: Pick<TableTarget, 'projectId' | 'datasetId' | 'tableId'>): string {
  const parts = [target.projectId, target.datasetId, target.tableId].filter((part): part is string => Boolean(part));
  return parts.join('.');
}
