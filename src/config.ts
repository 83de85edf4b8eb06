import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isSchemaVersion, type SchemaVersion } from './load/schema.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const identifier = z.string().trim().regex(IDENTIFIER, 'must be a plain identifier');

const envSchema = z.object({
  SOURCE_CSV_PATH: z.string().trim().min(1).default('data/sales_data.csv'),
  POSTGRES_HOST: z.string().trim().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().min(1).default('etl'),
  POSTGRES_PASSWORD: z.string().default('etlpass'),
  POSTGRES_DB: z.string().min(1).default('salesdb'),
  SOURCE_ORDERS_TABLE: identifier.default('orders'),
  SOURCE_DATE_COLUMN: identifier.default('order_date'),
  SOURCE_WINDOW_MINUTES: z.coerce.number().int().positive().default(60),
  BQ_PROJECT_ID: z.string().trim().min(1).optional(),
  BQ_DATASET_ID: identifier.default('sales_data'),
  BQ_TABLE_ID: identifier.default('sales'),
  BQ_RAW_TABLE_ID: identifier.default('orders_raw'),
  BQ_INLINE_TABLE_ID: identifier.default('inline_sales'),
  BQ_LOCATION: z.string().trim().min(1).default('US'),
  SCHEMA_VERSION: z.string().trim().default('1').refine(isSchemaVersion, 'unknown schema version'),
  LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  LOAD_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  REPORT_LIMIT: z.coerce.number().int().min(1).max(100).default(5),
});

export type PostgresConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type SourceConfig = {
  csvPath: string;
  postgres: PostgresConfig;
  ordersTable: string;
  dateColumn: string;
  windowMinutes: number;
};

export type DestinationConfig = {
  projectId?: string;
  datasetId: string;
  tableId: string;
  rawTableId: string;
  inlineTableId: string;
  location: string;
};

export type EtlConfig = Readonly<{
  source: Readonly<SourceConfig>;
  destination: Readonly<DestinationConfig>;
  schemaVersion: SchemaVersion;
  loadTimeoutMs: number;
  loadPollIntervalMs: number;
  reportLimit: number;
}>;

type Env = Record<string, string | undefined>;

// Blank entries in .env behave as if unset.
function withoutBlankValues(env: Env): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadConfig(env: Env = process.env): EtlConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('invalid configuration', issues);
  }
  const values = parsed.data;

  return Object.freeze({
    source: Object.freeze({
      csvPath: values.SOURCE_CSV_PATH,
      postgres: Object.freeze({
        host: values.POSTGRES_HOST,
        port: values.POSTGRES_PORT,
        user: values.POSTGRES_USER,
        password: values.POSTGRES_PASSWORD,
        database: values.POSTGRES_DB,
      }),
      ordersTable: values.SOURCE_ORDERS_TABLE,
      dateColumn: values.SOURCE_DATE_COLUMN,
      windowMinutes: values.SOURCE_WINDOW_MINUTES,
    }),
    destination: Object.freeze({
      projectId: values.BQ_PROJECT_ID,
      datasetId: values.BQ_DATASET_ID,
      tableId: values.BQ_TABLE_ID,
      rawTableId: values.BQ_RAW_TABLE_ID,
      inlineTableId: values.BQ_INLINE_TABLE_ID,
      location: values.BQ_LOCATION,
    }),
    schemaVersion: values.SCHEMA_VERSION,
    loadTimeoutMs: values.LOAD_TIMEOUT_MS,
    loadPollIntervalMs: values.LOAD_POLL_INTERVAL_MS,
    reportLimit: values.REPORT_LIMIT,
  });
}
