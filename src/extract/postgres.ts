import { withConnection, type SourcePool } from '../db.js';
import { ConfigError, ExtractError, errorMessage } from '../errors.js';
import type { SourceRow } from '../types/sales.js';
import type { DiagnosticLog } from '../utils/diagnostics.js';

export type RecentOrdersOptions = {
  table: string;
  dateColumn: string;
  windowMinutes: number;
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertIdentifier(name: string, label: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new ConfigError(`${label} "${name}" is not a plain identifier`);
  }
}

export function buildRecentOrdersQuery({ table, dateColumn }: RecentOrdersOptions): string {
  assertIdentifier(table, 'source table');
  assertIdentifier(dateColumn, 'source date column');
  return `select * from ${table} where ${dateColumn} >= now() - make_interval(mins => $1)`;
}

/**
 * Opens the source pool, reads the rows of the last `windowMinutes` and closes the pool
 * again before returning, whether the query succeeded or not.
 */
export async function extractRecentOrders(
  openPool: () => SourcePool,
  options: RecentOrdersOptions,
  log: DiagnosticLog
): Promise<SourceRow[]> {
  const text = buildRecentOrdersQuery(options);
  log.info('extract', `Querying ${options.table} for the last ${options.windowMinutes} minutes`);

  const pool = openPool();
  try {
    const { rows } = await withConnection(pool, (client) => client.query(text, [options.windowMinutes]));
    log.info('extract', `Extracted ${rows.length} rows`);
    return rows;
  } catch (error) {
    throw new ExtractError(`source query failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    await pool.end();
  }
}
