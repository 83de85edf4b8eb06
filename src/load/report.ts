import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { ReportOutcome } from '../types/run.js';
import type { DiagnosticLog } from '../utils/diagnostics.js';
import { qualifiedName, type TableTarget, type WarehouseClient } from './warehouse.js';

const reportRowSchema = z.object({
  customer: z.string(),
  total_sales: z.coerce.number(),
  order_count: z.coerce.number().int(),
});

export type CustomerTotal = z.infer<typeof reportRowSchema>;

const TOP_CUSTOMERS_PATTERN =
  /^SELECT customer, SUM\(final_amount\) AS total_sales, COUNT\(\*\) AS order_count\nFROM `([^`]+)`\nGROUP BY customer\nORDER BY total_sales DESC\nLIMIT (\d+)$/;

const money = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function buildTopCustomersQuery(target: TableTarget, limit: number): string {
  return [
    'SELECT customer, SUM(final_amount) AS total_sales, COUNT(*) AS order_count',
    `FROM \`${qualifiedName(target)}\``,
    'GROUP BY customer',
    'ORDER BY total_sales DESC',
    `LIMIT ${Math.trunc(limit)}`,
  ].join('\n');
}

export function parseTopCustomersQuery(sql: string): { table: string; limit: number } | null {
  const match = TOP_CUSTOMERS_PATTERN.exec(sql);
  if (!match) return null;
  return { table: match[1], limit: Number(match[2]) };
}

export function formatCustomerLine(row: CustomerTotal): string {
  return `  ${row.customer}: $${money.format(row.total_sales)} (${row.order_count} orders)`;
}

/**
 * Read-only verification of a finished load. A failing query is reported in the
 * outcome and the diagnostics; it never fails the run.
 */
export async function reportTopCustomers(
  client: WarehouseClient,
  target: TableTarget,
  limit: number,
  log: DiagnosticLog
): Promise<ReportOutcome> {
  log.info('report', `Top ${limit} customers by sales:`);
  try {
    const rows = await client.query(buildTopCustomersQuery(target, limit));
    const lines = rows.map((row) => formatCustomerLine(reportRowSchema.parse(row)));
    for (const line of lines) {
      log.info('report', line);
    }
    return { status: 'ok', lines };
  } catch (error) {
    const message = errorMessage(error);
    log.error('report', `Report query failed: ${message}`);
    return { status: 'failed', error: message };
  }
}
