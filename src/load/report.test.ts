import { describe, expect, it } from 'vitest';
import { DiagnosticLog } from '../utils/diagnostics.js';
import { MemoryWarehouse } from './memory-warehouse.js';
import { buildTopCustomersQuery, formatCustomerLine, parseTopCustomersQuery, reportTopCustomers } from './report.js';
import type { TableTarget } from './warehouse.js';

const target: TableTarget = { projectId: 'test-project', datasetId: 'sales_data', tableId: 'sales', location: 'US' };

async function seeded(options: ConstructorParameters<typeof MemoryWarehouse>[0] = {}): Promise<MemoryWarehouse> {
  const warehouse = new MemoryWarehouse(options);
  await warehouse.createDataset('sales_data', { location: 'US' });
  await warehouse.createTable('sales_data', 'sales', []);
  const job = await warehouse.startLoadJob('sales_data', 'sales', {
    rows: [
      { customer: 'Ann', final_amount: 10 },
      { customer: 'Ben', final_amount: 1500.5 },
      { customer: 'Ann', final_amount: 20.25 },
      { customer: 'Cy', final_amount: 5 },
    ],
    writeDisposition: 'WRITE_APPEND',
  });
  await job.status();
  return warehouse;
}

describe('buildTopCustomersQuery', () => {
  it('aggregates final amounts per customer from the qualified table', () => {
    expect(buildTopCustomersQuery(target, 5)).toBe(
      [
        'SELECT customer, SUM(final_amount) AS total_sales, COUNT(*) AS order_count',
        'FROM `test-project.sales_data.sales`',
        'GROUP BY customer',
        'ORDER BY total_sales DESC',
        'LIMIT 5',
      ].join('\n')
    );
  });

  it('is understood by the query parser', () => {
    expect(parseTopCustomersQuery(buildTopCustomersQuery(target, 3))).toEqual({
      table: 'test-project.sales_data.sales',
      limit: 3,
    });
    expect(parseTopCustomersQuery('SELECT 1')).toBeNull();
  });
});

describe('formatCustomerLine', () => {
  it('prints a currency total with grouping and two decimals', () => {
    expect(formatCustomerLine({ customer: 'John Doe', total_sales: 2219.97, order_count: 2 })).toBe(
      '  John Doe: $2,219.97 (2 orders)'
    );
    expect(formatCustomerLine({ customer: 'Bob Wilson', total_sales: 750, order_count: 1 })).toBe(
      '  Bob Wilson: $750.00 (1 orders)'
    );
  });
});

describe('reportTopCustomers', () => {
  it('lists customers by descending total up to the limit', async () => {
    const warehouse = await seeded();
    const log = new DiagnosticLog();

    const outcome = await reportTopCustomers(warehouse, target, 2, log);

    expect(outcome).toEqual({
      status: 'ok',
      lines: ['  Ben: $1,500.50 (1 orders)', '  Ann: $30.25 (2 orders)'],
    });
    expect(log.events[0].message).toBe('Top 2 customers by sales:');
  });

  it('returns a failed outcome instead of throwing when the query fails', async () => {
    const warehouse = await seeded({ failQueryWith: 'permission denied' });
    const log = new DiagnosticLog();

    const outcome = await reportTopCustomers(warehouse, target, 5, log);

    expect(outcome).toEqual({ status: 'failed', error: 'permission denied' });
    expect(log.events.at(-1)).toMatchObject({
      severity: 'error',
      stage: 'report',
      message: 'Report query failed: permission denied',
    });
  });
});
