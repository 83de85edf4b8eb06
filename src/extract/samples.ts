import Papa from 'papaparse';
import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { SALES_CSV_COLUMNS, type InlineSale, type RawRecord } from '../types/sales.js';
import type { DiagnosticLog } from '../utils/diagnostics.js';

const INLINE_SALES: readonly InlineSale[] = [
  { order_id: 'ORD001', customer: 'Alice', amount: 150.0 },
  { order_id: 'ORD002', customer: 'Bob', amount: 200.5 },
  { order_id: 'ORD003', customer: 'Alice', amount: 75.25 },
];

export function extractInlineSales(log: DiagnosticLog): InlineSale[] {
  const sales = INLINE_SALES.map((sale) => ({ ...sale }));
  log.info('extract', `Extracted ${sales.length} built-in records`);
  return sales;
}

export const SAMPLE_SALES_ROWS: readonly RawRecord[] = [
  { order_id: 'ORD001', customer_name: 'john doe', product: 'Laptop', quantity: '2', price: '899.99', order_date: '2026-02-15' },
  { order_id: 'ORD002', customer_name: 'JANE SMITH', product: 'Mouse', quantity: '5', price: '25.50', order_date: '2026-02-16' },
  { order_id: 'ORD003', customer_name: 'alice brown', product: 'Monitor', quantity: '3', price: '450.00', order_date: '2026-02-17' },
  { order_id: 'ORD004', customer_name: 'bob wilson', product: 'Keyboard', quantity: '10', price: '75.00', order_date: '2026-02-18' },
  { order_id: 'ORD005', customer_name: 'john doe', product: 'Desk', quantity: '1', price: '599.99', order_date: '2026-02-20' },
  { order_id: 'INVALID', customer_name: 'test', product: 'Bad', quantity: '-1', price: '0', order_date: '2026-02-21' },
];

export async function writeSampleSalesCsv(csvPath: string): Promise<number> {
  const text = Papa.unparse(
    SAMPLE_SALES_ROWS.map((row) => ({ ...row })),
    { columns: [...SALES_CSV_COLUMNS], newline: '\n' }
  );
  await fsp.mkdir(path.dirname(csvPath), { recursive: true });
  await fsp.writeFile(csvPath, `${text}\n`, 'utf8');
  return SAMPLE_SALES_ROWS.length;
}
