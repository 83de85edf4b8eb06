import type { EnrichedSale, RawRecord, SaleCategory, StampedSale, ValidatedSale } from '../types/sales.js';
import type { DiagnosticLog } from '../utils/diagnostics.js';
import {
  normalizeString,
  parseDecimal,
  parseInteger,
  parseIsoDate,
  roundHalfEven,
  titleCase,
} from '../utils/normalize.js';

export const DISCOUNT_THRESHOLD = 1000;
export const DISCOUNT_RATE = 0.1;
export const HIGH_VALUE_THRESHOLD = 500;

export type TransformOutcome = {
  records: EnrichedSale[];
  rejected: number;
};

type RowResult = { ok: true; sale: ValidatedSale } | { ok: false; message: string };

function describeRow(row: RawRecord): string {
  return JSON.stringify(row);
}

function validateRow(row: RawRecord): RowResult {
  const orderId = normalizeString(row.order_id);
  const customer = row.customer_name === undefined ? 'Unknown' : titleCase(row.customer_name.trim());
  const product = normalizeString(row.product);
  const quantityText = row.quantity ?? '0';
  const priceText = row.price ?? '0';

  const quantity = parseInteger(quantityText);
  if (quantity === null) {
    return { ok: false, message: `Error processing row ${describeRow(row)}: invalid quantity "${quantityText}"` };
  }
  const price = parseDecimal(priceText);
  if (price === null) {
    return { ok: false, message: `Error processing row ${describeRow(row)}: invalid price "${priceText}"` };
  }

  if (!orderId || quantity <= 0 || price <= 0) {
    return { ok: false, message: `Skipping invalid row: ${describeRow(row)}` };
  }

  const orderDateText = normalizeString(row.order_date);
  const orderDate = parseIsoDate(orderDateText);
  if (orderDate === null) {
    return { ok: false, message: `Error processing row ${describeRow(row)}: invalid order_date "${orderDateText}"` };
  }

  return {
    ok: true,
    sale: { order_id: orderId, customer, product, quantity, price, order_date: orderDate },
  };
}

export function enrichSale(sale: ValidatedSale): EnrichedSale {
  const totalAmount = roundHalfEven(sale.quantity * sale.price, 2);
  const discountRate = totalAmount > DISCOUNT_THRESHOLD ? DISCOUNT_RATE : 0;
  const finalAmount = roundHalfEven(totalAmount * (1 - discountRate), 2);
  const category: SaleCategory = finalAmount >= HIGH_VALUE_THRESHOLD ? 'High Value' : 'Standard';

  return Object.freeze({
    ...sale,
    total_amount: totalAmount,
    discount_rate: discountRate,
    final_amount: finalAmount,
    category,
  });
}

export function transformSales(rows: readonly RawRecord[], log: DiagnosticLog): TransformOutcome {
  log.info('transform', 'Cleaning and calculating metrics...');
  const records: EnrichedSale[] = [];
  let rejected = 0;

  for (const row of rows) {
    const result = validateRow(row);
    if (!result.ok) {
      rejected += 1;
      log.warn('transform', result.message, { row });
      continue;
    }
    records.push(enrichSale(result.sale));
  }

  log.info('transform', `Transformed ${records.length} valid records`);
  if (rejected) {
    log.info('transform', `Rejected ${rejected} records`);
  }
  return { records, rejected };
}

export function stampBatch(records: readonly EnrichedSale[], loadedAt: Date): StampedSale[] {
  const stamp = loadedAt.toISOString();
  return records.map((record) => Object.freeze({ ...record, loaded_at: stamp }));
}
