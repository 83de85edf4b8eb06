export const SALES_CSV_COLUMNS = ['order_id', 'customer_name', 'product', 'quantity', 'price', 'order_date'] as const;

export type RawRecord = Record<string, string>;

export type SaleCategory = 'High Value' | 'Standard';

export type ValidatedSale = {
  order_id: string;
  customer: string;
  product: string;
  quantity: number;
  price: number;
  order_date: string;
};

export type EnrichedSale = Readonly<
  ValidatedSale & {
    total_amount: number;
    discount_rate: number;
    final_amount: number;
    category: SaleCategory;
  }
>;

export type StampedSale = EnrichedSale & { readonly loaded_at: string };

export type InlineSale = {
  order_id: string;
  customer: string;
  amount: number;
};

export type SourceRow = Record<string, unknown>;
