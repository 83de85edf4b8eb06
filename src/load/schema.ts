export type FieldType = 'STRING' | 'INTEGER' | 'FLOAT' | 'DATE' | 'TIMESTAMP';

export type FieldMode = 'REQUIRED' | 'NULLABLE';

export type SchemaField = {
  readonly name: string;
  readonly type: FieldType;
  readonly mode: FieldMode;
};

export type TableSchema = readonly SchemaField[];

function required(name: string, type: FieldType): SchemaField {
  return { name, type, mode: 'REQUIRED' };
}

export const SALES_SCHEMA_V1: TableSchema = [
  required('order_id', 'STRING'),
  required('customer', 'STRING'),
  required('product', 'STRING'),
  required('quantity', 'INTEGER'),
  required('price', 'FLOAT'),
  required('order_date', 'DATE'),
  required('total_amount', 'FLOAT'),
  required('discount_rate', 'FLOAT'),
  required('final_amount', 'FLOAT'),
  required('category', 'STRING'),
  required('loaded_at', 'TIMESTAMP'),
];

export const INLINE_SALES_SCHEMA: TableSchema = [
  required('order_id', 'STRING'),
  required('customer', 'STRING'),
  required('amount', 'FLOAT'),
  required('loaded_at', 'TIMESTAMP'),
];

export const SALES_SCHEMAS = {
  '1': SALES_SCHEMA_V1,
} as const satisfies Record<string, TableSchema>;

export type SchemaVersion = keyof typeof SALES_SCHEMAS;

export function isSchemaVersion(value: string): value is SchemaVersion {
  return Object.hasOwn(SALES_SCHEMAS, value);
}
