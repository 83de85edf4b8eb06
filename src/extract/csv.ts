import { promises as fsp } from 'node:fs';
import Papa from 'papaparse';
import { ExtractError, errorMessage } from '../errors.js';
import { SALES_CSV_COLUMNS, type RawRecord } from '../types/sales.js';
import type { DiagnosticLog } from '../utils/diagnostics.js';

function toRawRecord(row: Record<string, unknown>): RawRecord {
  const record: RawRecord = {};
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string') {
      record[key] = value;
    }
  }
  return record;
}

export function parseSalesCsv(text: string, log: DiagnosticLog): RawRecord[] {
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = SALES_CSV_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length) {
    throw new ExtractError(`CSV header is missing columns: ${missing.join(', ')}`);
  }

  for (const issue of parsed.errors) {
    if (issue.type !== 'FieldMismatch') {
      throw new ExtractError(`malformed CSV at row ${issue.row ?? '?'}: ${issue.message}`);
    }
    log.warn('extract', `Row ${issue.row ?? '?'}: ${issue.message}`);
  }

  return parsed.data.map(toRawRecord);
}

export async function extractSalesCsv(csvPath: string, log: DiagnosticLog): Promise<RawRecord[]> {
  log.info('extract', `Reading from ${csvPath}...`);

  let text: string;
  try {
    text = await fsp.readFile(csvPath, 'utf8');
  } catch (error) {
    throw new ExtractError(`cannot read ${csvPath}: ${errorMessage(error)}`, { cause: error });
  }

  const records = parseSalesCsv(text, log);
  log.info('extract', `Extracted ${records.length} records`);
  return records;
}
