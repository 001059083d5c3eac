/**
 * Record Mapper
 *
 * Turns raw NovaDAX CSV rows into Koinly rows, one for one and in order.
 */

import type { RawCsvRow, SourceRecord } from "../presets/types";
import type { MappedRow, TargetRecord, TargetRow } from "../types";
import { DEFAULT_FIAT_CODE, INVALID_ROW, MIN_SOURCE_FIELDS } from "./constants";
import { debug } from "./debug-logger";
import { classifyRecord } from "./row-classifier";

export interface MapOptions {
  /** Local fiat currency code, any case (default "BRL") */
  fiatCode?: string;
}

/**
 * Build a SourceRecord from the first five fields of a raw row
 *
 * @returns The record, or null when the row has fewer than five fields
 */
export function toSourceRecord(fields: RawCsvRow): SourceRecord | null {
  if (fields.length < MIN_SOURCE_FIELDS) {
    return null;
  }
  const [timestamp, typeLabel, currencyCode, amountText, status] = fields;
  return { timestamp, typeLabel, currencyCode, amountText, status };
}

/**
 * Serialize a ledger entry in Koinly header order
 */
export function toTargetRow(record: TargetRecord): TargetRow {
  return [
    record.date,
    record.sentAmount,
    record.sentCurrency,
    record.receivedAmount,
    record.receivedCurrency,
    record.feeAmount,
    record.feeCurrency,
    record.netWorthAmount,
    record.netWorthCurrency,
    record.label,
    record.description,
    record.txHash,
  ];
}

/**
 * Map one raw source row to a Koinly row
 *
 * Rows with fewer than five fields become twelve "Invalid Row" markers.
 */
export function mapSourceRow(fields: RawCsvRow, options: MapOptions = {}): MappedRow {
  const source = toSourceRecord(fields);
  if (!source) {
    debug.log(`[Record Mapper] Row has ${fields.length} field(s), expected ${MIN_SOURCE_FIELDS}`, fields);
    return { row: INVALID_ROW, kind: "INVALID_ROW" };
  }

  const { kind, record } = classifyRecord(source, options.fiatCode ?? DEFAULT_FIAT_CODE);
  debug.log(`[Record Mapper] "${source.typeLabel}" ${source.currencyCode} -> ${kind}`);

  return { row: toTargetRow(record), kind };
}

/**
 * Map data rows (header already removed), preserving order and count
 */
export function convertRows(rows: readonly RawCsvRow[], options: MapOptions = {}): MappedRow[] {
  return rows.map((fields) => mapSourceRow(fields, options));
}
