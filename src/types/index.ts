/**
 * Shared type definitions for the NovaDAX → Koinly converter
 */
import type { RowKind } from "../presets/types";

/**
 * One Koinly universal ledger entry
 */
export interface TargetRecord {
  readonly date: string;
  readonly sentAmount: string;
  readonly sentCurrency: string;
  readonly receivedAmount: string;
  readonly receivedCurrency: string;
  readonly feeAmount: string;
  readonly feeCurrency: string;
  /** Always empty: the export carries no valuation */
  readonly netWorthAmount: string;
  readonly netWorthCurrency: string;
  /** Koinly tag, e.g. "reward" */
  readonly label: string;
  /** Original (non-normalized) transaction type text */
  readonly description: string;
  /** Always empty: the export carries no on-chain hash */
  readonly txHash: string;
}

/**
 * A TargetRecord serialized in Koinly header order
 */
export type TargetRow = readonly [
  date: string,
  sentAmount: string,
  sentCurrency: string,
  receivedAmount: string,
  receivedCurrency: string,
  feeAmount: string,
  feeCurrency: string,
  netWorthAmount: string,
  netWorthCurrency: string,
  label: string,
  description: string,
  txHash: string,
];

/**
 * Result of mapping a single source row
 */
export interface MappedRow {
  row: TargetRow;
  kind: RowKind;
}

/**
 * Number of rows per kind, for the end-of-run report
 */
export type ConversionSummary = Record<RowKind, number>;

/**
 * Result of converting a whole CSV document
 */
export interface ConversionResult {
  /** Koinly CSV text, header included */
  output: string;
  /** Number of data rows written (header excluded) */
  rowCount: number;
  summary: ConversionSummary;
  /** Number of rows whose date could not be parsed */
  invalidDates: number;
  /** Non-fatal parser messages */
  errors: string[];
}
