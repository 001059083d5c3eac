/**
 * NovaDAX CSV Transaction Row types
 */

/**
 * Raw CSV row as produced by the parser: ordered string fields
 */
export type RawCsvRow = readonly string[];

/**
 * One NovaDAX transaction, built from the first five fields of a raw row.
 * Any trailing fields are ignored.
 */
export interface SourceRecord {
  /** "DD/MM/YYYY HH:MM:SS" */
  timestamp: string;
  /** Transaction type as exported, e.g. "Compra", "Taxa de Transação" */
  typeLabel: string;
  /** Asset code, e.g. "BTC", "BRL" */
  currencyCode: string;
  /** Free-text amount, e.g. "R$ 1.234,56 (≈R$1.234,56)" */
  amountText: string;
  /** Export status column (e.g. "Concluído"); not used for classification */
  status: string;
}

/**
 * Classification kinds, in rule evaluation order.
 */
export type ClassificationKind =
  | "TRANSACTION_FEE"
  | "WITHDRAWAL_FEE"
  | "FIAT_DEPOSIT"
  | "REWARD"
  | "PURCHASE"
  | "SALE"
  | "CRYPTO_WITHDRAWAL"
  | "UNMATCHED";

/**
 * Kind reported by the record mapper: a classification, or a structurally invalid row
 */
export type RowKind = ClassificationKind | "INVALID_ROW";
