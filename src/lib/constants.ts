/**
 * Shared constants for the NovaDAX → Koinly converter
 */
import type { TargetRow } from "../types";

// ==================== Sentinels ====================

/**
 * Written to the Date column when the source timestamp cannot be parsed
 */
export const INVALID_DATE = "Invalid Date";

/**
 * Written to every column when the source row has too few fields
 */
export const INVALID_ROW_MARKER = "Invalid Row";

// ==================== Source Format ====================

/**
 * Minimum number of fields in a processable NovaDAX row:
 * timestamp, type, currency, amount, status
 */
export const MIN_SOURCE_FIELDS = 5;

/**
 * Local fiat currency of the NovaDAX export.
 * Decides sent vs. received direction for purchases and sales.
 */
export const DEFAULT_FIAT_CODE = "BRL";

// ==================== Target Format ====================

/**
 * Koinly universal CSV header
 */
export const TARGET_HEADER: TargetRow = [
  "Date",
  "Sent Amount",
  "Sent Currency",
  "Received Amount",
  "Received Currency",
  "Fee Amount",
  "Fee Currency",
  "Net Worth Amount",
  "Net Worth Currency",
  "Label",
  "Description",
  "TxHash",
];

export const TARGET_FIELD_COUNT = TARGET_HEADER.length;

/**
 * Row emitted for structurally invalid source rows
 */
export const INVALID_ROW: TargetRow = [
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
  INVALID_ROW_MARKER,
];

/**
 * Koinly label applied to redeemed bonuses
 */
export const REWARD_LABEL = "reward";

// ==================== File Defaults ====================

export const DEFAULT_INPUT_PATH = "novadax.csv";

export const DEFAULT_OUTPUT_PATH = "novadax_koinly_custom.csv";
