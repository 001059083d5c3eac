/**
 * Converter - reads a NovaDAX export and produces the Koinly CSV
 *
 * The per-row work lives in record-mapper; this module owns the document and
 * file level steps around it.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { RowKind } from "../presets/types";
import type { ConversionResult, ConversionSummary } from "../types";
import { INVALID_DATE } from "./constants";
import { debug } from "./debug-logger";
import { serializeTargetCsv } from "./koinly-csv-writer";
import { parseSourceCsv } from "./novadax-csv-parser";
import { convertRows, type MapOptions } from "./record-mapper";
import { ConversionFileError } from "./shared-utils";

/**
 * Every kind, in the order the end-of-run report lists them
 */
export const ROW_KINDS: readonly RowKind[] = [
  "TRANSACTION_FEE",
  "WITHDRAWAL_FEE",
  "FIAT_DEPOSIT",
  "REWARD",
  "PURCHASE",
  "SALE",
  "CRYPTO_WITHDRAWAL",
  "UNMATCHED",
  "INVALID_ROW",
];

/**
 * Create a summary with every kind at zero
 */
export function createEmptySummary(): ConversionSummary {
  return {
    TRANSACTION_FEE: 0,
    WITHDRAWAL_FEE: 0,
    FIAT_DEPOSIT: 0,
    REWARD: 0,
    PURCHASE: 0,
    SALE: 0,
    CRYPTO_WITHDRAWAL: 0,
    UNMATCHED: 0,
    INVALID_ROW: 0,
  };
}

/**
 * Convert NovaDAX CSV text to Koinly CSV text
 *
 * The first record is the NovaDAX header and is skipped. Every other record
 * yields exactly one output row, in the same order.
 */
export function convertCsvContent(csvContent: string, options: MapOptions = {}): ConversionResult {
  const parsed = parseSourceCsv(csvContent);
  for (const message of parsed.errors) {
    debug.warn(`[Converter] CSV parse warning: ${message}`);
  }

  const mapped = convertRows(parsed.rows, options);

  const summary = createEmptySummary();
  let invalidDates = 0;
  for (const { row, kind } of mapped) {
    summary[kind]++;
    if (kind !== "INVALID_ROW" && row[0] === INVALID_DATE) {
      invalidDates++;
    }
  }

  debug.group("[Converter] Rows per kind", () => {
    for (const kind of ROW_KINDS) {
      debug.log(`${kind}: ${summary[kind]}`);
    }
  });

  if (summary.INVALID_ROW > 0) {
    debug.warn(`[Converter] ${summary.INVALID_ROW} row(s) had fewer than 5 fields`);
  }
  if (invalidDates > 0) {
    debug.warn(`[Converter] ${invalidDates} row(s) had an unparseable date`);
  }

  return {
    output: serializeTargetCsv(mapped.map(({ row }) => row)),
    rowCount: mapped.length,
    summary,
    invalidDates,
    errors: parsed.errors,
  };
}

/**
 * Convert a NovaDAX export file into a Koinly CSV file
 *
 * Both files are UTF-8. The output directory is created if missing.
 *
 * @throws ConversionFileError when the input cannot be read or the output cannot be written
 */
export async function convertFile(
  inputPath: string,
  outputPath: string,
  options: MapOptions = {}
): Promise<ConversionResult> {
  let content: string;
  try {
    content = await readFile(inputPath, "utf-8");
  } catch (error) {
    throw new ConversionFileError("read", inputPath, error);
  }

  debug.log(`[Converter] Read ${content.length} characters from ${inputPath}`);
  const result = convertCsvContent(content, options);

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, result.output, "utf-8");
  } catch (error) {
    throw new ConversionFileError("write", outputPath, error);
  }

  debug.log(`[Converter] Wrote ${result.rowCount} row(s) to ${outputPath}`);
  return result;
}
