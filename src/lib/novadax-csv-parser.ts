/**
 * NovaDAX CSV Parser
 *
 * Splits a NovaDAX export into its header row and its data rows.
 * Fields are kept as exported (no trimming): the classifier and the extractors
 * work on the raw text.
 */

import Papa, { type ParseResult } from "papaparse";
import type { RawCsvRow } from "../presets/types";
import { getErrorMessage, isEmptyLine } from "./shared-utils";

/**
 * Parsed NovaDAX export
 */
export interface ParsedSourceCsv {
  /** First record of the file; empty when the file is empty */
  header: string[];
  /** Every record after the header, in file order */
  rows: RawCsvRow[];
  /** Non-fatal parser messages */
  errors: string[];
}

const BYTE_ORDER_MARK = /^\uFEFF/;

/**
 * Parse NovaDAX CSV content
 *
 * Empty lines at the end of the file are dropped. An empty line between records
 * is kept as a one-field row, and so is a whitespace-only line anywhere.
 */
export function parseSourceCsv(csvContent: string): ParsedSourceCsv {
  const errors: string[] = [];

  let records: string[][];
  try {
    const parseResult: ParseResult<string[]> = Papa.parse<string[]>(
      csvContent.replace(BYTE_ORDER_MARK, ""),
      {
        header: false,
        delimiter: ",",
        skipEmptyLines: false,
      }
    );
    records = parseResult.data;

    for (const error of parseResult.errors) {
      const location = error.row === undefined ? "" : ` (row ${error.row + 1})`;
      errors.push(`${error.message}${location}`);
    }
  } catch (error) {
    errors.push(`Error parsing NovaDAX CSV: ${getErrorMessage(error)}`);
    return { header: [], rows: [], errors };
  }

  let end = records.length;
  while (end > 0 && isEmptyLine(records[end - 1])) {
    end--;
  }

  if (end === 0) {
    return { header: [], rows: [], errors };
  }

  return {
    header: records[0],
    rows: records.slice(1, end),
    errors,
  };
}
