/**
 * Koinly CSV Writer
 */

import Papa from "papaparse";
import type { TargetRow } from "../types";
import { TARGET_HEADER } from "./constants";

export const CSV_LINE_TERMINATOR = "\r\n";

/**
 * Serialize Koinly rows, header first, one CRLF-terminated line per row
 *
 * Fields are quoted only when they contain a comma, a quote or a line break,
 * or start or end with a space.
 */
export function serializeTargetCsv(rows: readonly TargetRow[]): string {
  const table = [[...TARGET_HEADER], ...rows.map((row) => [...row])];
  const body = Papa.unparse(table, {
    delimiter: ",",
    newline: CSV_LINE_TERMINATOR,
    quotes: false,
  });
  return `${body}${CSV_LINE_TERMINATOR}`;
}
