/**
 * Numeric Extractor
 *
 * Pulls the primary amount out of NovaDAX's free-text amount column, e.g.
 * "R$ 1.234,56", "-0,00012 BTC (≈R$ 35,10)" or "+ 1,234.56".
 *
 * The result is a decimal string with the source precision, never a number.
 */

/**
 * Converted-value annotation NovaDAX appends to crypto amounts: "(≈R$123,45)"
 */
const APPROXIMATION_PATTERN = /\(≈\s*R\$[^)]*\)/gu;

/**
 * Optional sign, optional whitespace, then a digit followed by digits, dots and commas
 */
const NUMBER_RUN_PATTERN = /[+-]?\s*\d[\d.,]*/;

/**
 * Remove every "(≈R$…)" annotation so its value is never taken for the amount
 *
 * @example
 * stripApproximation("-89,10 (≈R$50,00)") // returns "-89,10 "
 */
export function stripApproximation(text: string): string {
  return text.replace(APPROXIMATION_PATTERN, "");
}

/**
 * Find the first signed numeric run in the text
 *
 * Later runs are ignored: the first number is always the transaction amount.
 *
 * @returns The raw run (e.g. "- 1.234,5"), or null when the text holds no digit
 */
export function findFirstNumber(text: string): string | null {
  const match = NUMBER_RUN_PATTERN.exec(text);
  return match ? match[0] : null;
}

/**
 * Normalize a raw numeric run to a dot-decimal string
 *
 * Commas become dots; when more than one dot remains, every dot but the last is
 * treated as a thousands separator. A bare two-part value such as "1.234" keeps
 * its dot as the decimal marker.
 *
 * @example
 * normalizeNumberRun("- 1.234,56") // returns "-1234.56"
 * normalizeNumberRun("+0,5") // returns "0.5"
 */
export function normalizeNumberRun(run: string): string {
  let value = run.replace(/\s+/g, "").replace(/,/g, ".");

  const parts = value.split(".");
  if (parts.length > 2) {
    const fraction = parts[parts.length - 1];
    value = `${parts.slice(0, -1).join("")}.${fraction}`;
  }

  return value.startsWith("+") ? value.slice(1) : value;
}

/**
 * Extract the primary amount from a free-text amount string
 *
 * @returns Decimal string with the source precision, or "" when no number is present
 *
 * @example
 * extractNumericValue("R$ 0,0123") // returns "0.0123"
 * extractNumericValue("(≈R$50,00) -89,10") // returns "-89.10"
 * extractNumericValue("no numbers here") // returns ""
 */
export function extractNumericValue(text: string): string {
  const run = findFirstNumber(stripApproximation(text));
  if (run === null) {
    return "";
  }
  return normalizeNumberRun(run);
}
