/**
 * Shared Utility Functions
 *
 * Common helpers used by the converter, the CSV layer and the CLI.
 */

/**
 * Safely extract an error message from an unknown error value
 *
 * Handles Error objects, strings, and other types.
 *
 * @example
 * getErrorMessage(new Error("Something went wrong")) // returns "Something went wrong"
 * getErrorMessage("Just a string") // returns "Just a string"
 * getErrorMessage({ code: 500 }) // returns "[object Object]"
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Raised when the source file cannot be read or the target file cannot be written
 */
export class ConversionFileError extends Error {
  readonly path: string;
  readonly operation: "read" | "write";

  constructor(operation: "read" | "write", path: string, cause: unknown) {
    super(`Failed to ${operation} "${path}": ${getErrorMessage(cause)}`, { cause });
    this.name = "ConversionFileError";
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Check whether a parsed CSV row comes from an empty line
 *
 * Papaparse yields `[""]` for an empty line. Rows of empty fields (",,,,")
 * and whitespace-only lines are records and do not count.
 *
 * @example
 * isEmptyLine([""]) // returns true
 * isEmptyLine(["", "", "", "", ""]) // returns false
 * isEmptyLine(["   "]) // returns false
 */
export function isEmptyLine(fields: readonly string[]): boolean {
  return fields.length === 1 && fields[0] === "";
}
