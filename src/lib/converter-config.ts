/**
 * Converter configuration
 *
 * Options arrive from the CLI as loose strings; the schema validates them and
 * fills in the defaults.
 */

import * as z from "zod";
import { DEFAULT_FIAT_CODE, DEFAULT_INPUT_PATH, DEFAULT_OUTPUT_PATH } from "./constants";

export const converterOptionsSchema = z.object({
  inputPath: z.string().trim().min(1, "Input path is required").default(DEFAULT_INPUT_PATH),
  outputPath: z.string().trim().min(1, "Output path is required").default(DEFAULT_OUTPUT_PATH),
  fiatCode: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3,5}$/, "Fiat code must be 3 to 5 letters")
    .transform((code) => code.toUpperCase())
    .default(DEFAULT_FIAT_CODE),
  debug: z.boolean().default(false),
});

export type ConverterOptionsInput = z.input<typeof converterOptionsSchema>;
export type ConverterOptions = z.output<typeof converterOptionsSchema>;

/**
 * Result type for option resolution that distinguishes between success and failure
 */
export interface ResolveOptionsResult {
  success: boolean;
  options?: ConverterOptions;
  /** Validation messages joined into one line, if resolution failed */
  error?: string;
}

/**
 * Validate raw options and apply defaults
 *
 * @example
 * resolveConverterOptions({ fiatCode: "brl" }).options?.fiatCode // returns "BRL"
 * resolveConverterOptions({ fiatCode: "R$" }).success // returns false
 */
export function resolveConverterOptions(input: ConverterOptionsInput): ResolveOptionsResult {
  const parsed = converterOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return { success: false, error };
  }
  return { success: true, options: parsed.data };
}
