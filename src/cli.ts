/**
 * Command-line front end
 *
 *   novadax-koinly [input.csv] [output.csv] [--fiat BRL] [--debug]
 *
 * Defaults to novadax.csv → novadax_koinly_custom.csv in the working directory.
 */

import { parseArgs } from "node:util";
import { convertFile, ROW_KINDS } from "./lib/converter";
import { resolveConverterOptions } from "./lib/converter-config";
import { debug } from "./lib/debug-logger";
import { getErrorMessage } from "./lib/shared-utils";
import type { ConversionSummary } from "./types";

export const USAGE = "Usage: novadax-koinly [input.csv] [output.csv] [--fiat CODE] [--debug]";

function formatSummary(summary: ConversionSummary): string[] {
  return ROW_KINDS.filter((kind) => summary[kind] > 0).map((kind) => `  ${kind}: ${summary[kind]}`);
}

/**
 * Run the converter with command-line arguments (without the node/script entries)
 *
 * @returns Process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  let values: { fiat?: string; debug?: boolean; help?: boolean };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        fiat: { type: "string" },
        debug: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    }));
  } catch (error) {
    debug.error(getErrorMessage(error));
    debug.error(USAGE);
    return 1;
  }

  if (values.help) {
    debug.info(USAGE);
    return 0;
  }

  if (positionals.length > 2) {
    debug.error(`Unexpected argument: ${positionals[2]}`);
    debug.error(USAGE);
    return 1;
  }

  const resolved = resolveConverterOptions({
    inputPath: positionals[0],
    outputPath: positionals[1],
    fiatCode: values.fiat,
    debug: values.debug,
  });
  if (!resolved.success || !resolved.options) {
    debug.error(`Invalid options: ${resolved.error ?? "unknown error"}`);
    return 1;
  }

  const options = resolved.options;
  if (options.debug) {
    debug.setEnabled(true);
  }

  try {
    const result = await convertFile(options.inputPath, options.outputPath, {
      fiatCode: options.fiatCode,
    });
    debug.info(`Converted file saved to: ${options.outputPath}`);
    debug.info(`${result.rowCount} row(s) written`);
    for (const line of formatSummary(result.summary)) {
      debug.info(line);
    }
    return 0;
  } catch (error) {
    debug.error(getErrorMessage(error));
    return 1;
  }
}
