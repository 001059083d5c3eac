#!/usr/bin/env node
import { runCli } from "./cli";
import { debug } from "./lib/debug-logger";
import { getErrorMessage } from "./lib/shared-utils";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    debug.error(getErrorMessage(error));
    process.exitCode = 1;
  }
);
