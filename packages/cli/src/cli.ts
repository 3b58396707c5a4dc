#!/usr/bin/env node

/**
 * subdoc CLI entry point
 */

import { CommanderError, InvalidArgumentError } from "commander";
import { createProgram } from "./program.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      process.exit(err.exitCode);
    }

    const verbose = program.opts<{ verbose?: boolean }>().verbose === true || isVerbose();
    console.error(`Error: ${formatCliError(err, verbose)}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
