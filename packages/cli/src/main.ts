#!/usr/bin/env node
/**
 * @ledger-replay/cli — Entry point.
 *
 * Loads config, builds the logger and runs the command against the
 * real process streams.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runCli } from "./cli.js";

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config);

  process.exitCode = runCli(process.argv.slice(2), {
    config,
    logger,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
