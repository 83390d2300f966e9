/**
 * @ledger-replay/cli — Command implementation.
 *
 * `ledger-replay <input-file>`: replays a CSV of transactions and
 * prints the resulting accounts as CSV on stdout. Rejected records are
 * logged as warnings on stderr; malformed input aborts with exit code 1.
 *
 * Kept free of process globals so it can run in-process under test.
 */

import chalk from "chalk";
import type { Logger } from "pino";
import type { TransactionRecord } from "@ledger-replay/types";
import {
  ProcessingError,
  TransactionProcessor,
  computeLedgerTotals,
  snapshot,
} from "@ledger-replay/ledger";
import type { AppConfig } from "./config.js";
import { readTransactionFile } from "./csv-source.js";
import { sortByClient, writeAccountsCsv } from "./csv-sink.js";
import { rejectionLogger } from "./logger.js";
import { RecordSourceError } from "./types.js";
import type { TextSink } from "./types.js";

export const USAGE = "Usage: ledger-replay <input-file>";

/**
 * Everything the command touches outside itself.
 */
export interface CliContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly stdout: TextSink;
  readonly stderr: TextSink;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run the command.
 *
 * @param args command-line arguments after the executable and script
 * @returns the process exit code
 */
export function runCli(args: readonly string[], ctx: CliContext): number {
  const inputPath = args[0];
  if (args.length !== 1 || inputPath === undefined) {
    ctx.stderr.write(`${chalk.red(USAGE)}\n`);
    return 1;
  }

  let source: Iterable<TransactionRecord>;
  try {
    source = readTransactionFile(inputPath);
  } catch (err: unknown) {
    ctx.logger.error({ path: inputPath, err }, "Failed to open the input file");
    ctx.stderr.write(
      `${chalk.red(`Failed to open the input file ${inputPath}: ${describeError(err)}`)}\n`,
    );
    return 1;
  }

  const processor = new TransactionProcessor({
    onRejected: rejectionLogger(ctx.logger),
  });

  try {
    processor.run(source);
  } catch (err: unknown) {
    if (err instanceof ProcessingError || err instanceof RecordSourceError) {
      ctx.logger.error({ code: err.code, stats: processor.stats }, err.message);
      ctx.stderr.write(`${chalk.red(`Failed to process input: ${err.message}`)}\n`);
      return 1;
    }
    throw err;
  }

  ctx.logger.info(
    { ...processor.stats, totals: computeLedgerTotals(processor.ledger) },
    "Replay complete",
  );

  const accounts = snapshot(processor.ledger);
  writeAccountsCsv(ctx.config.SORT_OUTPUT ? sortByClient(accounts) : accounts, ctx.stdout);
  return 0;
}
