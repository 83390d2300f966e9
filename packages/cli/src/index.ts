/**
 * @ledger-replay/cli — CSV front end for the replay engine.
 *
 * Public API for embedding the command or its CSV source and sink.
 * The executable lives in main.ts.
 */

export { runCli, USAGE } from "./cli.js";
export type { CliContext } from "./cli.js";

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger, logRejection, rejectionLogger } from "./logger.js";

export {
  readTransactionRecords,
  readTransactionFile,
  TransactionRowSchema,
} from "./csv-source.js";
export {
  OUTPUT_HEADER,
  formatAccountRow,
  formatAccountsCsv,
  writeAccountsCsv,
  sortByClient,
} from "./csv-sink.js";

export { RecordSourceError } from "./types.js";
export type { RecordSourceErrorCode, TextSink } from "./types.js";
