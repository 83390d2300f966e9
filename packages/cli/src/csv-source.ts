/**
 * @ledger-replay/cli — CSV record source.
 *
 * Reads transaction records from comma-separated text with a header
 * row (`type, client, tx, amount`).
 *
 * Format rules:
 * - Every field is trimmed; blank lines are skipped
 * - Rows may be shorter than the header (a dispute has no amount)
 * - A field may be wrapped in double quotes, with `""` for a literal
 *   quote; a quoted field does not span lines
 * - The transaction kind is passed through as read
 *
 * Rows are validated with Zod and yielded one at a time, so a
 * malformed row surfaces only when the processor reaches it.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ZodError } from "zod";
import type { TransactionRecord } from "@ledger-replay/types";
import { MAX_CLIENT_ID, MAX_TX_ID, isClientId, isTxId } from "@ledger-replay/types";
import { isValidAmount } from "@ledger-replay/ledger";
import { RecordSourceError } from "./types.js";

// =============================================================================
// Row Schema
// =============================================================================

function unsignedInt<T extends number>(isId: (value: unknown) => value is T, max: number) {
  return z
    .string()
    .regex(/^\d+$/, "must be an unsigned integer")
    .transform((v) => Number(v))
    .pipe(z.custom<T>(isId, { message: `must be at most ${String(max)}` }));
}

export const TransactionRowSchema = z.object({
  type: z.string().min(1, "must not be empty"),
  client: unsignedInt(isClientId, MAX_CLIENT_ID),
  tx: unsignedInt(isTxId, MAX_TX_ID),
  amount: z
    .string()
    .optional()
    .transform((v) => (v === "" ? undefined : v))
    .refine((v) => v === undefined || isValidAmount(v), "must be a decimal number"),
});

const REQUIRED_COLUMNS = ["type", "client", "tx"] as const;

interface ColumnIndex {
  readonly type: number;
  readonly client: number;
  readonly tx: number;
  readonly amount: number | undefined;
}

// =============================================================================
// Helpers
// =============================================================================

function splitFields(line: string, lineNumber: number): string[] {
  const fields: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quoted) {
      if (ch !== '"') {
        field += ch;
      } else if (line.charAt(i + 1) === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      fields.push(field.trim());
      field = "";
    } else {
      field += ch;
    }
  }

  if (quoted) {
    throw new RecordSourceError(
      "MALFORMED_RECORD",
      `Unterminated quoted field on line ${String(lineNumber)}`,
      lineNumber,
    );
  }
  fields.push(field.trim());
  return fields;
}

function indexColumns(header: readonly string[], line: number): ColumnIndex {
  const missing = REQUIRED_COLUMNS.filter((name) => !header.includes(name));
  if (missing.length > 0) {
    throw new RecordSourceError(
      "MISSING_HEADER",
      `Header on line ${String(line)} is missing column(s): ${missing.join(", ")}`,
      line,
    );
  }

  const amount = header.indexOf("amount");
  return {
    type: header.indexOf("type"),
    client: header.indexOf("client"),
    tx: header.indexOf("tx"),
    amount: amount === -1 ? undefined : amount,
  };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

function parseRow(
  fields: readonly string[],
  columns: ColumnIndex,
  line: number,
): TransactionRecord {
  const result = TransactionRowSchema.safeParse({
    type: fields[columns.type],
    client: fields[columns.client],
    tx: fields[columns.tx],
    amount: columns.amount === undefined ? undefined : fields[columns.amount],
  });

  if (!result.success) {
    throw new RecordSourceError(
      "MALFORMED_RECORD",
      `Malformed record on line ${String(line)}: ${formatIssues(result.error)}`,
      line,
    );
  }

  const { type, client, tx, amount } = result.data;
  return amount === undefined
    ? { kind: type, client, tx }
    : { kind: type, client, tx, amount };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Lazily parse CSV text into transaction records.
 *
 * Empty input yields nothing.
 *
 * @throws {RecordSourceError} when the header or a row is malformed
 */
export function* readTransactionRecords(
  text: string,
): Generator<TransactionRecord, void, undefined> {
  let columns: ColumnIndex | undefined;
  let lineNumber = 0;

  // A leading byte-order mark would otherwise end up in the first column name
  const body = text.startsWith("\uFEFF") ? text.slice(1) : text;

  for (const rawLine of body.split("\n")) {
    lineNumber++;
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.trim() === "") continue;

    const fields = splitFields(line, lineNumber);

    if (columns === undefined) {
      columns = indexColumns(fields, lineNumber);
      continue;
    }

    yield parseRow(fields, columns, lineNumber);
  }
}

/**
 * Read a CSV file and return a lazy record source over it.
 *
 * The file is read eagerly so that open errors surface here, before
 * any record is processed.
 *
 * @throws the fs error if the file cannot be read
 */
export function readTransactionFile(path: string): Iterable<TransactionRecord> {
  const text = readFileSync(path, "utf8");
  return readTransactionRecords(text);
}
