/**
 * Tests for the CSV record source.
 *
 * Covers:
 * - Header handling (spacing, column order, missing columns)
 * - Field trimming and flexible row length
 * - Quoted fields and exponent amounts
 * - Zod validation errors with line numbers
 * - Lazy evaluation
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { readTransactionFile, readTransactionRecords } from "../src/csv-source.js";
import { RecordSourceError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

// ─── readTransactionRecords ──────────────────────────────────────────────

describe("readTransactionRecords", () => {
  it("parses a spaced header and trims every field", () => {
    const text = [
      "type, client, tx, amount",
      "deposit, 1, 1, 1.0000001",
      "  withdrawal ,2,  6 , 3.0  ",
    ].join("\n");

    expect([...readTransactionRecords(text)]).toEqual([
      { kind: "deposit", client: 1, tx: 1, amount: "1.0000001" },
      { kind: "withdrawal", client: 2, tx: 6, amount: "3.0" },
    ]);
  });

  it("accepts rows shorter than the header", () => {
    const text = "type,client,tx,amount\ndispute,1,1\nresolve, 1, 1,\n";

    expect([...readTransactionRecords(text)]).toEqual([
      { kind: "dispute", client: 1, tx: 1 },
      { kind: "resolve", client: 1, tx: 1 },
    ]);
  });

  it("accepts a header without an amount column", () => {
    const text = "type,client,tx\nchargeback,3,9\n";

    expect([...readTransactionRecords(text)]).toEqual([
      { kind: "chargeback", client: 3, tx: 9 },
    ]);
  });

  it("follows the header's column order", () => {
    const text = "tx,amount,client,type\n5,2.5,7,deposit\n";

    expect([...readTransactionRecords(text)]).toEqual([
      { kind: "deposit", client: 7, tx: 5, amount: "2.5" },
    ]);
  });

  it("skips blank lines and handles CRLF and a byte-order mark", () => {
    const text = "\uFEFFtype,client,tx,amount\r\n\r\ndeposit,1,1,1\r\n   \r\n";

    expect([...readTransactionRecords(text)]).toEqual([
      { kind: "deposit", client: 1, tx: 1, amount: "1" },
    ]);
  });

  it("unwraps quoted fields", () => {
    const text = '"type","client","tx","amount"\n"deposit","1","1","1.5"\n "withdrawal" , "2" ,"3", " 0.5 "\n';

    expect([...readTransactionRecords(text)]).toEqual([
      { kind: "deposit", client: 1, tx: 1, amount: "1.5" },
      { kind: "withdrawal", client: 2, tx: 3, amount: "0.5" },
    ]);
  });

  it("keeps commas and doubled quotes inside a quoted field", () => {
    const text = 'type,client,tx,amount\n"dep,""x""",1,1,1\n';

    expect([...readTransactionRecords(text)]).toEqual([
      { kind: 'dep,"x"', client: 1, tx: 1, amount: "1" },
    ]);
  });

  it("rejects an unterminated quoted field", () => {
    const err = thrownBy(() => [...readTransactionRecords('type,client,tx,amount\ndeposit,1,1,"1.5\n')]);

    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) {
      expect(err.code).toBe("MALFORMED_RECORD");
      expect(err.line).toBe(2);
      expect(err.message).toBe("Unterminated quoted field on line 2");
    }
  });

  it("accepts an amount in exponent form", () => {
    expect([...readTransactionRecords("type,client,tx,amount\ndeposit,1,1,1e2\n")]).toEqual([
      { kind: "deposit", client: 1, tx: 1, amount: "1e2" },
    ]);
  });

  it("yields nothing for empty input", () => {
    expect([...readTransactionRecords("")]).toEqual([]);
    expect([...readTransactionRecords("type,client,tx,amount\n")]).toEqual([]);
  });

  it("passes unknown kinds through", () => {
    expect([...readTransactionRecords("type,client,tx,amount\nrefund,1,1,1\n")]).toEqual([
      { kind: "refund", client: 1, tx: 1, amount: "1" },
    ]);
  });

  it("accepts the largest client and transaction ids", () => {
    expect([...readTransactionRecords("type,client,tx\ndispute,65535,4294967295\n")]).toEqual([
      { kind: "dispute", client: 65535, tx: 4294967295 },
    ]);
  });

  it("rejects a header missing required columns", () => {
    const err = thrownBy(() => [...readTransactionRecords("kind,client,amount\ndeposit,1,1\n")]);

    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) {
      expect(err.code).toBe("MISSING_HEADER");
      expect(err.line).toBe(1);
      expect(err.message).toBe("Header on line 1 is missing column(s): type, tx");
    }
  });

  it("rejects a non-numeric client with its line number", () => {
    const text = "type,client,tx,amount\ndeposit,1,1,1\ndeposit,abc,2,1\n";
    const err = thrownBy(() => [...readTransactionRecords(text)]);

    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) {
      expect(err.code).toBe("MALFORMED_RECORD");
      expect(err.line).toBe(3);
      expect(err.message).toBe("Malformed record on line 3: client: must be an unsigned integer");
    }
  });

  it("rejects an out-of-range client", () => {
    const err = thrownBy(() => [...readTransactionRecords("type,client,tx\ndispute,65536,1\n")]);

    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) {
      expect(err.message).toBe("Malformed record on line 2: client: must be at most 65535");
    }
  });

  it("rejects a negative transaction id", () => {
    const err = thrownBy(() => [...readTransactionRecords("type,client,tx\ndispute,1,-4\n")]);

    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) {
      expect(err.message).toBe("Malformed record on line 2: tx: must be an unsigned integer");
    }
  });

  it("rejects a malformed amount", () => {
    const err = thrownBy(() => [...readTransactionRecords("type,client,tx,amount\ndeposit,1,1,1.2.3\n")]);

    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) {
      expect(err.message).toBe("Malformed record on line 2: amount: must be a decimal number");
    }
  });

  it("rejects an empty type", () => {
    const err = thrownBy(() => [...readTransactionRecords("type,client,tx\n,1,1\n")]);

    expect(err).toBeInstanceOf(RecordSourceError);
    if (err instanceof RecordSourceError) {
      expect(err.message).toBe("Malformed record on line 2: type: must not be empty");
    }
  });

  it("yields records before a malformed row", () => {
    const records = readTransactionRecords("type,client,tx,amount\ndeposit,1,1,1\ndeposit,x,2,1\n");

    expect(records.next().value).toEqual({ kind: "deposit", client: 1, tx: 1, amount: "1" });
    expect(() => records.next()).toThrow(RecordSourceError);
  });
});

// ─── readTransactionFile ─────────────────────────────────────────────────

describe("readTransactionFile", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `ledger-replay-source-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("reads records from a file", () => {
    const path = join(testDir, "tx.csv");
    writeFileSync(path, "type,client,tx,amount\ndeposit,1,1,1.5\n");

    expect([...readTransactionFile(path)]).toEqual([
      { kind: "deposit", client: 1, tx: 1, amount: "1.5" },
    ]);
  });

  it("throws immediately when the file is missing", () => {
    const err = thrownBy(() => readTransactionFile(join(testDir, "missing.csv")));

    expect(err).toBeInstanceOf(Error);
    expect(err).toHaveProperty("code", "ENOENT");
  });
});
