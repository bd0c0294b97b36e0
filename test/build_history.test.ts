import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { BUILD_HISTORY_CAPACITY, BuildHistoryLedger, appendBuildId } from "../src/ledger/build-history.js";
import { FileLedgerStore } from "../src/ledger/store.js";
import { acquireFsLock } from "../src/ledger/fs-lock.js";
import { sanitizeKey } from "../src/ledger/keys.js";
import { LedgerRaceConditionError } from "../src/errors.js";
import { createRegistry } from "../src/schema/registry.js";

describe("appendBuildId", () => {
  it("creates a single-element record", () => {
    expect(appendBuildId(null, "libxml2", "fuzzing", "b1")).toEqual({
      key: "libxml2-fuzzing",
      buildTag: "fuzzing",
      project: "libxml2",
      buildIds: ["b1"],
    });
  });

  it("evicts from the front past capacity", () => {
    let record = appendBuildId(null, "p", "t", "1", 3);
    for (const id of ["2", "3", "4", "5"]) record = appendBuildId(record, "p", "t", id, 3);
    expect(record.buildIds).toEqual(["3", "4", "5"]);
  });
});

describe("BuildHistoryLedger", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fuzzplan-ledger-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("keeps the last 64 of 70 ids in order", async () => {
    const ledger = new BuildHistoryLedger(new FileLedgerStore(tmpDir));
    for (let i = 0; i < 70; i++) await ledger.recordBuild("libxml2", "fuzzing", `build-${i}`);

    const ids = await ledger.history("libxml2", "fuzzing");
    expect(BUILD_HISTORY_CAPACITY).toBe(64);
    expect(ids).toHaveLength(64);
    expect(ids[0]).toBe("build-6");
    expect(ids[63]).toBe("build-69");
  });

  it("persists one JSON document per key", async () => {
    const store = new FileLedgerStore(tmpDir);
    const ledger = new BuildHistoryLedger(store);
    await ledger.recordBuild("libxml2", "coverage", "b1");

    const file = path.join(tmpDir, "libxml2-coverage.json");
    const doc: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    expect(doc).toEqual({ key: "libxml2-coverage", buildTag: "coverage", project: "libxml2", buildIds: ["b1"] });
    expect(createRegistry().validate("build-history", doc).valid).toBe(true);
    expect(fs.existsSync(`${file}.lock`)).toBe(false);
    expect(await ledger.history("libxml2", "fuzzing")).toEqual([]);
  });

  it("loses no ids under concurrent recorders", async () => {
    const ledgers = [0, 1, 2, 3].map(() => new BuildHistoryLedger(new FileLedgerStore(tmpDir)));
    const ids = Array.from({ length: 20 }, (_, i) => `build-${i}`);
    await Promise.all(ids.map((id, i) => ledgers[i % ledgers.length].recordBuild("libxml2", "fuzzing", id)));

    const stored = await ledgers[0].history("libxml2", "fuzzing");
    expect([...stored].sort()).toEqual([...ids].sort());
  });

  it("rejects corrupt records", async () => {
    fs.writeFileSync(path.join(tmpDir, "libxml2-fuzzing.json"), '{"key": 1}\n');
    const ledger = new BuildHistoryLedger(new FileLedgerStore(tmpDir));
    await expect(ledger.history("libxml2", "fuzzing")).rejects.toThrow("Corrupt build history record");
  });

  it("surfaces a held lock as a race condition", async () => {
    const store = new FileLedgerStore(tmpDir, { lockTimeoutMs: 50 });
    const release = await acquireFsLock(path.join(tmpDir, "libxml2-fuzzing.json.lock"));
    try {
      await expect(new BuildHistoryLedger(store).recordBuild("libxml2", "fuzzing", "b1")).rejects.toThrow(
        LedgerRaceConditionError,
      );
    } finally {
      await release();
    }
  });
});

describe("sanitizeKey", () => {
  it("rejects keys that leave the ledger directory", () => {
    expect(() => sanitizeKey("../etc")).toThrow("Invalid ledger key");
    expect(() => sanitizeKey("a/b")).toThrow("Invalid ledger key");
    expect(() => sanitizeKey(" ")).toThrow("Ledger key cannot be empty");
    expect(sanitizeKey("libxml2-fuzzing")).toBe("libxml2-fuzzing");
  });
});
