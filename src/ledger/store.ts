import fs from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import type { BuildHistoryRecord } from "../types/ledger.js";
import type { Logger } from "../logging/logger.js";
import { acquireFsLock, atomicWriteJson } from "./fs-lock.js";
import { sanitizeKey } from "./keys.js";

function isBuildHistoryRecord(value: unknown): value is BuildHistoryRecord {
  if (typeof value !== "object" || value === null) return false;
  const r: Record<string, unknown> = { ...value };
  return (
    typeof r.key === "string" &&
    typeof r.buildTag === "string" &&
    typeof r.project === "string" &&
    Array.isArray(r.buildIds) &&
    r.buildIds.every((id) => typeof id === "string")
  );
}

/**
 * Backing store for build history. `transact` must apply `fn` as one
 * read-modify-write: no other writer may interleave for the same key.
 */
export interface LedgerStore {
  get(key: string): Promise<BuildHistoryRecord | null>;
  transact(key: string, fn: (prev: BuildHistoryRecord | null) => BuildHistoryRecord): Promise<BuildHistoryRecord>;
}

/** One JSON document per key under `dir`, guarded by `<key>.json.lock`. */
export class FileLedgerStore implements LedgerStore {
  constructor(
    private readonly dir: string,
    private readonly opts: { lockTimeoutMs?: number; logger?: Logger } = {},
  ) {}

  recordPath(key: string): string {
    return path.join(this.dir, `${sanitizeKey(key)}.json`);
  }

  async get(key: string): Promise<BuildHistoryRecord | null> {
    const file = this.recordPath(key);
    if (!fs.existsSync(file)) return null;
    const data: unknown = JSON.parse(await readFile(file, "utf8"));
    if (!isBuildHistoryRecord(data)) throw new Error(`Corrupt build history record: ${file}`);
    return data;
  }

  async transact(
    key: string,
    fn: (prev: BuildHistoryRecord | null) => BuildHistoryRecord,
  ): Promise<BuildHistoryRecord> {
    const file = this.recordPath(key);
    const release = await acquireFsLock(`${file}.lock`, {
      timeoutMs: this.opts.lockTimeoutMs,
      logger: this.opts.logger,
    });
    try {
      const next = fn(await this.get(key));
      await atomicWriteJson(file, next);
      return next;
    } finally {
      await release();
    }
  }
}
