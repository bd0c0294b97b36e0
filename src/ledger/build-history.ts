import type { BuildHistoryRecord } from "../types/ledger.js";
import type { BuildTag } from "../types/step.js";
import type { LedgerStore } from "./store.js";
import { ledgerKey } from "./keys.js";

export const BUILD_HISTORY_CAPACITY = 64;

/** Append `buildId`, evicting from the front once the list exceeds `capacity`. */
export function appendBuildId(
  prev: BuildHistoryRecord | null,
  project: string,
  tag: string,
  buildId: string,
  capacity: number = BUILD_HISTORY_CAPACITY,
): BuildHistoryRecord {
  const ids = prev ? [...prev.buildIds, buildId] : [buildId];
  return {
    key: ledgerKey(project, tag),
    buildTag: tag,
    project,
    buildIds: ids.length > capacity ? ids.slice(ids.length - capacity) : ids,
  };
}

/** Bounded history of build ids per (project, tag). */
export class BuildHistoryLedger {
  constructor(
    private readonly store: LedgerStore,
    private readonly capacity: number = BUILD_HISTORY_CAPACITY,
  ) {}

  /** @throws LedgerRaceConditionError when the store cannot serialize the write */
  async recordBuild(project: string, tag: BuildTag, buildId: string): Promise<BuildHistoryRecord> {
    return this.store.transact(ledgerKey(project, tag), (prev) =>
      appendBuildId(prev, project, tag, buildId, this.capacity),
    );
  }

  async history(project: string, tag: BuildTag): Promise<string[]> {
    const record = await this.store.get(ledgerKey(project, tag));
    return record ? [...record.buildIds] : [];
  }
}
