import type { BuildHistoryRecord } from "../types/ledger.js";
import type { Logger } from "../logging/logger.js";
import { BuildHistoryLedger } from "../ledger/build-history.js";
import { FileLedgerStore } from "../ledger/store.js";
import { PlannerError, errorMessage } from "../errors.js";
import { logsUrl } from "../naming/naming.js";
import { BUILD_TAGS, isBuildTag } from "../compiler/plan-compiler.js";
import { loadCommandConfig, type CommandError, type ConfigOptions } from "./context.js";

export type RecordResult =
  | { ok: true; record: BuildHistoryRecord; logsUrl: string }
  | { ok: false; error: CommandError };

/** Ledger keys are `<project>-<tag>`; a free-form tag could collide with another project's key. */
function unknownTag(tag: string): CommandError {
  return { code: "INVALID_ARGS", message: `Unknown build tag "${tag}" (expected ${BUILD_TAGS.join(" or ")})` };
}

export async function recordBuild(
  opts: ConfigOptions & { project: string; buildId: string; tag: string; logger?: Logger },
): Promise<RecordResult> {
  if (!isBuildTag(opts.tag)) return { ok: false, error: unknownTag(opts.tag) };
  const loaded = loadCommandConfig(opts);
  if (!loaded.ok) return loaded;

  const ledger = new BuildHistoryLedger(new FileLedgerStore(loaded.config.ledger_dir, { logger: opts.logger }));
  try {
    const record = await ledger.recordBuild(opts.project, opts.tag, opts.buildId);
    return { ok: true, record, logsUrl: logsUrl(opts.buildId, loaded.config.image_project) };
  } catch (e) {
    const code = e instanceof PlannerError ? e.code : "LEDGER_WRITE_FAILED";
    return { ok: false, error: { code, message: errorMessage(e) } };
  }
}

export type HistoryResult = { ok: true; buildIds: string[] } | { ok: false; error: CommandError };

export async function showHistory(opts: ConfigOptions & { project: string; tag: string }): Promise<HistoryResult> {
  if (!isBuildTag(opts.tag)) return { ok: false, error: unknownTag(opts.tag) };
  const loaded = loadCommandConfig(opts);
  if (!loaded.ok) return loaded;

  const ledger = new BuildHistoryLedger(new FileLedgerStore(loaded.config.ledger_dir));
  try {
    return { ok: true, buildIds: await ledger.history(opts.project, opts.tag) };
  } catch (e) {
    return { ok: false, error: { code: "LEDGER_READ_FAILED", message: errorMessage(e) } };
  }
}
