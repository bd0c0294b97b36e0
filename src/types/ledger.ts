/** Persisted build history, one record per (project, tag). */
export type BuildHistoryRecord = {
  key: string;
  buildTag: string;
  project: string;
  /** Oldest first, never more than the ledger capacity. */
  buildIds: string[];
};
