/** Ledger key for a (project, tag) pair. */
export function ledgerKey(project: string, tag: string): string {
  return `${project}-${tag}`;
}

/** Keys become file names, so they may not walk out of the ledger directory. */
export function sanitizeKey(key: string): string {
  if (!key || key.trim().length === 0) {
    throw new Error("Ledger key cannot be empty");
  }
  if (key.includes("..") || key.includes("/") || key.includes("\\") || key.includes("\0")) {
    throw new Error(`Invalid ledger key: ${key}`);
  }
  return key.trim();
}
