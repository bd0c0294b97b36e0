import type { ProjectConfig, SanitizerEntry } from "../types/project.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize descriptor sanitizer entries. A bare string is a name; a mapping
 * contributes one entry per key, keeping the nested options.
 */
export function parseSanitizers(raw: ReadonlyArray<unknown>): SanitizerEntry[] {
  const entries: SanitizerEntry[] = [];
  for (const item of raw) {
    if (typeof item === "string") {
      entries.push({ kind: "name", name: item });
      continue;
    }
    if (!isPlainObject(item)) continue;
    for (const [name, value] of Object.entries(item)) {
      entries.push({ kind: "options", name, options: isPlainObject(value) ? value : {} });
    }
  }
  return entries;
}

/** Sanitizer names in descriptor order. Duplicates are kept. */
export function sanitizerNames(project: Pick<ProjectConfig, "sanitizers">): string[] {
  return project.sanitizers.map((s) => s.name);
}

export function sanitizerOptions(project: Pick<ProjectConfig, "sanitizers">, name: string): Record<string, unknown> {
  const entry = project.sanitizers.find((s) => s.name === name);
  return entry?.kind === "options" ? entry.options : {};
}
