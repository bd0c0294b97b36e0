import fs from "node:fs";
import { minimatch } from "minimatch";

const GLOB_CHARS = /[*?[\]{}!]/;

export function listProjects(projectsDir: string): string[] {
  if (!fs.existsSync(projectsDir)) return [];
  return fs
    .readdirSync(projectsDir, { withFileTypes: true })
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();
}

/**
 * Expand project arguments. Glob patterns match directories under
 * `projectsDir`; plain names pass through even when missing so the
 * compiler can report them. Order follows the arguments, without repeats.
 */
export function selectProjects(projectsDir: string, patterns: readonly string[], exclude: readonly string[] = []): string[] {
  const available = listProjects(projectsDir);
  const selected: string[] = [];
  const add = (name: string) => {
    if (!selected.includes(name)) selected.push(name);
  };

  for (const pattern of patterns) {
    if (GLOB_CHARS.test(pattern)) {
      for (const name of available) if (minimatch(name, pattern)) add(name);
    } else {
      add(pattern);
    }
  }

  return selected.filter((name) => !exclude.some((x) => minimatch(name, x)));
}
