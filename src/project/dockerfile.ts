const WORKDIR_RE = /^\s*WORKDIR\s*(\S+)/;

/**
 * First `WORKDIR` in a Dockerfile, or null. `$` is doubled because the value
 * ends up inside a runner template where `$` starts a substitution.
 */
export function workdirFromDockerfile(lines: readonly string[]): string | null {
  for (const line of lines) {
    const m = WORKDIR_RE.exec(line);
    if (m) return m[1].replace(/\$/g, "$$$$");
  }
  return null;
}
