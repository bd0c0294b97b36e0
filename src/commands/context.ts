import path from "node:path";
import type { PlannerConfig } from "../types/config.js";
import { loadConfig } from "../config/loader.js";
import { errorMessage } from "../errors.js";

export type CommandError = { code: string; message: string };

export type ConfigOptions = {
  configDir?: string;
  envName?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/** Load planner config with every directory resolved against `cwd`. */
export function loadCommandConfig(
  opts: ConfigOptions,
): { ok: true; config: PlannerConfig } | { ok: false; error: CommandError } {
  const cwd = opts.cwd ?? process.cwd();
  try {
    const config = loadConfig({
      envName: opts.envName,
      configDir: opts.configDir ? path.resolve(cwd, opts.configDir) : undefined,
      env: opts.env,
    });
    return {
      ok: true,
      config: {
        ...config,
        projects_dir: path.resolve(cwd, config.projects_dir),
        ledger_dir: path.resolve(cwd, config.ledger_dir),
        ...(config.targets_dir ? { targets_dir: path.resolve(cwd, config.targets_dir) } : {}),
      },
    };
  } catch (e) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: errorMessage(e) } };
  }
}

/** `--now` value, or the current time. */
export function parseNow(value: string | undefined): Date | null {
  if (value === undefined) return new Date();
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}
