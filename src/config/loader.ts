import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { PlannerConfig } from "../types/config.js";
import { PlannerError } from "../errors.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "FUZZPLAN_";

/** Keys whose environment values are YAML (numbers, mappings); the rest stay raw strings. */
const STRUCTURED_KEYS = new Set(["build_timeout_seconds", "queue_ttl_seconds", "build_options", "project_defaults"]);

const KNOWN_KEYS = new Set([
  "schema_version",
  "image_project",
  "base_images_project",
  "projects_dir",
  "ledger_dir",
  "targets_dir",
  "source_repo",
  "logs_bucket",
  "coverage_bucket",
  "platform",
  "signing_account",
  "signing_key",
  ...STRUCTURED_KEYS,
]);

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two records. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const prev = result[key];
      result[key] = deepMerge(isRecord(prev) ? prev : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Parsed YAML mapping, or an empty record when the file does not exist. */
function loadYaml(filePath: string): ConfigRecord {
  if (!fs.existsSync(filePath)) return {};
  const doc: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new PlannerError("CONFIG_INVALID", `Config file must contain a mapping: ${filePath}`, { path: filePath });
  }
  return doc;
}

/** FUZZPLAN_LOGS_BUCKET → logs_bucket. Unknown keys are ignored. */
export function envOverrides(env: NodeJS.ProcessEnv): ConfigRecord {
  const out: ConfigRecord = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!KNOWN_KEYS.has(configKey)) continue;
    out[configKey] = STRUCTURED_KEYS.has(configKey) ? YAML.parse(value) : value;
  }
  return out;
}

/**
 * Load layered config: base.yaml ← <envName>.yaml ← FUZZPLAN_* variables.
 *
 * @throws PlannerError CONFIG_INVALID when the merged result fails the schema
 */
export function loadConfig(
  opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {},
): PlannerConfig {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  merged = deepMerge(merged, envOverrides(opts.env ?? process.env));

  const result = validateConfig(merged);
  if (!result.valid) {
    throw new PlannerError("CONFIG_INVALID", `Invalid planner config: ${result.errors}`, { configDir: dir });
  }
  return result.config;
}
