import type { PlannerConfig } from "../types/config.js";
import { createAjv, type AjvValidateFn } from "../schema/ajv.js";

const STRING_LIST = { type: "array", items: { type: "string", minLength: 1 } };

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "image_project",
    "base_images_project",
    "projects_dir",
    "ledger_dir",
    "source_repo",
    "logs_bucket",
    "coverage_bucket",
    "platform",
    "build_timeout_seconds",
    "queue_ttl_seconds",
  ],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    image_project: { type: "string", minLength: 1 },
    base_images_project: { type: "string", minLength: 1 },
    projects_dir: { type: "string", minLength: 1 },
    ledger_dir: { type: "string", minLength: 1 },
    targets_dir: { type: "string", minLength: 1 },
    source_repo: { type: "string", minLength: 1 },
    logs_bucket: { type: "string", minLength: 1 },
    coverage_bucket: { type: "string", minLength: 1 },
    platform: { type: "string", minLength: 1 },
    build_timeout_seconds: { type: "integer", minimum: 1 },
    queue_ttl_seconds: { type: "integer", minimum: 1 },
    build_options: { type: "object" },
    signing_account: { type: "string" },
    signing_key: { type: "string" },
    project_defaults: {
      type: "object",
      additionalProperties: false,
      properties: {
        disabled: { type: "boolean" },
        architectures: STRING_LIST,
        sanitizers: STRING_LIST,
        fuzzing_engines: STRING_LIST,
        run_tests: { type: "boolean" },
        coverage_extra_args: { type: "string" },
        labels: { type: "object", additionalProperties: { type: "string" } },
        workdir: { type: "string", minLength: 1 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; errors: null; config: PlannerConfig }
  | { valid: false; errors: string };

let compiled: { validate: AjvValidateFn<PlannerConfig>; errorsText: (errors: unknown) => string } | null = null;

function validator() {
  if (!compiled) {
    const ajv = createAjv();
    compiled = { validate: ajv.compile<PlannerConfig>(CONFIG_SCHEMA), errorsText: (e) => ajv.errorsText(e) };
  }
  return compiled;
}

/** Validate a merged config against the planner config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { validate, errorsText } = validator();
  if (validate(config)) return { valid: true, errors: null, config };
  return { valid: false, errors: errorsText(validate.errors) };
}
