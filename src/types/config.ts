/** Planner configuration, layered from config/*.yaml and FUZZPLAN_* variables. */

export type ProjectDefaults = {
  disabled: boolean;
  architectures: string[];
  sanitizers: string[];
  fuzzing_engines: string[];
  run_tests: boolean;
  coverage_extra_args: string;
  labels: Record<string, string>;
  workdir: string;
};

export type PlannerConfig = {
  schema_version: string;
  image_project: string;
  base_images_project: string;
  projects_dir: string;
  ledger_dir: string;
  targets_dir?: string;
  source_repo: string;
  logs_bucket: string;
  coverage_bucket: string;
  platform: string;
  build_timeout_seconds: number;
  queue_ttl_seconds: number;
  build_options?: Record<string, unknown>;
  signing_key?: string;
  signing_account?: string;
  project_defaults?: Partial<ProjectDefaults>;
};
