/** Build step and plan shapes handed to the external runner. */

export type Volume = {
  name: string;
  path: string;
};

export type Step = {
  /** Image the step runs in. */
  name: string;
  env: string[];
  args: string[];
  entrypoint?: string;
  dir?: string;
  volumes?: Volume[];
  id?: string;
  waitFor?: string[];
};

export type BuildTag = "fuzzing" | "coverage";

export type SkipCode =
  | "CONFIG_NOT_FOUND"
  | "DESCRIPTOR_INVALID"
  | "DISABLED_PROJECT"
  | "UNSUPPORTED_LANGUAGE"
  | "CORPUS_UNAVAILABLE";

export type SkipNotice = {
  code: SkipCode;
  message: string;
};

export type Plan = {
  project: string;
  tag: BuildTag;
  steps: Step[];
  skipped?: SkipNotice;
};

/** Body submitted to the build runner. */
export type BuildRequest = {
  steps: Step[];
  timeout: string;
  options: Record<string, unknown>;
  logsBucket: string;
  tags: string[];
  queueTtl: string;
};

/** Pointer document consumed by report viewers. */
export type LatestReportInfo = {
  fuzzer_stats_dir: string;
  html_report_url: string;
  report_date: string;
  report_summary_path: string;
};
