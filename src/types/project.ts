/** Project descriptor and its resolved form. */

/** Raw `project.yaml` as parsed, before defaults. */
export type ProjectDescriptor = {
  language?: string;
  disabled?: boolean;
  architectures?: string[];
  sanitizers?: Array<string | Record<string, unknown>>;
  fuzzing_engines?: string[];
  coverage_extra_args?: string;
  labels?: Record<string, string>;
  run_tests?: boolean;
  [key: string]: unknown;
};

export type SanitizerEntry =
  | { kind: "name"; name: string }
  | { kind: "options"; name: string; options: Record<string, unknown> };

export type ProjectConfig = {
  name: string;
  language: string;
  disabled: boolean;
  sanitizers: SanitizerEntry[];
  fuzzingEngines: string[];
  architectures: string[];
  runTests: boolean;
  coverageExtraArgs: string;
  labels: Record<string, string>;
  /** Working directory from the Dockerfile, `$` already doubled. */
  workdir: string;
  /** Project image, e.g. `gcr.io/oss-fuzz/libxml2`. */
  image: string;
};

export type BuildVariant = {
  project: string;
  engine: string;
  sanitizer: string;
  architecture: string;
};
