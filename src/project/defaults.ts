import type { ProjectDefaults } from "../types/config.js";

export const DEFAULT_PROJECT_DEFAULTS: Readonly<ProjectDefaults> = Object.freeze({
  disabled: false,
  architectures: ["x86_64"],
  sanitizers: ["address", "undefined"],
  fuzzing_engines: ["libfuzzer", "afl", "honggfuzz"],
  run_tests: true,
  coverage_extra_args: "",
  labels: {},
  workdir: "/src",
});

/** Overlay configured defaults on the built-in ones. Arrays are replaced. */
export function resolveProjectDefaults(overrides?: Partial<ProjectDefaults>): ProjectDefaults {
  const base = DEFAULT_PROJECT_DEFAULTS;
  return {
    disabled: overrides?.disabled ?? base.disabled,
    architectures: [...(overrides?.architectures ?? base.architectures)],
    sanitizers: [...(overrides?.sanitizers ?? base.sanitizers)],
    fuzzing_engines: [...(overrides?.fuzzing_engines ?? base.fuzzing_engines)],
    run_tests: overrides?.run_tests ?? base.run_tests,
    coverage_extra_args: overrides?.coverage_extra_args ?? base.coverage_extra_args,
    labels: { ...(overrides?.labels ?? base.labels) },
    workdir: overrides?.workdir ?? base.workdir,
  };
}
