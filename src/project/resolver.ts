import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ProjectDefaults } from "../types/config.js";
import type { ProjectConfig, ProjectDescriptor } from "../types/project.js";
import { ConfigNotFoundError, DescriptorInvalidError, errorMessage } from "../errors.js";
import { resolveProjectDefaults } from "./defaults.js";
import { workdirFromDockerfile } from "./dockerfile.js";
import { parseSanitizers } from "./sanitizers.js";

/** Returns null when the descriptor is valid, otherwise an error summary. */
export type DescriptorValidator = (descriptor: unknown) => string | null;

export type ResolverOptions = {
  projectsDir: string;
  imageProject: string;
  defaults?: ProjectDefaults;
  validate?: DescriptorValidator;
};

export function projectDir(projectsDir: string, name: string): string {
  return path.join(projectsDir, name);
}

export function projectImage(imageProject: string, name: string): string {
  return `gcr.io/${imageProject}/${name}`;
}

function isDescriptor(value: unknown): value is ProjectDescriptor {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readRequired(project: string, filePath: string): string {
  if (!fs.existsSync(filePath)) throw new ConfigNotFoundError(project, filePath);
  return fs.readFileSync(filePath, "utf8");
}

/** Parse project.yaml. An empty file is an empty descriptor. */
export function loadDescriptor(project: string, filePath: string): ProjectDescriptor {
  const raw = readRequired(project, filePath);
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new DescriptorInvalidError(project, errorMessage(e));
  }
  if (doc === null || doc === undefined) return {};
  if (!isDescriptor(doc)) throw new DescriptorInvalidError(project, "top level must be a mapping");
  return doc;
}

function stringList(project: string, key: string, value: unknown, fallback: string[]): string[] {
  if (value === undefined) return [...fallback];
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new DescriptorInvalidError(project, `${key} must be a list of strings`);
  }
  return [...value];
}

function bool(project: string, key: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new DescriptorInvalidError(project, `${key} must be a boolean`);
  return value;
}

function str(project: string, key: string, value: unknown, fallback: string): string {
  if (value === undefined) return fallback;
  if (typeof value !== "string") throw new DescriptorInvalidError(project, `${key} must be a string`);
  return value;
}

function labels(project: string, value: unknown, fallback: Record<string, string>): Record<string, string> {
  if (value === undefined) return { ...fallback };
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new DescriptorInvalidError(project, "labels must be a mapping");
  }
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== "string") throw new DescriptorInvalidError(project, `labels.${k} must be a string`);
    out[k] = v;
  }
  return out;
}

/**
 * Load `<projectsDir>/<name>/project.yaml` and its Dockerfile into a fully
 * defaulted ProjectConfig.
 *
 * @throws ConfigNotFoundError when either file is missing
 * @throws DescriptorInvalidError when the descriptor fails validation
 */
export function resolveProject(name: string, opts: ResolverOptions): ProjectConfig {
  const dir = projectDir(opts.projectsDir, name);
  const defaults = opts.defaults ?? resolveProjectDefaults();

  const dockerfile = readRequired(name, path.join(dir, "Dockerfile"));
  const descriptor = loadDescriptor(name, path.join(dir, "project.yaml"));

  if (opts.validate) {
    const errors = opts.validate(descriptor);
    if (errors) throw new DescriptorInvalidError(name, errors);
  }

  const language = descriptor.language;
  if (typeof language !== "string" || language.length === 0) {
    throw new DescriptorInvalidError(name, "language is required");
  }

  const rawSanitizers: unknown = descriptor.sanitizers;
  let sanitizers = parseSanitizers(defaults.sanitizers);
  if (rawSanitizers !== undefined) {
    if (!Array.isArray(rawSanitizers)) throw new DescriptorInvalidError(name, "sanitizers must be a list");
    sanitizers = parseSanitizers(rawSanitizers);
  }

  return {
    name,
    language,
    disabled: bool(name, "disabled", descriptor.disabled, defaults.disabled),
    sanitizers,
    fuzzingEngines: stringList(name, "fuzzing_engines", descriptor.fuzzing_engines, defaults.fuzzing_engines),
    architectures: stringList(name, "architectures", descriptor.architectures, defaults.architectures),
    runTests: bool(name, "run_tests", descriptor.run_tests, defaults.run_tests),
    coverageExtraArgs: str(name, "coverage_extra_args", descriptor.coverage_extra_args, defaults.coverage_extra_args),
    labels: labels(name, descriptor.labels, defaults.labels),
    workdir: workdirFromDockerfile(dockerfile.split(/\r?\n/)) ?? defaults.workdir,
    image: projectImage(opts.imageProject, name),
  };
}
