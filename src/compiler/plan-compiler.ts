import type { PlannerConfig } from "../types/config.js";
import type { ProjectConfig } from "../types/project.js";
import type { BuildRequest, BuildTag, Plan, SkipNotice } from "../types/step.js";
import type { UrlSigner } from "../naming/signer.js";
import type { CorpusDownloader } from "../steps/corpora.js";
import type { EngineTable } from "../matrix/engines.js";
import { PlannerError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { enumerateVariants } from "../matrix/compatibility.js";
import { formatTimestamp } from "../naming/naming.js";
import { resolveProjectDefaults } from "../project/defaults.js";
import { resolveProject, type DescriptorValidator } from "../project/resolver.js";
import { SRCMAP_STEP_ID } from "../steps/common.js";
import { coverageBuildSteps, supportsCoverage } from "../steps/coverage-build.js";
import { fuzzBuildSteps } from "../steps/fuzz-build.js";
import { projectImageSteps } from "../steps/project-image.js";

export const FUZZING_BUILD_TAG = "fuzzing";
export const COVERAGE_BUILD_TAG = "coverage";
export const BUILD_TAGS: readonly BuildTag[] = [FUZZING_BUILD_TAG, COVERAGE_BUILD_TAG];

export function isBuildTag(value: string): value is BuildTag {
  return value === FUZZING_BUILD_TAG || value === COVERAGE_BUILD_TAG;
}

export type PlanCompilerDeps = {
  config: PlannerConfig;
  signer: UrlSigner;
  corpora: CorpusDownloader;
  validate?: DescriptorValidator;
  logger?: Logger;
  engines?: EngineTable;
};

export type CompileOptions = {
  /** Injected clock; names and report dates derive from it. */
  now: Date;
  testing?: boolean;
  testImages?: boolean;
  branch?: string;
};

type Resolved = { ok: true; project: ProjectConfig } | { ok: false; skip: SkipNotice };

function skipped(project: string, tag: BuildTag, skip: SkipNotice): Plan {
  return { project, tag, steps: [], skipped: skip };
}

/**
 * Turns project names into plans. Every skip condition yields an empty plan
 * with a notice; nothing here throws for a single bad project.
 */
export class PlanCompiler {
  private readonly logger: Logger;

  constructor(private readonly deps: PlanCompilerDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  private resolve(name: string): Resolved {
    try {
      const project = resolveProject(name, {
        projectsDir: this.deps.config.projects_dir,
        imageProject: this.deps.config.image_project,
        defaults: resolveProjectDefaults(this.deps.config.project_defaults),
        validate: this.deps.validate,
      });
      return { ok: true, project };
    } catch (e) {
      if (!(e instanceof PlannerError)) throw e;
      const code = e.code;
      if (code !== "CONFIG_NOT_FOUND" && code !== "DESCRIPTOR_INVALID") throw e;
      this.logger.error(code, e.message, { project: name });
      return { ok: false, skip: { code, message: e.message } };
    }
  }

  private disabled(project: ProjectConfig): SkipNotice | null {
    if (!project.disabled) return null;
    const message = `Project "${project.name}" is disabled.`;
    this.logger.info("DISABLED_PROJECT", message, { project: project.name });
    return { code: "DISABLED_PROJECT", message };
  }

  private preamble(project: ProjectConfig, opts: CompileOptions) {
    return projectImageSteps({
      project: project.name,
      image: project.image,
      language: project.language,
      sourceRepo: this.deps.config.source_repo,
      baseImagesProject: this.deps.config.base_images_project,
      branch: opts.branch,
      testImages: opts.testImages,
    });
  }

  /** Fuzz targets for every supported variant of one project. */
  fuzzingPlan(name: string, opts: CompileOptions): Plan {
    const tag = FUZZING_BUILD_TAG;
    const resolved = this.resolve(name);
    if (!resolved.ok) return skipped(name, tag, resolved.skip);

    const { project } = resolved;
    const off = this.disabled(project);
    if (off) return skipped(name, tag, off);

    const variants = enumerateVariants(project, this.deps.engines);
    const steps = [
      ...this.preamble(project, opts),
      ...fuzzBuildSteps(
        project,
        variants,
        {
          baseImagesProject: this.deps.config.base_images_project,
          testing: opts.testing ?? false,
          timestamp: formatTimestamp(opts.now),
          signer: this.deps.signer,
          corpora: this.deps.corpora,
          engines: this.deps.engines,
          logger: this.logger,
        },
        [SRCMAP_STEP_ID],
      ),
    ];
    return { project: name, tag, steps };
  }

  /** One coverage pass for a project with a coverage-capable language. */
  coveragePlan(name: string, opts: CompileOptions): Plan {
    const tag = COVERAGE_BUILD_TAG;
    const resolved = this.resolve(name);
    if (!resolved.ok) return skipped(name, tag, resolved.skip);

    const { project } = resolved;
    const off = this.disabled(project);
    if (off) return skipped(name, tag, off);

    if (!supportsCoverage(project.language)) {
      const message = `Project "${name}" is written in "${project.language}", coverage is not supported yet.`;
      this.logger.info("UNSUPPORTED_LANGUAGE", message, { project: name });
      return skipped(name, tag, { code: "UNSUPPORTED_LANGUAGE", message });
    }

    const coverage = coverageBuildSteps(project, {
      baseImagesProject: this.deps.config.base_images_project,
      testing: opts.testing ?? false,
      now: opts.now,
      signer: this.deps.signer,
      corpora: this.deps.corpora,
      coverageBucket: this.deps.config.coverage_bucket,
      platform: this.deps.config.platform,
    });
    if (coverage.length === 0) {
      const message = `Skipping code coverage build for ${name}.`;
      this.logger.info("CORPUS_UNAVAILABLE", message, { project: name });
      return skipped(name, tag, { code: "CORPUS_UNAVAILABLE", message });
    }

    return { project: name, tag, steps: [...this.preamble(project, opts), ...coverage] };
  }

  /** Plans for a batch; skipped projects stay in the result with empty steps. */
  compile(tag: BuildTag, names: readonly string[], opts: CompileOptions): Plan[] {
    return names.map((name) => {
      this.logger.info("PLANNING", `Getting steps for: "${name}".`, { project: name, tag });
      return tag === FUZZING_BUILD_TAG ? this.fuzzingPlan(name, opts) : this.coveragePlan(name, opts);
    });
  }

  buildRequest(plan: Plan): BuildRequest {
    return toBuildRequest(plan, this.deps.config);
  }
}

/** Runner submission body for a non-empty plan. */
export function toBuildRequest(plan: Plan, config: PlannerConfig): BuildRequest {
  return {
    steps: plan.steps,
    timeout: `${config.build_timeout_seconds}s`,
    options: { ...(config.build_options ?? {}) },
    logsBucket: config.logs_bucket,
    tags: [`${plan.project}-${plan.tag}`],
    queueTtl: `${config.queue_ttl_seconds}s`,
  };
}
