import fs from "node:fs";
import path from "node:path";
import type { BuildRequest, BuildTag, Plan } from "../types/step.js";
import type { UrlSigner } from "../naming/signer.js";
import type { FuzzTargetSource } from "../steps/corpora.js";
import type { Logger } from "../logging/logger.js";
import { PlanCompiler } from "../compiler/plan-compiler.js";
import { HmacUrlSigner } from "../naming/signer.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { CorpusStepFactory, DirectoryTargetSource, StaticTargetSource } from "../steps/corpora.js";
import { loadCommandConfig, parseNow, type CommandError, type ConfigOptions } from "./context.js";
import { selectProjects } from "./select.js";

export type PlanCommandOptions = ConfigOptions & {
  tag: BuildTag;
  projects: string[];
  exclude?: string[];
  testing?: boolean;
  testImages?: boolean;
  branch?: string;
  now?: string;
  /** Write one `<project>-<tag>.json` build request per planned project. */
  outDir?: string;
  logger: Logger;
  /** Overrides for tests; otherwise built from config. */
  signer?: UrlSigner;
  targets?: FuzzTargetSource;
  registry?: SchemaRegistry;
};

export type PlannedProject = {
  project: string;
  plan: Plan;
  request: BuildRequest | null;
  requestPath?: string;
  /** Set when the request failed validation; the rest of the batch still runs. */
  error?: CommandError;
};

export type PlanCommandResult =
  | { ok: true; results: PlannedProject[] }
  | { ok: false; error: CommandError };

export async function planBuilds(opts: PlanCommandOptions): Promise<PlanCommandResult> {
  const cwd = opts.cwd ?? process.cwd();
  const loaded = loadCommandConfig(opts);
  if (!loaded.ok) return loaded;
  const { config } = loaded;

  const now = parseNow(opts.now);
  if (!now) return { ok: false, error: { code: "INVALID_ARGS", message: `Invalid --now value: ${opts.now}` } };

  let signer = opts.signer;
  if (!signer) {
    if (!config.signing_key) {
      return {
        ok: false,
        error: { code: "CONFIG_INVALID", message: "A signing key is required (set FUZZPLAN_SIGNING_KEY)" },
      };
    }
    signer = new HmacUrlSigner(config.signing_account ?? "", config.signing_key, () => now);
  }

  const targets =
    opts.targets ?? (config.targets_dir ? new DirectoryTargetSource(config.targets_dir) : new StaticTargetSource({}));
  const registry = opts.registry ?? createRegistry();
  const compiler = new PlanCompiler({
    config,
    signer,
    corpora: new CorpusStepFactory(targets, signer, config.base_images_project),
    validate: registry.descriptorValidator("project"),
    logger: opts.logger,
  });

  const names = selectProjects(config.projects_dir, opts.projects, opts.exclude);
  if (names.length === 0) {
    return { ok: false, error: { code: "NO_PROJECTS", message: "No projects matched" } };
  }

  const plans = compiler.compile(opts.tag, names, {
    now,
    testing: opts.testing,
    testImages: opts.testImages,
    branch: opts.branch,
  });

  const results: PlannedProject[] = [];
  for (const plan of plans) {
    if (plan.steps.length === 0) {
      opts.logger.warn("SKIPPED", `No steps. Skipping build for ${plan.project}.`, { project: plan.project });
      results.push({ project: plan.project, plan, request: null });
      continue;
    }

    const request = compiler.buildRequest(plan);
    const check = registry.validate("build-request", request);
    if (!check.valid) {
      const error = { code: "PLAN_INVALID", message: `Build request for ${plan.project} is invalid: ${check.errors}` };
      opts.logger.error(error.code, error.message, { project: plan.project });
      results.push({ project: plan.project, plan, request: null, error });
      continue;
    }

    let requestPath: string | undefined;
    if (opts.outDir) {
      const dir = path.resolve(cwd, opts.outDir);
      fs.mkdirSync(dir, { recursive: true });
      requestPath = path.join(dir, `${plan.project}-${plan.tag}.json`);
      fs.writeFileSync(requestPath, JSON.stringify(request, null, 2) + "\n", "utf8");
    }
    results.push({ project: plan.project, plan, request, ...(requestPath ? { requestPath } : {}) });
  }

  return { ok: true, results };
}
