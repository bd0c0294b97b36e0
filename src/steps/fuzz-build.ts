import type { ProjectConfig, BuildVariant } from "../types/project.js";
import type { Step } from "../types/step.js";
import type { UrlSigner } from "../naming/signer.js";
import type { CorpusDownloader } from "./corpora.js";
import type { EngineTable } from "../matrix/engines.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { variantKey } from "../matrix/compatibility.js";
import {
  LATEST_VERSION_CONTENT_TYPE,
  archiveName,
  latestVersionName,
  srcmapName,
  targetsListFilename,
  targetsListPath,
  uploadBucket,
  uploadPath,
} from "../naming/naming.js";
import {
  SRCMAP_PATH,
  WORKSPACE,
  buildEnv,
  corpusVolumes,
  failureBanner,
  guard,
  helperCommand,
  httpUploadStep,
  outDir,
  runnerImage,
  uploaderImage,
  variantFlags,
} from "./common.js";

export type FuzzBuildContext = {
  baseImagesProject: string;
  testing: boolean;
  /** `YYYYMMDDHHMM`, shared by every variant of one plan. */
  timestamp: string;
  signer: UrlSigner;
  corpora: CorpusDownloader;
  engines?: EngineTable;
  logger?: Logger;
};

export type StepKind =
  | "compile"
  | "build-check"
  | "write-labels"
  | "download-corpus"
  | "collect-dft"
  | "targets-list"
  | "archive"
  | "upload-srcmap"
  | "upload-archive"
  | "upload-targets-list"
  | "upload-latest-version"
  | "cleanup";

type KindedStep = { kind: StepKind; step: Step };

export const DATAFLOW_ENV = [
  "COLLECT_DFT_TIMEOUT=2h",
  "DFT_FILE_SIZE_LIMIT=65535",
  "DFT_MIN_TIMEOUT=2.0",
  "DFT_TIMEOUT_RANGE=6.0",
] as const;

/** Per-variant directory for the targets list, outside the archived output. */
export function targetsListDir(variant: BuildVariant): string {
  return `${WORKSPACE}/targets/${variantKey(variant)}`;
}

export function compileStep(project: ProjectConfig, variant: BuildVariant, env: string[]): Step {
  const banner = failureBanner("Failed to build.", [
    helperCommand("build_image", project.name),
    helperCommand("build_fuzzers", variantFlags(variant), project.name),
  ]);
  const out = outDir(variant);
  // The runner resets the working directory, so cd back into the Dockerfile's WORKDIR.
  const command = `rm -r /out && cd /src && cd ${project.workdir} && mkdir -p ${out} && compile`;
  return {
    name: project.image,
    env,
    args: ["bash", "-c", guard(command, banner)],
  };
}

export function buildCheckStep(project: ProjectConfig, variant: BuildVariant, env: string[], ctx: FuzzBuildContext): Step {
  const banner = failureBanner("Build checks failed.", [
    helperCommand("build_image", project.name),
    helperCommand("build_fuzzers", variantFlags(variant), project.name),
    helperCommand("check_build", variantFlags(variant), project.name),
  ]);
  return {
    name: runnerImage(ctx.baseImagesProject, ctx.testing),
    env,
    args: ["bash", "-c", guard("test_all.py", banner)],
  };
}

export function writeLabelsStep(project: ProjectConfig, variant: BuildVariant, env: string[]): Step {
  return {
    name: project.image,
    env,
    args: ["/usr/local/bin/write_labels.py", JSON.stringify(project.labels), outDir(variant)],
  };
}

function dataflowSteps(project: ProjectConfig, env: string[], ctx: FuzzBuildContext): KindedStep[] {
  const downloads = ctx.corpora.downloadCorporaSteps(project.name, ctx.testing);
  if (downloads.length === 0) return [];

  const collect: Step = {
    name: runnerImage(ctx.baseImagesProject, ctx.testing),
    env: [...env, ...DATAFLOW_ENV],
    args: [
      "bash",
      "-c",
      "for f in /corpus/*.zip; do unzip -q $f -d ${f%%.*} || exit 1; done && " +
        guard("collect_dft", "DFT collection failed."),
    ],
    volumes: corpusVolumes(),
  };
  return [...downloads.map((step) => ({ kind: "download-corpus" as const, step })), { kind: "collect-dft", step: collect }];
}

export function targetsListStep(variant: BuildVariant, env: string[], ctx: FuzzBuildContext): Step {
  const dir = targetsListDir(variant);
  return {
    name: runnerImage(ctx.baseImagesProject, ctx.testing),
    env,
    args: ["bash", "-c", `mkdir -p ${dir} && targets_list > ${dir}/${targetsListFilename(variant.sanitizer)}`],
  };
}

/**
 * Archive the output, upload srcmap, archive and targets list, point
 * `latest.version` at the archive, then drop the local output.
 */
export function uploadSteps(project: ProjectConfig, variant: BuildVariant, ctx: FuzzBuildContext): KindedStep[] {
  const bucket = uploadBucket(variant.engine, variant.architecture, ctx.testing, ctx.engines);
  const zip = archiveName(project.name, variant.sanitizer, ctx.timestamp);
  const out = outDir(variant);
  const uploader = uploaderImage(ctx.baseImagesProject);

  const archiveUrl = ctx.signer.sign(uploadPath(bucket, project.name, zip));
  const srcmapUrl = ctx.signer.sign(uploadPath(bucket, project.name, srcmapName(project.name, variant.sanitizer, ctx.timestamp)));
  const latestUrl = ctx.signer.sign(uploadPath(bucket, project.name, latestVersionName(project.name, variant.sanitizer)), {
    contentType: LATEST_VERSION_CONTENT_TYPE,
  });
  const targetsUrl = ctx.signer.sign(targetsListPath(bucket, project.name, variant.sanitizer));
  const targetsFile = `${targetsListDir(variant)}/${targetsListFilename(variant.sanitizer)}`;

  return [
    { kind: "archive", step: { name: project.image, env: [], args: ["bash", "-c", `cd ${out} && zip -r ${zip} *`] } },
    { kind: "upload-srcmap", step: { name: uploader, env: [], args: [SRCMAP_PATH, srcmapUrl] } },
    { kind: "upload-archive", step: { name: uploader, env: [], args: [`${out}/${zip}`, archiveUrl] } },
    { kind: "upload-targets-list", step: { name: uploader, env: [], args: [targetsFile, targetsUrl] } },
    { kind: "upload-latest-version", step: httpUploadStep(zip, latestUrl, LATEST_VERSION_CONTENT_TYPE) },
    { kind: "cleanup", step: { name: project.image, env: [], args: ["bash", "-c", `rm -r ${out}`] } },
  ];
}

/**
 * Give each step an id `<kind>-<variant>` (indexed when a kind repeats) and
 * make it wait only for its predecessor, so separate variants can run side
 * by side. The first step waits for `after`.
 */
export function linkVariantSteps(entries: readonly KindedStep[], variant: BuildVariant, after: readonly string[]): Step[] {
  const key = variantKey(variant);
  const totals = new Map<StepKind, number>();
  for (const { kind } of entries) totals.set(kind, (totals.get(kind) ?? 0) + 1);

  const seen = new Map<StepKind, number>();
  let predecessors = [...after];
  return entries.map(({ kind, step }) => {
    const n = seen.get(kind) ?? 0;
    seen.set(kind, n + 1);
    const id = (totals.get(kind) ?? 0) > 1 ? `${kind}-${n}-${key}` : `${kind}-${key}`;
    const linked: Step = predecessors.length > 0 ? { ...step, id, waitFor: predecessors } : { ...step, id };
    predecessors = [id];
    return linked;
  });
}

/** Every step for one variant, in emission order. */
export function variantSteps(
  project: ProjectConfig,
  variant: BuildVariant,
  ctx: FuzzBuildContext,
  after: readonly string[] = [],
): Step[] {
  const logger = ctx.logger ?? silentLogger;
  const env = buildEnv(project.language, variant);
  const entries: KindedStep[] = [{ kind: "compile", step: compileStep(project, variant, env) }];

  if (project.runTests) entries.push({ kind: "build-check", step: buildCheckStep(project, variant, env, ctx) });

  if (Object.keys(project.labels).length > 0) {
    entries.push({ kind: "write-labels", step: writeLabelsStep(project, variant, env) });
  }

  if (variant.sanitizer === "dataflow" && variant.engine === "dataflow") {
    const dataflow = dataflowSteps(project, env, ctx);
    if (dataflow.length > 0) {
      entries.push(...dataflow);
    } else {
      logger.warn("DATAFLOW_SKIPPED", `Skipping dataflow post build steps for ${project.name}.`);
    }
  }

  entries.push({ kind: "targets-list", step: targetsListStep(variant, env, ctx) });
  entries.push(...uploadSteps(project, variant, ctx));

  return linkVariantSteps(entries, variant, after);
}

/** Concatenate the chains of all variants. No edges cross variants. */
export function fuzzBuildSteps(
  project: ProjectConfig,
  variants: readonly BuildVariant[],
  ctx: FuzzBuildContext,
  after: readonly string[] = [],
): Step[] {
  return variants.flatMap((variant) => variantSteps(project, variant, ctx, after));
}
