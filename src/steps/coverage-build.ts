import type { BuildVariant, ProjectConfig } from "../types/project.js";
import type { LatestReportInfo, Step } from "../types/step.js";
import type { UrlSigner } from "../naming/signer.js";
import type { CorpusDownloader } from "./corpora.js";
import { DEFAULT_ARCHITECTURE } from "../matrix/engines.js";
import { CoverageUrls, LATEST_REPORT_INFO_CONTENT_TYPE } from "../naming/coverage-urls.js";
import { formatReportDate } from "../naming/naming.js";
import {
  GSUTIL_IMAGE,
  SRCMAP_PATH,
  buildEnv,
  corpusVolumes,
  failureBanner,
  gsutilCopyDirStep,
  gsutilRmRfStep,
  guard,
  helperCommand,
  httpUploadStep,
  outDir,
  runnerImage,
} from "./common.js";
import { compileStep } from "./fuzz-build.js";

export const COVERAGE_SANITIZER = "coverage";
export const COVERAGE_ENGINE = "libfuzzer";
export const COVERAGE_LANGUAGES: readonly string[] = ["c", "c++", "go", "jvm", "rust"];

const CORPUS_UNPACK_HINT =
  "Failed to unpack the corpus for $(basename ${f%%.*}). " +
  "This usually means that corpus backup for a particular fuzz target does not exist. " +
  "If a fuzz target was added in the last 24 hours, please wait one more day. " +
  "Otherwise, something is wrong with the fuzz target or the infrastructure, " +
  "and corpus pruning task does not finish successfully.";

export type CoverageBuildContext = {
  baseImagesProject: string;
  testing: boolean;
  now: Date;
  signer: UrlSigner;
  corpora: CorpusDownloader;
  coverageBucket: string;
  platform: string;
};

export function supportsCoverage(language: string): boolean {
  return COVERAGE_LANGUAGES.includes(language);
}

export function coverageVariant(project: string): BuildVariant {
  return { project, engine: COVERAGE_ENGINE, sanitizer: COVERAGE_SANITIZER, architecture: DEFAULT_ARCHITECTURE };
}

export function coverageEnv(project: ProjectConfig, variant: BuildVariant): string[] {
  const env = [
    ...buildEnv(project.language, variant),
    "HTTP_PORT=",
    `COVERAGE_EXTRA_ARGS=${project.coverageExtraArgs.trim()}`,
  ];
  if (project.fuzzingEngines.includes("dataflow")) env.push("FULL_SUMMARY_PER_TARGET=1");
  return env;
}

function generateReportStep(project: ProjectConfig, variant: BuildVariant, ctx: CoverageBuildContext): Step {
  const banner = failureBanner("Code coverage report generation failed.", [
    helperCommand("build_image", project.name),
    helperCommand("build_fuzzers", "--sanitizer coverage", project.name),
    helperCommand("coverage", project.name),
  ]);
  // A group, not a subshell: `exit` has to end the whole step on the first bad archive.
  const unpack = `for f in /corpus/*.zip; do unzip -q $f -d \${f%%.*} || { echo "${CORPUS_UNPACK_HINT}"; exit 1; }; done`;
  return {
    name: runnerImage(ctx.baseImagesProject, false),
    env: coverageEnv(project, variant),
    args: ["bash", "-c", `${unpack} && ${guard("coverage", banner)}`],
    volumes: corpusVolumes(),
  };
}

export function latestReportInfo(urls: CoverageUrls): LatestReportInfo {
  return {
    fuzzer_stats_dir: urls.uploadUrl("fuzzer_stats"),
    html_report_url: urls.htmlReportUrl,
    report_date: urls.date,
    report_summary_path: urls.reportSummaryPath(),
  };
}

/**
 * Steps for one coverage pass over a project. Returns an empty list when
 * there is no corpus to measure against.
 */
export function coverageBuildSteps(project: ProjectConfig, ctx: CoverageBuildContext): Step[] {
  const downloads = ctx.corpora.downloadCorporaSteps(project.name, ctx.testing);
  if (downloads.length === 0) return [];

  const variant = coverageVariant(project.name);
  const out = outDir(variant);
  const urls = new CoverageUrls(project.name, formatReportDate(ctx.now), ctx.platform, {
    baseBucket: ctx.coverageBucket,
    testing: ctx.testing,
  });

  const steps: Step[] = [compileStep(project, variant, buildEnv(project.language, variant)), ...downloads];
  steps.push(generateReportStep(project, variant, ctx));

  // Storage cannot overwrite a prefix in place, so clear each destination first.
  for (const [kind, dir] of [
    ["reports", "report"],
    ["fuzzer_stats", "fuzzer_stats"],
    ["logs", "logs"],
  ] as const) {
    const url = urls.uploadUrl(kind);
    steps.push(gsutilRmRfStep(url), gsutilCopyDirStep(`${out}/${dir}`, url));
  }

  steps.push({ name: GSUTIL_IMAGE, env: [], args: ["cp", SRCMAP_PATH, urls.srcmapUrl()] });

  const infoUrl = ctx.signer.sign(urls.latestReportInfoPath, { contentType: LATEST_REPORT_INFO_CONTENT_TYPE });
  steps.push(httpUploadStep(JSON.stringify(latestReportInfo(urls)), infoUrl, LATEST_REPORT_INFO_CONTENT_TYPE));

  return steps;
}
