import path from "node:path";
import type { BuildVariant } from "../types/project.js";
import type { Step, Volume } from "../types/step.js";
import { variantKey } from "../matrix/compatibility.js";

export const WORKSPACE = "/workspace";
export const HOME_DIR = "/root";
export const SRCMAP_PATH = `${WORKSPACE}/srcmap.json`;
export const SRCMAP_STEP_ID = "srcmap";

export const GIT_IMAGE = "gcr.io/cloud-builders/git";
export const DOCKER_IMAGE = "gcr.io/cloud-builders/docker";
export const GSUTIL_IMAGE = "gcr.io/cloud-builders/gsutil";
export const CURL_IMAGE = "gcr.io/cloud-builders/curl";

const BANNER_RULE = "*".repeat(80);

export function outDir(variant: BuildVariant): string {
  return path.posix.join(WORKSPACE, "out", variantKey(variant));
}

/** Sorted `KEY=VALUE` pairs so identical inputs give byte-identical plans. */
export function buildEnv(language: string, variant: BuildVariant): string[] {
  const env: Record<string, string> = {
    FUZZING_LANGUAGE: language,
    FUZZING_ENGINE: variant.engine,
    SANITIZER: variant.sanitizer,
    ARCHITECTURE: variant.architecture,
    // Keep HOME off any persisted volume.
    HOME: HOME_DIR,
    OUT: outDir(variant),
  };
  return Object.entries(env)
    .map(([key, value]) => `${key}=${value}`)
    .sort();
}

export function runnerImage(baseImagesProject: string, testing: boolean): string {
  const image = `gcr.io/${baseImagesProject}/base-runner`;
  return testing ? `${image}-testing` : image;
}

export function uploaderImage(baseImagesProject: string): string {
  return `gcr.io/${baseImagesProject}/uploader`;
}

export function corpusVolumes(): Volume[] {
  return [{ name: "corpus", path: "/corpus" }];
}

/** Fixed block printed before a failing step exits. */
export function failureBanner(title: string, commands: readonly string[]): string {
  const lines = [BANNER_RULE, title];
  if (commands.length > 0) lines.push("To reproduce, run:", ...commands);
  lines.push(BANNER_RULE);
  return lines.join("\n");
}

/** Run `command`; on failure print `message` and still fail. */
export function guard(command: string, message: string): string {
  return `${command} || (echo "${message}" && false)`;
}

export function helperCommand(...args: string[]): string {
  return ["python infra/helper.py", ...args].join(" ");
}

export function variantFlags(variant: BuildVariant): string {
  return `--sanitizer ${variant.sanitizer} --engine ${variant.engine} --architecture ${variant.architecture}`;
}

/** PUT `data` to a signed url with an explicit content type. */
export function httpUploadStep(data: string, signedUrl: string, contentType: string): Step {
  return {
    name: CURL_IMAGE,
    env: [],
    args: ["-H", `Content-Type: ${contentType}`, "-X", "PUT", "-d", data, signedUrl],
  };
}

/** Delete everything under `url`; a missing prefix is not an error. */
export function gsutilRmRfStep(url: string): Step {
  return {
    name: GSUTIL_IMAGE,
    env: [],
    entrypoint: "sh",
    args: ["-c", `gsutil -m rm -rf ${url} || exit 0`],
  };
}

export function gsutilCopyDirStep(source: string, url: string): Step {
  return {
    name: GSUTIL_IMAGE,
    env: [],
    args: ["-m", "cp", "-r", source, url],
  };
}
