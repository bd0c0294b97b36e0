import type { Step } from "../types/step.js";
import { DOCKER_IMAGE, GIT_IMAGE, SRCMAP_PATH, SRCMAP_STEP_ID } from "./common.js";

const BASE_IMAGES = ["base-image", "base-clang", "base-builder", "base-runner", "base-runner-debug"] as const;

/** Languages with their own builder image (`base-builder-<language>`). */
const LANGUAGE_BUILDERS = new Set(["go", "jvm", "python", "rust", "swift"]);

export type ProjectImageOptions = {
  project: string;
  image: string;
  language: string;
  sourceRepo: string;
  baseImagesProject: string;
  branch?: string;
  testImages?: boolean;
};

/** `https://github.com/google/oss-fuzz.git` → `oss-fuzz`. */
export function repoDirName(sourceRepo: string): string {
  const last = sourceRepo.replace(/\/+$/, "").split("/").pop() ?? "";
  return last.replace(/\.git$/, "");
}

function testImageSteps(baseImagesProject: string, language: string): Step[] {
  const images: string[] = [...BASE_IMAGES];
  if (LANGUAGE_BUILDERS.has(language)) images.push(`base-builder-${language}`);

  const steps: Step[] = [];
  for (const name of images) {
    const image = `gcr.io/${baseImagesProject}/${name}`;
    steps.push({ name: DOCKER_IMAGE, env: [], args: ["pull", `${image}-testing`] });
    steps.push({ name: DOCKER_IMAGE, env: [], args: ["tag", `${image}-testing`, image] });
  }
  return steps;
}

/**
 * Steps shared by every build of a project: fetch the build scripts, build
 * the project image and record the source map. The last step has id
 * `srcmap`; variant chains wait on it.
 */
export function projectImageSteps(opts: ProjectImageOptions): Step[] {
  const cloneArgs = ["clone", opts.sourceRepo, "--depth", "1"];
  if (opts.branch) cloneArgs.push("--branch", opts.branch);

  const steps: Step[] = [{ name: GIT_IMAGE, env: [], args: cloneArgs }];
  if (opts.testImages) steps.push(...testImageSteps(opts.baseImagesProject, opts.language));

  steps.push(
    {
      name: DOCKER_IMAGE,
      env: [],
      args: ["build", "-t", opts.image, "."],
      dir: `${repoDirName(opts.sourceRepo)}/projects/${opts.project}`,
    },
    {
      name: opts.image,
      env: ["OSSFUZZ_REVISION=$REVISION_ID", `FUZZING_LANGUAGE=${opts.language}`],
      args: ["bash", "-c", `srcmap > ${SRCMAP_PATH} && cat ${SRCMAP_PATH}`],
      id: SRCMAP_STEP_ID,
    },
  );
  return steps;
}
