import fs from "node:fs";
import path from "node:path";
import type { Step } from "../types/step.js";
import type { UrlSigner } from "../naming/signer.js";
import { targetsListFilename, uploadBucket } from "../naming/naming.js";
import { corpusVolumes, runnerImage } from "./common.js";

export const CORPUS_DOWNLOAD_BATCH_SIZE = 100;

/** Lists the fuzz targets a project published on its last address build. */
export interface FuzzTargetSource {
  listTargets(project: string, testing: boolean): string[];
}

/** Produces the steps that fetch corpus backups into the `corpus` volume. */
export interface CorpusDownloader {
  /** An empty list means there is nothing to download; callers skip the build. */
  downloadCorporaSteps(project: string, testing: boolean): Step[];
}

export function corpusBackupPath(project: string, fuzzer: string): string {
  return `/${project}-backup.clusterfuzz-external.appspot.com/corpus/libFuzzer/${fuzzer}/public.zip`;
}

/** Corpus backups are keyed by `<project>_<target>`. */
export function qualifiedTargetName(project: string, target: string): string {
  const prefix = `${project}_`;
  return target.startsWith(prefix) ? target : prefix + target;
}

export class CorpusStepFactory implements CorpusDownloader {
  constructor(
    private readonly targets: FuzzTargetSource,
    private readonly signer: UrlSigner,
    private readonly baseImagesProject: string,
    private readonly batchSize: number = CORPUS_DOWNLOAD_BATCH_SIZE,
  ) {}

  downloadCorporaSteps(project: string, testing: boolean): Step[] {
    const targets = this.targets.listTargets(project, testing);
    if (targets.length === 0) return [];

    const steps: Step[] = [];
    for (let i = 0; i < targets.length; i += this.batchSize) {
      const args = targets.slice(i, i + this.batchSize).map((target) => {
        const url = this.signer.sign(corpusBackupPath(project, qualifiedTargetName(project, target)), { method: "GET" });
        return `/corpus/${target}.zip ${url}`;
      });
      steps.push({
        name: runnerImage(this.baseImagesProject, false),
        env: [],
        entrypoint: "download_corpus",
        args,
        volumes: corpusVolumes(),
      });
    }
    return steps;
  }
}

/**
 * Reads targets lists mirrored from storage:
 * `<root>/<libfuzzer bucket>/<project>/targets.list.address`.
 */
export class DirectoryTargetSource implements FuzzTargetSource {
  constructor(private readonly root: string) {}

  listTargets(project: string, testing: boolean): string[] {
    const bucket = uploadBucket("libfuzzer", "x86_64", testing);
    const file = path.join(this.root, bucket, project, targetsListFilename("address"));
    if (!fs.existsSync(file)) return [];
    return fs
      .readFileSync(file, "utf8")
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l.length > 0);
  }
}

/** Fixed target lists, keyed by project. */
export class StaticTargetSource implements FuzzTargetSource {
  constructor(private readonly targets: Record<string, string[]>) {}

  listTargets(project: string): string[] {
    return [...(this.targets[project] ?? [])];
  }
}
