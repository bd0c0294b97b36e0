import fs from "node:fs";
import path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { ProjectConfig } from "../src/types/project.js";
import type { SignOptions, UrlSigner } from "../src/naming/signer.js";
import type { Step } from "../src/types/step.js";
import type { CorpusDownloader } from "../src/steps/corpora.js";

/** Signer that spells out what it was asked to sign. */
export class FakeSigner implements UrlSigner {
  readonly calls: Array<{ objectPath: string; opts: SignOptions }> = [];

  sign(objectPath: string, opts: SignOptions = {}): string {
    this.calls.push({ objectPath, opts });
    return `signed:${opts.method ?? "PUT"}:${objectPath}`;
  }
}

export class FakeCorpora implements CorpusDownloader {
  constructor(private readonly steps: Step[]) {}

  downloadCorporaSteps(): Step[] {
    return this.steps.map((s) => ({ ...s }));
  }
}

export const DOWNLOAD_STEP: Step = {
  name: "gcr.io/oss-fuzz-base/base-runner",
  env: [],
  entrypoint: "download_corpus",
  args: ["/corpus/fuzz_xml.zip signed:GET:/libxml2-backup/fuzz_xml.zip"],
  volumes: [{ name: "corpus", path: "/corpus" }],
};

export function makeProject(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return {
    name: "libxml2",
    language: "c",
    disabled: false,
    sanitizers: [
      { kind: "name", name: "address" },
      { kind: "name", name: "undefined" },
    ],
    fuzzingEngines: ["libfuzzer"],
    architectures: ["x86_64"],
    runTests: true,
    coverageExtraArgs: "",
    labels: {},
    workdir: "/src/libxml2",
    image: "gcr.io/oss-fuzz/libxml2",
    ...overrides,
  };
}

/** Write `<projectsDir>/<name>/{project.yaml,Dockerfile}`; pass null to leave a file out. */
export function writeProject(
  projectsDir: string,
  name: string,
  descriptor: string | null,
  dockerfile: string | null = "FROM gcr.io/oss-fuzz-base/base-builder\nWORKDIR $SRC/" + name + "\n",
): string {
  const dir = path.join(projectsDir, name);
  fs.mkdirSync(dir, { recursive: true });
  if (descriptor !== null) fs.writeFileSync(path.join(dir, "project.yaml"), descriptor, "utf8");
  if (dockerfile !== null) fs.writeFileSync(path.join(dir, "Dockerfile"), dockerfile, "utf8");
  return dir;
}

const pExecFile = promisify(execFile);

/** Put an executable `#!/bin/sh` stub named `name` into `binDir`. */
export function writeStub(binDir: string, name: string, body: string): void {
  fs.mkdirSync(binDir, { recursive: true });
  fs.writeFileSync(path.join(binDir, name), `#!/bin/sh\n${body}\n`, { mode: 0o755 });
}

/** Run a step's `bash -c` script with `/corpus` moved to `corpusDir` and stubs first on PATH. */
export function runStepScript(script: string, corpusDir: string, binDir: string) {
  return pExecFile("bash", ["-c", script.replaceAll("/corpus/", `${corpusDir}/`)], {
    env: { ...process.env, PATH: `${binDir}:${process.env.PATH ?? ""}` },
  });
}
