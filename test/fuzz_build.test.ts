import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { Step } from "../src/types/step.js";
import type { FuzzBuildContext } from "../src/steps/fuzz-build.js";
import { fuzzBuildSteps, variantSteps } from "../src/steps/fuzz-build.js";
import { enumerateVariants, variantKey } from "../src/matrix/compatibility.js";
import { coverageVariant } from "../src/steps/coverage-build.js";
import { createLogger } from "../src/logging/logger.js";
import { DOWNLOAD_STEP, FakeCorpora, FakeSigner, makeProject, runStepScript, writeStub } from "./helpers.js";

function context(overrides: Partial<FuzzBuildContext> = {}): FuzzBuildContext {
  return {
    baseImagesProject: "oss-fuzz-base",
    testing: false,
    timestamp: "202403050709",
    signer: new FakeSigner(),
    corpora: new FakeCorpora([]),
    ...overrides,
  };
}

/** Step kind from an id like `upload-archive-libfuzzer-address-x86_64` or `download-corpus-0-...`. */
function kindOf(step: Step): string {
  const id = step.id ?? "";
  for (const key of ["libfuzzer-address-x86_64", "libfuzzer-undefined-x86_64", "dataflow-dataflow-x86_64"]) {
    if (id.endsWith(`-${key}`)) return id.slice(0, -(key.length + 1)).replace(/-\d+$/, "");
  }
  return id;
}

function countKinds(steps: Step[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const step of steps) counts[kindOf(step)] = (counts[kindOf(step)] ?? 0) + 1;
  return counts;
}

describe("fuzz build steps", () => {
  it("assembles two variants for libfuzzer with address and undefined", () => {
    const project = makeProject();
    const steps = fuzzBuildSteps(project, enumerateVariants(project), context());

    expect(countKinds(steps)).toEqual({
      compile: 2,
      "build-check": 2,
      "targets-list": 2,
      archive: 2,
      "upload-srcmap": 2,
      "upload-archive": 2,
      "upload-targets-list": 2,
      "upload-latest-version": 2,
      cleanup: 2,
    });
    expect(steps).toHaveLength(18);
    expect(steps.filter((s) => kindOf(s) === "write-labels")).toHaveLength(0);
  });

  it("orders each variant chain", () => {
    const project = makeProject();
    const steps = variantSteps(project, enumerateVariants(project)[0], context());
    expect(steps.map(kindOf)).toEqual([
      "compile",
      "build-check",
      "targets-list",
      "archive",
      "upload-srcmap",
      "upload-archive",
      "upload-targets-list",
      "upload-latest-version",
      "cleanup",
    ]);
  });

  it("chains waitFor within a variant and starts each variant after the given ids", () => {
    const project = makeProject();
    const steps = fuzzBuildSteps(project, enumerateVariants(project), context(), ["srcmap"]);

    const firsts = steps.filter((s) => kindOf(s) === "compile");
    expect(firsts.map((s) => s.waitFor)).toEqual([["srcmap"], ["srcmap"]]);

    for (let i = 1; i < 9; i++) expect(steps[i].waitFor).toEqual([steps[i - 1].id]);
    expect(steps[9].waitFor).toEqual(["srcmap"]);

    const ids = steps.map((s) => s.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("omits waitFor on the first step when nothing precedes it", () => {
    const project = makeProject();
    const [first] = variantSteps(project, enumerateVariants(project)[0], context());
    expect(first.id).toBe("compile-libfuzzer-address-x86_64");
    expect(first.waitFor).toBeUndefined();
  });

  it("sets a sorted build environment", () => {
    const project = makeProject();
    const [compile] = variantSteps(project, enumerateVariants(project)[0], context());
    expect(compile.env).toEqual([
      "ARCHITECTURE=x86_64",
      "FUZZING_ENGINE=libfuzzer",
      "FUZZING_LANGUAGE=c",
      "HOME=/root",
      "OUT=/workspace/out/libfuzzer-address-x86_64",
      "SANITIZER=address",
    ]);
  });

  it("compiles from the project workdir and prints a reproduction banner on failure", () => {
    const project = makeProject();
    const [compile] = variantSteps(project, enumerateVariants(project)[0], context());
    expect(compile.name).toBe("gcr.io/oss-fuzz/libxml2");
    expect(compile.args[0]).toBe("bash");
    expect(compile.args[2]).toBe(
      "rm -r /out && cd /src && cd /src/libxml2 && mkdir -p /workspace/out/libfuzzer-address-x86_64 && compile" +
        ' || (echo "' +
        "*".repeat(80) +
        "\nFailed to build.\nTo reproduce, run:\n" +
        "python infra/helper.py build_image libxml2\n" +
        "python infra/helper.py build_fuzzers --sanitizer address --engine libfuzzer --architecture x86_64 libxml2\n" +
        "*".repeat(80) +
        '" && false)',
    );
  });

  it("uploads through signed urls in the engine bucket", () => {
    const project = makeProject();
    const signer = new FakeSigner();
    const steps = variantSteps(project, enumerateVariants(project)[0], context({ signer }));
    const byKind = new Map(steps.map((s): [string, Step] => [kindOf(s), s]));

    expect(byKind.get("targets-list")?.args).toEqual([
      "bash",
      "-c",
      "mkdir -p /workspace/targets/libfuzzer-address-x86_64 && targets_list > /workspace/targets/libfuzzer-address-x86_64/targets.list.address",
    ]);
    expect(byKind.get("archive")?.args).toEqual([
      "bash",
      "-c",
      "cd /workspace/out/libfuzzer-address-x86_64 && zip -r libxml2-address-202403050709.zip *",
    ]);
    expect(byKind.get("upload-archive")?.args).toEqual([
      "/workspace/out/libfuzzer-address-x86_64/libxml2-address-202403050709.zip",
      "signed:PUT:/clusterfuzz-builds/libxml2/libxml2-address-202403050709.zip",
    ]);
    expect(byKind.get("upload-targets-list")?.args).toEqual([
      "/workspace/targets/libfuzzer-address-x86_64/targets.list.address",
      "signed:PUT:/clusterfuzz-builds/libxml2/targets.list.address",
    ]);
    expect(byKind.get("upload-latest-version")?.args).toEqual([
      "-H",
      "Content-Type: text/plain",
      "-X",
      "PUT",
      "-d",
      "libxml2-address-202403050709.zip",
      "signed:PUT:/clusterfuzz-builds/libxml2/libxml2-address-latest.version",
    ]);
    expect(byKind.get("cleanup")?.args).toEqual(["bash", "-c", "rm -r /workspace/out/libfuzzer-address-x86_64"]);

    const latest = signer.calls.find((c) => c.objectPath.endsWith("latest.version"));
    expect(latest?.opts).toEqual({ contentType: "text/plain" });
  });

  it("uses testing buckets and runner images when testing", () => {
    const project = makeProject({ architectures: ["i386"], sanitizers: [{ kind: "name", name: "address" }] });
    const steps = variantSteps(project, enumerateVariants(project)[0], context({ testing: true }));
    const check = steps.find((s) => s.id === "build-check-libfuzzer-address-i386");
    expect(check?.name).toBe("gcr.io/oss-fuzz-base/base-runner-testing");
    const upload = steps.find((s) => s.id === "upload-archive-libfuzzer-address-i386");
    expect(upload?.args[1]).toBe("signed:PUT:/clusterfuzz-builds-testing-i386/libxml2/libxml2-address-202403050709.zip");
  });

  it("skips build checks when run_tests is off and writes labels when present", () => {
    const project = makeProject({ runTests: false, labels: { fuzz_xml: "sundew" } });
    const steps = variantSteps(project, enumerateVariants(project)[0], context());
    expect(steps.map(kindOf).slice(0, 3)).toEqual(["compile", "write-labels", "targets-list"]);
    expect(steps[1].args).toEqual([
      "/usr/local/bin/write_labels.py",
      '{"fuzz_xml":"sundew"}',
      "/workspace/out/libfuzzer-address-x86_64",
    ]);
  });
});

describe("dataflow builds", () => {
  const project = makeProject({ fuzzingEngines: ["dataflow"], sanitizers: [{ kind: "name", name: "dataflow" }] });

  it("places corpus download and collection between build checks and the targets list", () => {
    const steps = fuzzBuildSteps(project, enumerateVariants(project), context({ corpora: new FakeCorpora([DOWNLOAD_STEP]) }));
    expect(steps.map(kindOf).slice(0, 5)).toEqual([
      "compile",
      "build-check",
      "download-corpus",
      "collect-dft",
      "targets-list",
    ]);
    const collect = steps[3];
    expect(collect.env).toContain("COLLECT_DFT_TIMEOUT=2h");
    expect(collect.volumes).toEqual([{ name: "corpus", path: "/corpus" }]);
    expect(collect.waitFor).toEqual(["download-corpus-dataflow-dataflow-x86_64"]);
  });

  it("indexes repeated download steps", () => {
    const steps = fuzzBuildSteps(
      project,
      enumerateVariants(project),
      context({ corpora: new FakeCorpora([DOWNLOAD_STEP, DOWNLOAD_STEP]) }),
    );
    expect(steps[2].id).toBe("download-corpus-0-dataflow-dataflow-x86_64");
    expect(steps[3].id).toBe("download-corpus-1-dataflow-dataflow-x86_64");
  });

  it("warns and keeps the rest of the chain without a corpus", () => {
    const lines: string[] = [];
    const logger = createLogger("fuzzplan", { sink: (l) => lines.push(l) });
    const steps = fuzzBuildSteps(project, enumerateVariants(project), context({ logger }));
    expect(steps.map(kindOf).slice(0, 3)).toEqual(["compile", "build-check", "targets-list"]);
    expect(lines).toEqual(["[fuzzplan] warn: Skipping dataflow post build steps for libxml2."]);
  });
});

describe("dataflow collection script", () => {
  const project = makeProject({ fuzzingEngines: ["dataflow"], sanitizers: [{ kind: "name", name: "dataflow" }] });
  let tmpDir: string;
  let corpusDir: string;
  let binDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fuzzplan-dft-"));
    corpusDir = path.join(tmpDir, "corpus");
    binDir = path.join(tmpDir, "bin");
    fs.mkdirSync(corpusDir);
    for (const name of ["a.zip", "b.zip"]) fs.writeFileSync(path.join(corpusDir, name), "");
    writeStub(binDir, "collect_dft", "echo DFT_RAN");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const collectScript = () =>
    fuzzBuildSteps(project, enumerateVariants(project), context({ corpora: new FakeCorpora([DOWNLOAD_STEP]) }))[3].args[2];

  it("fails without collecting when an archive fails to unpack", async () => {
    writeStub(binDir, "unzip", 'case "$2" in */a.zip) exit 9;; esac\nexit 0');
    await expect(runStepScript(collectScript(), corpusDir, binDir)).rejects.toMatchObject({ code: 1, stdout: "" });
  });

  it("collects once every archive is unpacked", async () => {
    writeStub(binDir, "unzip", "exit 0");
    const { stdout } = await runStepScript(collectScript(), corpusDir, binDir);
    expect(stdout).toBe("DFT_RAN\n");
  });
});

describe("variant keys", () => {
  it("names the coverage variant", () => {
    expect(variantKey(coverageVariant("libxml2"))).toBe("libfuzzer-coverage-x86_64");
  });
});
