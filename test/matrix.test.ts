import { describe, expect, it } from "vitest";
import { ENGINE_INFO, engineInfo } from "../src/matrix/engines.js";
import { enumerateVariants, isSupported, variantKey } from "../src/matrix/compatibility.js";
import { makeProject } from "./helpers.js";

const SANITIZERS = ["address", "memory", "undefined", "dataflow", "coverage"];

describe("isSupported", () => {
  it("rejects i386 for every sanitizer other than address", () => {
    for (const engine of [...Object.keys(ENGINE_INFO), "unknown"]) {
      for (const sanitizer of SANITIZERS.filter((s) => s !== "address")) {
        expect(isSupported(engine, sanitizer, "i386")).toBe(false);
      }
    }
  });

  it("applies the i386 rule before the engine table", () => {
    const table = {
      custom: { uploadBucket: "b", supportedSanitizers: ["memory"], supportedArchitectures: ["i386"] },
    };
    expect(isSupported("custom", "memory", "i386", table)).toBe(false);
  });

  it("follows the engine table for x86_64", () => {
    expect(isSupported("libfuzzer", "address", "x86_64")).toBe(true);
    expect(isSupported("libfuzzer", "memory", "x86_64")).toBe(true);
    expect(isSupported("libfuzzer", "dataflow", "x86_64")).toBe(false);
    expect(isSupported("afl", "undefined", "x86_64")).toBe(false);
    expect(isSupported("dataflow", "dataflow", "x86_64")).toBe(true);
    expect(isSupported("none", "address", "x86_64")).toBe(true);
  });

  it("only libfuzzer builds for i386", () => {
    expect(isSupported("libfuzzer", "address", "i386")).toBe(true);
    expect(isSupported("afl", "address", "i386")).toBe(false);
    expect(isSupported("honggfuzz", "address", "i386")).toBe(false);
  });

  it("treats unknown engines as unsupported", () => {
    expect(isSupported("unknown", "address", "x86_64")).toBe(false);
    expect(isSupported("toString", "address", "x86_64")).toBe(false);
    expect(engineInfo("constructor")).toBeUndefined();
  });
});

describe("enumerateVariants", () => {
  it("orders engines lexicographically and keeps sanitizer order", () => {
    const project = makeProject({ fuzzingEngines: ["libfuzzer", "afl", "honggfuzz"] });
    expect(enumerateVariants(project).map(variantKey)).toEqual([
      "afl-address-x86_64",
      "honggfuzz-address-x86_64",
      "libfuzzer-address-x86_64",
      "libfuzzer-undefined-x86_64",
    ]);
  });

  it("drops unsupported triples and repeated ones", () => {
    const project = makeProject({
      sanitizers: [
        { kind: "name", name: "memory" },
        { kind: "options", name: "address", options: { experimental: true } },
        { kind: "name", name: "address" },
      ],
      architectures: ["x86_64", "i386"],
    });
    expect(enumerateVariants(project).map(variantKey)).toEqual([
      "libfuzzer-memory-x86_64",
      "libfuzzer-address-x86_64",
      "libfuzzer-address-i386",
    ]);
  });

  it("returns nothing when no engine supports the sanitizers", () => {
    const project = makeProject({ fuzzingEngines: ["afl"], sanitizers: [{ kind: "name", name: "memory" }] });
    expect(enumerateVariants(project)).toEqual([]);
  });
});
