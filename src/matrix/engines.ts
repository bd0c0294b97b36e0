export type EngineInfo = {
  uploadBucket: string;
  supportedSanitizers: readonly string[];
  supportedArchitectures: readonly string[];
};

export type EngineTable = Readonly<Record<string, EngineInfo>>;

export const DEFAULT_ARCHITECTURE = "x86_64";

export const ENGINE_INFO: EngineTable = {
  libfuzzer: {
    uploadBucket: "clusterfuzz-builds",
    supportedSanitizers: ["address", "memory", "undefined"],
    supportedArchitectures: ["x86_64", "i386"],
  },
  afl: {
    uploadBucket: "clusterfuzz-builds-afl",
    supportedSanitizers: ["address"],
    supportedArchitectures: ["x86_64"],
  },
  honggfuzz: {
    uploadBucket: "clusterfuzz-builds-honggfuzz",
    supportedSanitizers: ["address"],
    supportedArchitectures: ["x86_64"],
  },
  dataflow: {
    uploadBucket: "clusterfuzz-builds-dataflow",
    supportedSanitizers: ["dataflow"],
    supportedArchitectures: ["x86_64"],
  },
  none: {
    uploadBucket: "clusterfuzz-builds-no-engine",
    supportedSanitizers: ["address"],
    supportedArchitectures: ["x86_64"],
  },
};

export function engineInfo(engine: string, table: EngineTable = ENGINE_INFO): EngineInfo | undefined {
  return Object.prototype.hasOwnProperty.call(table, engine) ? table[engine] : undefined;
}
