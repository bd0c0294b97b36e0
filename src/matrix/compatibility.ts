import type { BuildVariant, ProjectConfig } from "../types/project.js";
import { sanitizerNames } from "../project/sanitizers.js";
import { ENGINE_INFO, engineInfo, type EngineTable } from "./engines.js";

/**
 * Decide whether an (engine, sanitizer, architecture) triple can be built.
 *
 * Rules, in order:
 * 1. i386 only builds with the address sanitizer, whatever the engine says.
 * 2. The sanitizer must be in the engine's sanitizer set.
 * 3. The architecture must be in the engine's architecture set.
 *
 * Unknown engines are never supported.
 */
export function isSupported(
  engine: string,
  sanitizer: string,
  architecture: string,
  table: EngineTable = ENGINE_INFO,
): boolean {
  if (architecture === "i386" && sanitizer !== "address") return false;

  const info = engineInfo(engine, table);
  if (!info) return false;

  return info.supportedSanitizers.includes(sanitizer) && info.supportedArchitectures.includes(architecture);
}

/**
 * Expand a project's engines × sanitizers × architectures into the variants
 * that pass the matrix. Engines are ordered lexicographically; sanitizers and
 * architectures keep the descriptor's order. Repeated triples collapse.
 */
export function enumerateVariants(project: ProjectConfig, table: EngineTable = ENGINE_INFO): BuildVariant[] {
  const seen = new Set<string>();
  const variants: BuildVariant[] = [];

  for (const engine of [...project.fuzzingEngines].sort()) {
    for (const sanitizer of sanitizerNames(project)) {
      for (const architecture of project.architectures) {
        if (!isSupported(engine, sanitizer, architecture, table)) continue;
        const key = variantKey({ project: project.name, engine, sanitizer, architecture });
        if (seen.has(key)) continue;
        seen.add(key);
        variants.push({ project: project.name, engine, sanitizer, architecture });
      }
    }
  }

  return variants;
}

/** `<engine>-<sanitizer>-<architecture>`, unique per variant within a project. */
export function variantKey(variant: BuildVariant): string {
  return `${variant.engine}-${variant.sanitizer}-${variant.architecture}`;
}
