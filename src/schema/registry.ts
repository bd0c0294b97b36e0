import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createAjv, type AjvValidateFn, type AjvInstance, type AjvOptions } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type ValidationOutcome = { valid: boolean; errors: string | null };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Discovers *.schema.json files in a directory and
 * compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance;

  constructor(
    private readonly schemaDir: string = DEFAULT_SCHEMA_DIR,
    ajvOptions: AjvOptions = {},
  ) {
    this.ajv = createAjv(ajvOptions);
  }

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "project.schema.json" → "project"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
    return this;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) result[name] = entry.version;
    return result;
  }

  getValidator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  validate(name: string, data: unknown): ValidationOutcome {
    const validate = this.getValidator(name);
    const valid = validate(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(validate.errors) };
  }

  /** Validator shaped for the project resolver: null when valid. */
  descriptorValidator(name = "project"): (data: unknown) => string | null {
    return (data) => this.validate(name, data).errors;
  }
}

/** Version from `$id` (`…@1.2.3`), if present. */
function extractVersion(schema: unknown): string | null {
  if (typeof schema === "object" && schema !== null && "$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

export function createRegistry(schemaDir?: string, ajvOptions?: AjvOptions): SchemaRegistry {
  return new SchemaRegistry(schemaDir, ajvOptions).load();
}
