import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
  addFormat: (name: string, format: RegExp) => unknown;
};

export type AjvOptions = {
  /** Report every error instead of stopping at the first. Defaults to true. */
  allErrors?: boolean;
};

/** Formats planner schemas use on top of ajv-formats. */
export const PLANNER_FORMATS: Readonly<Record<string, RegExp>> = {
  // Runner durations: whole seconds with an `s` suffix.
  "runner-duration": /^[0-9]+s$/,
  "gs-url": /^gs:\/\/[a-z0-9][a-z0-9._-]*(\/\S*)?$/,
  "report-date": /^[0-9]{8}$/,
};

/** Draft 2020-12 validator in strict mode, with standard and planner formats. */
export function createAjv(opts: AjvOptions = {}): AjvInstance {
  // ajv ships CommonJS; the default import is the constructor at runtime.
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: opts.allErrors ?? true, strict: true });
  add(ajv);
  for (const [name, format] of Object.entries(PLANNER_FORMATS)) ajv.addFormat(name, format);

  return ajv;
}
