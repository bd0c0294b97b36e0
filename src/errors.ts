export type PlannerErrorCode = "CONFIG_NOT_FOUND" | "DESCRIPTOR_INVALID" | "LEDGER_RACE" | "CONFIG_INVALID";

/** Base class for every error the planner raises on purpose. */
export class PlannerError extends Error {
  readonly code: PlannerErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: PlannerErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** project.yaml or Dockerfile missing for a project. */
export class ConfigNotFoundError extends PlannerError {
  constructor(project: string, filePath: string) {
    super("CONFIG_NOT_FOUND", `Project "${project}" is missing ${filePath}`, { project, path: filePath });
  }
}

export class DescriptorInvalidError extends PlannerError {
  constructor(project: string, errors: string) {
    super("DESCRIPTOR_INVALID", `Project "${project}" has an invalid project.yaml: ${errors}`, { project });
  }
}

/** A ledger write could not take the record lock in time. */
export class LedgerRaceConditionError extends PlannerError {
  constructor(key: string, retries: number) {
    super("LEDGER_RACE", `Timed out acquiring build history lock for ${key} after ${retries} retries`, { key, retries });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
