import type { Diagnostic } from "../commands/diagnostics.js";

export type LogFormat = "human" | "jsonl";

export type Logger = {
  info(code: string, message: string, details?: Record<string, unknown>): void;
  warn(code: string, message: string, details?: Record<string, unknown>): void;
  error(code: string, message: string, details?: Record<string, unknown>): void;
};

type Sink = (line: string) => void;

const stderrSink: Sink = (line) => {
  process.stderr.write(line + "\n");
};

/**
 * Diagnostics go to stderr so stdout stays reserved for plans.
 * `human` prints `[scope] message`, `jsonl` one Diagnostic per line.
 */
export function createLogger(scope: string, opts: { format?: LogFormat; sink?: Sink } = {}): Logger {
  const format = opts.format ?? "human";
  const sink = opts.sink ?? stderrSink;

  const emit = (level: Diagnostic["level"], code: string, message: string, details?: Record<string, unknown>) => {
    if (format === "jsonl") {
      const d: Diagnostic = { level, code, message, ...(details ? { details } : {}) };
      sink(JSON.stringify({ scope, ...d }));
      return;
    }
    const prefix = level === "info" ? `[${scope}]` : `[${scope}] ${level}:`;
    sink(`${prefix} ${message}`);
  };

  return {
    info: (code, message, details) => emit("info", code, message, details),
    warn: (code, message, details) => emit("warn", code, message, details),
    error: (code, message, details) => emit("error", code, message, details),
  };
}

/** Logger that drops everything; handy when a caller has nothing to report to. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
