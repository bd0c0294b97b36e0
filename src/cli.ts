#!/usr/bin/env node

import { Command, Option } from "commander";
import type { BuildTag } from "./types/step.js";
import { planBuilds } from "./commands/plan.js";
import { recordBuild, showHistory } from "./commands/history.js";
import { validateProjects } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { BUILD_TAGS } from "./compiler/plan-compiler.js";
import { createLogger, type LogFormat } from "./logging/logger.js";

type ConfigFlags = { config?: string; env?: string; format: LogFormat };

type PlanFlags = ConfigFlags & {
  exclude: string[];
  testing?: boolean;
  testImages?: boolean;
  branch?: string;
  now?: string;
  out?: string;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseLogFormat(value: string): LogFormat {
  if (value !== "human" && value !== "jsonl") throw new Error(`Unknown format: ${value}`);
  return value;
}

function fail(format: LogFormat, code: string, message: string, exit: number): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code, message }) + "\n");
  } else {
    console.error(message);
  }
  process.exit(exit);
}

function tagOption(): Option {
  return new Option("--tag <tag>", "Build tag").choices(BUILD_TAGS).default("fuzzing");
}

const program = new Command();

program
  .name("fuzzplan")
  .description("Compile fuzzing project descriptors into container build plans")
  .version("0.1.0");

function planCommand(tag: BuildTag, description: string) {
  program
    .command(tag === "fuzzing" ? "build" : "coverage")
    .description(description)
    .argument("<projects...>", "Project names or glob patterns")
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
    .option("--exclude <glob>", "Skip projects matching a glob (repeatable)", collect, [])
    .option("--testing", "Upload to testing buckets")
    .option("--test-images", "Use testing base images")
    .option("--branch <branch>", "Check out this branch of the build scripts repository")
    .option("--now <iso>", "Plan as if it were this time (ISO 8601)")
    .option("--out <dir>", "Write one build request per project into this directory")
    .option("--format <format>", "Output format: human|jsonl", parseLogFormat, "human")
    .action(async (projects: string[], opts: PlanFlags) => {
      const logger = createLogger("fuzzplan", { format: opts.format });
      const res = await planBuilds({
        tag,
        projects,
        exclude: opts.exclude,
        configDir: opts.config,
        envName: opts.env,
        testing: opts.testing,
        testImages: opts.testImages,
        branch: opts.branch,
        now: opts.now,
        outDir: opts.out,
        logger,
      });

      if (!res.ok) {
        const exit = res.error.code === "CONFIG_INVALID" ? EXIT.CONFIG_INVALID : EXIT.INVALID_ARGS;
        fail(opts.format, res.error.code, res.error.message, exit);
      }

      if (res.results.some((r) => r.error)) process.exitCode = EXIT.FAILURE;
      for (const r of res.results) {
        if (!r.request) continue;
        if (opts.format === "jsonl") {
          process.stdout.write(
            JSON.stringify({ project: r.project, tag, path: r.requestPath ?? null, request: r.requestPath ? undefined : r.request }) + "\n",
          );
        } else if (r.requestPath) {
          console.log(`${r.project}  ${r.plan.steps.length} steps  ${r.requestPath}`);
        } else {
          console.log(JSON.stringify(r.request, null, 2));
        }
      }
    });
}

planCommand("fuzzing", "Plan fuzz target builds for projects");
planCommand("coverage", "Plan code coverage builds for projects");

program
  .command("record")
  .description("Record a finished build in the build history")
  .argument("<project>", "Project name")
  .argument("<buildId>", "Build id returned by the runner")
  .addOption(tagOption())
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply")
  .option("--format <format>", "Output format: human|jsonl", parseLogFormat, "human")
  .action(async (project: string, buildId: string, opts: ConfigFlags & { tag: string }) => {
    const logger = createLogger("fuzzplan", { format: opts.format });
    const res = await recordBuild({ project, buildId, tag: opts.tag, configDir: opts.config, envName: opts.env, logger });
    if (!res.ok) {
      const exit =
        res.error.code === "LEDGER_RACE"
          ? EXIT.LEDGER_CONFLICT
          : res.error.code === "INVALID_ARGS"
            ? EXIT.INVALID_ARGS
            : EXIT.FAILURE;
      fail(opts.format, res.error.code, res.error.message, exit);
    }
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "RECORDED", record: res.record, logsUrl: res.logsUrl }) + "\n");
    } else {
      console.error(`Logs: ${res.logsUrl}`);
      console.log(`${res.record.key}: ${res.record.buildIds.length} builds`);
    }
  });

program
  .command("history")
  .description("Show recorded build ids, oldest first")
  .argument("<project>", "Project name")
  .addOption(tagOption())
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply")
  .option("--format <format>", "Output format: human|jsonl", parseLogFormat, "human")
  .action(async (project: string, opts: ConfigFlags & { tag: string }) => {
    const res = await showHistory({ project, tag: opts.tag, configDir: opts.config, envName: opts.env });
    if (!res.ok) fail(opts.format, res.error.code, res.error.message, EXIT.FAILURE);
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ project, tag: opts.tag, buildIds: res.buildIds }) + "\n");
    } else if (res.buildIds.length === 0) {
      console.log("No builds recorded.");
    } else {
      for (const id of res.buildIds) console.log(id);
    }
  });

program
  .command("validate")
  .description("Validate planner config and project descriptors")
  .argument("[projects...]", "Project names or glob patterns (default: all)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply")
  .option("--format <format>", "Output format: human|jsonl", parseLogFormat, "human")
  .action(async (projects: string[], opts: ConfigFlags) => {
    const res = await validateProjects({ projects, configDir: opts.config, envName: opts.env });
    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.FAILURE);
    }

    const logger = createLogger("fuzzplan", { format: opts.format });
    for (const w of res.warnings) logger.warn(w.code, w.message, w.path ? { path: w.path } : undefined);
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK", checked: res.checked.length }) + "\n");
    } else {
      console.log(`OK (${res.checked.length} projects)`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
