#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { parseGetQuery, runApp, type GetQuery } from "./app.js";
import { TaskloopError } from "./errors.js";
import { log, setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  log.error(`Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
  process.exitCode = 1;
});

type CliOptions = {
  quiet?: boolean;
  verbose?: boolean;
  config?: string;
  get?: GetQuery;
  times?: number;
};

function parseTimes(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

function parseGet(value: string): GetQuery {
  try {
    return parseGetQuery(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

const program = new Command();

program
  .name("taskloop")
  .description("Run a directory of tasks in dependency order, retrying and halting as they ask")
  .version("0.1.0")
  .option("-q, --quiet", "Only log warnings and errors")
  .option("-v, --verbose", "Enable debug logging")
  .option("-c, --config <file>", "YAML configuration file")
  .option("-g, --get <section.option>", "Print a configuration value and exit", parseGet)
  .option("-n, --times <n>", "Run this many times (default is forever)", parseTimes)
  .argument("[taskdir]", "Task directory")
  .action(async (taskDir: string | undefined, opts: CliOptions) => {
    if (opts.verbose) setLogLevel("debug");
    else if (opts.quiet) setLogLevel("warn");

    if (!opts.get && !taskDir) {
      program.error("error: taskdir required");
    }

    try {
      process.exitCode = await runApp({
        configFile: opts.config,
        get: opts.get,
        times: opts.times,
        taskDir,
      });
    } catch (err) {
      if (!(err instanceof TaskloopError)) throw err;
      log.error(err.message, { code: err.code });
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
