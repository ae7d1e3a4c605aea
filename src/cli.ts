#!/usr/bin/env node
/**
 * apiguard CLI - block breaking API changes
 */

import { Command, Option } from "commander";
import { z } from "zod";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createContext, runGuard } from "./guard.js";
import { ConsoleLogger, QuietLogger, log, setLogger } from "./logger.js";
import { generateMarkdownReport, generateTextReport, saveReport } from "./reporter.js";

export const VERSION = "1.1.0";

export const CliOptionsSchema = z.object({
  config: z.string().default(DEFAULT_CONFIG_PATH),
  update: z.boolean().default(false),
  mode: z.enum(["semver", "strict"]).optional(),
  failOnAdditions: z.boolean().optional(),
  reportDir: z.string().optional(),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

const HELP_EPILOG = `
Configuration (.apiguard.json):
  {
    "targets": ["YourPublicTarget"],
    "mode": "semver",
    "baselineDir": "api-baseline",
    "outputDir": ".build/apiguard",
    "failOnAdditions": false
  }

Modes:
  semver   Fail only on breaking changes (removals, signature changes)
  strict   Fail on any API change (additions, removals, changes)

Workflow:
  1. First run: apiguard --update  (creates baseline)
  2. CI runs:   apiguard           (compares against baseline)
  3. On API change: apiguard --update && commit

Exit codes:
  0  No breaking changes (or baseline updated)
  1  Breaking changes detected or error occurred`;

/**
 * Run the guard with parsed CLI options and return the process exit code
 */
export async function runCli(options: CliOptions, cwd: string = process.cwd()): Promise<number> {
  setLogger(options.quiet ? new QuietLogger() : new ConsoleLogger(options.verbose));

  try {
    const config = loadConfig(options.config, cwd);
    const run = await runGuard(createContext(config, cwd), {
      update: options.update,
      mode: options.mode,
      failOnAdditions: options.failOnAdditions,
    });

    if (options.reportDir) {
      saveReport(run, generateMarkdownReport(run), options.reportDir);
    }

    const report = generateTextReport(run);
    if (run.passed) {
      process.stdout.write(report);
      return 0;
    }
    process.stderr.write(report);
    return 1;
  } catch (error) {
    log.error(describeError(error).message);
    return 1;
  }
}

export function buildProgram(onRun: (options: CliOptions) => Promise<void>): Command {
  return new Command("apiguard")
    .description("Snapshot public API symbol graphs and block breaking changes")
    .version(VERSION, "-v, --version", "Show version number")
    .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
    .option("--update", "Update baseline snapshots with current API", false)
    .addOption(
      new Option("--mode <mode>", "Override the configured mode").choices(["semver", "strict"])
    )
    .option("--fail-on-additions", "Fail on added symbols in semver mode")
    .option("--no-fail-on-additions", "Allow added symbols even if the config disallows them")
    .option("--report-dir <dir>", "Write JSON and markdown reports to this directory")
    .option("--verbose", "Show debug output", false)
    .option("-q, --quiet", "Only print errors and the final report", false)
    .addHelpText("after", HELP_EPILOG)
    .action(async (rawOptions: unknown) => {
      await onRun(CliOptionsSchema.parse(rawOptions));
    });
}

if (require.main === module) {
  buildProgram(async (options) => {
    process.exit(await runCli(options));
  })
    .parseAsync(process.argv)
    .catch((error) => {
      console.error(`apiguard error: ${describeError(error).message}`);
      process.exit(1);
    });
}
