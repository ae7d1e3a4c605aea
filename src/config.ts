/**
 * Configuration loading (.apiguard.json)
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigInvalidError, ConfigNotFoundError } from "./errors.js";
import { formatIssues } from "./normalizer.js";
import type { GuardConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = ".apiguard.json";

export const GuardConfigSchema = z.object({
  targets: z.array(z.string().min(1)).min(1),
  mode: z.enum(["semver", "strict"]).default("semver"),
  baselineDir: z.string().min(1).default("api-baseline"),
  outputDir: z.string().min(1).default(".build/apiguard"),
  failOnAdditions: z.boolean().default(false),
  exportCommand: z
    .array(z.string().min(1))
    .min(1)
    .default(["swift", "package", "dump-symbol-graph"]),
  symbolGraphDir: z.string().min(1).default(".build/symbol-graphs"),
  // A full module build can take several minutes
  exportTimeoutMs: z.number().int().positive().default(600_000),
});

/**
 * Parse configuration text. Relative directories are resolved against `cwd`.
 */
export function parseConfig(text: string, source: string, cwd: string): GuardConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigInvalidError(source, [error instanceof Error ? error.message : String(error)]);
  }

  const parsed = GuardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigInvalidError(source, formatIssues(parsed.error));
  }

  const config: GuardConfig = parsed.data;
  return {
    ...config,
    baselineDir: path.resolve(cwd, config.baselineDir),
    outputDir: path.resolve(cwd, config.outputDir),
    symbolGraphDir: path.resolve(cwd, config.symbolGraphDir),
  };
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, cwd: string = process.cwd()): GuardConfig {
  const file = path.resolve(cwd, configPath);
  if (!fs.existsSync(file)) {
    throw new ConfigNotFoundError(file);
  }
  return parseConfig(fs.readFileSync(file, "utf-8"), file, cwd);
}
