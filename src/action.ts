/**
 * GitHub Action entry point
 */

import * as core from "@actions/core";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config.js";
import { ConfigInvalidError, describeError } from "./errors.js";
import { createContext, runGuard } from "./guard.js";
import { ActionsLogger, setLogger } from "./logger.js";
import {
  generateMarkdownReport,
  generateTextReport,
  saveReport,
  setActionOutputs,
} from "./reporter.js";
import type { GuardMode } from "./types.js";

export interface ActionInputs {
  configPath: string;
  update: boolean;
  mode?: GuardMode;
  failOnAdditions?: boolean;
}

/**
 * Parse an optional boolean input; empty means "use the config file"
 */
function parseOptionalBoolean(name: string): boolean | undefined {
  const raw = core.getInput(name).trim().toLowerCase();
  if (raw === "") return undefined;
  if (raw === "true") return true;
  if (raw === "false") return false;
  throw new ConfigInvalidError(`input ${name}`, [`expected true or false, got "${raw}"`]);
}

function parseMode(): GuardMode | undefined {
  const raw = core.getInput("mode").trim();
  if (raw === "") return undefined;
  if (raw === "semver" || raw === "strict") return raw;
  throw new ConfigInvalidError("input mode", [`expected semver or strict, got "${raw}"`]);
}

export function getActionInputs(): ActionInputs {
  return {
    configPath: core.getInput("config") || DEFAULT_CONFIG_PATH,
    update: parseOptionalBoolean("update") ?? false,
    mode: parseMode(),
    failOnAdditions: parseOptionalBoolean("fail-on-additions"),
  };
}

export async function run(): Promise<void> {
  setLogger(new ActionsLogger());

  try {
    const inputs = getActionInputs();
    const config = loadConfig(inputs.configPath);
    const result = await runGuard(createContext(config), {
      update: inputs.update,
      mode: inputs.mode,
      failOnAdditions: inputs.failOnAdditions,
    });

    const markdown = generateMarkdownReport(result);
    const saved = saveReport(result, markdown, config.outputDir);
    setActionOutputs(result, saved);
    await core.summary.addRaw(markdown).write();

    core.info(generateTextReport(result));
    if (!result.passed) {
      core.setFailed("API guard failed: see the report for details");
    }
  } catch (error) {
    core.setFailed(describeError(error).message);
  }
}
