/**
 * Per-target guard pipeline: export -> normalize -> store or diff -> evaluate
 */

import { loadBaseline, saveBaseline } from "./baseline.js";
import { describeSignatureChanges, diffSnapshots } from "./diff.js";
import { describeError } from "./errors.js";
import { CommandSymbolGraphExporter, type SymbolGraphExporter } from "./exporter.js";
import { log } from "./logger.js";
import { normalizeSymbolGraph, readSymbolGraphFile } from "./normalizer.js";
import { evaluatePolicy } from "./policy.js";
import type {
  CheckedTargetResult,
  GuardConfig,
  GuardMode,
  GuardRunResult,
  Snapshot,
  TargetResult,
  UpdatedTargetResult,
} from "./types.js";

export interface GuardContext {
  config: GuardConfig;
  exporter: SymbolGraphExporter;
  /** Clock for snapshot timestamps */
  now?: () => Date;
}

export interface RunOptions {
  update: boolean;
  mode?: GuardMode;
  failOnAdditions?: boolean;
}

export function createContext(config: GuardConfig, cwd: string = process.cwd()): GuardContext {
  return {
    config,
    exporter: new CommandSymbolGraphExporter({
      cwd,
      exportCommand: config.exportCommand,
      symbolGraphDir: config.symbolGraphDir,
      outputDir: config.outputDir,
      timeoutMs: config.exportTimeoutMs,
    }),
  };
}

/**
 * Export and normalize the current API of a target
 */
export async function produceSnapshot(target: string, ctx: GuardContext): Promise<Snapshot> {
  const graphPath = await ctx.exporter.exportSymbolGraph(target);
  const graph = readSymbolGraphFile(target, graphPath);
  return normalizeSymbolGraph(graph, target, ctx.now ? ctx.now() : new Date());
}

export async function updateBaseline(
  target: string,
  ctx: GuardContext
): Promise<UpdatedTargetResult> {
  const start = Date.now();
  const snapshot = await produceSnapshot(target, ctx);
  const baselinePath = saveBaseline(snapshot, ctx.config.baselineDir);
  log.info(`✅ Updated baseline: ${target} (${snapshot.symbols.size} symbols)`);

  return {
    status: "updated",
    target,
    symbolCount: snapshot.symbols.size,
    baselinePath,
    durationMs: Date.now() - start,
  };
}

/**
 * Compare the current API of a target against its stored baseline.
 * A missing baseline is an error, never an empty snapshot.
 */
export async function checkTarget(
  target: string,
  ctx: GuardContext,
  mode: GuardMode = ctx.config.mode,
  failOnAdditions: boolean = ctx.config.failOnAdditions
): Promise<CheckedTargetResult> {
  const start = Date.now();
  const baseline = loadBaseline(ctx.config.baselineDir, target);
  const current = await produceSnapshot(target, ctx);

  const diff = diffSnapshots(baseline, current);
  const decision = evaluatePolicy(diff, mode, failOnAdditions);

  if (decision.passed) {
    log.info(`✅ ${target}: no breaking API changes`);
  } else {
    log.warning(`${target}: ${decision.outcome}`);
  }

  return {
    status: "checked",
    target,
    decision,
    changes: describeSignatureChanges(baseline, current, diff),
    durationMs: Date.now() - start,
  };
}

/**
 * Run update or check for every configured target.
 * One target's failure is recorded and does not stop the others.
 */
export async function runGuard(ctx: GuardContext, options: RunOptions): Promise<GuardRunResult> {
  const mode = options.mode ?? ctx.config.mode;
  const failOnAdditions = options.failOnAdditions ?? ctx.config.failOnAdditions;
  const results: TargetResult[] = [];

  for (const target of ctx.config.targets) {
    const start = Date.now();
    const result = await log.group(`📋 Target: ${target}`, async (): Promise<TargetResult> => {
      try {
        return options.update
          ? await updateBaseline(target, ctx)
          : await checkTarget(target, ctx, mode, failOnAdditions);
      } catch (error) {
        const info = describeError(error);
        log.error(`${target}: ${info.message}`);
        return { status: "error", target, error: info, durationMs: Date.now() - start };
      }
    });
    results.push(result);
  }

  return {
    generatedAt: new Date().toISOString(),
    update: options.update,
    mode,
    failOnAdditions,
    results,
    passed: results.every(isPassing),
  };
}

export function isPassing(result: TargetResult): boolean {
  switch (result.status) {
    case "updated":
      return true;
    case "checked":
      return result.decision.passed;
    case "error":
      return false;
  }
}
