/**
 * Report generator for API guard runs
 */

import * as core from "@actions/core";
import * as fs from "fs";
import * as path from "path";
import { canonicalStringify } from "./canonical.js";
import { formatSignatureChange } from "./diff.js";
import { log } from "./logger.js";
import { isPassing } from "./guard.js";
import type { GuardRunResult, TargetResult } from "./types.js";

export interface ReportSummary {
  total: number;
  passedCount: number;
  failedCount: number;
  errorCount: number;
}

export interface SavedReport {
  jsonPath: string;
  markdownPath: string;
}

export function summarize(run: GuardRunResult): ReportSummary {
  const passedCount = run.results.filter(isPassing).length;
  return {
    total: run.results.length,
    passedCount,
    failedCount: run.results.length - passedCount,
    errorCount: run.results.filter((r) => r.status === "error").length,
  };
}

function textForResult(result: TargetResult): string {
  switch (result.status) {
    case "updated":
      return `Updated baseline: ${result.target}`;
    case "checked":
      return result.decision.report;
    case "error":
      return `Target: ${result.target}\n  Error (${result.error.kind}): ${result.error.message}`;
  }
}

/**
 * Plain text report for terminal output
 */
export function generateTextReport(run: GuardRunResult): string {
  const lines = run.results.map(textForResult);
  const summary = summarize(run);

  if (run.update) {
    lines.push(
      run.passed
        ? "APIGuard: baseline updated."
        : `APIGuard: baseline update failed for ${summary.failedCount} of ${summary.total} target(s).`
    );
  } else {
    lines.push(
      run.passed
        ? "APIGuard: OK"
        : `APIGuard: FAIL (${summary.failedCount} of ${summary.total} target(s))`
    );
  }
  return lines.join("\n") + "\n";
}

/**
 * Generate markdown report
 */
export function generateMarkdownReport(run: GuardRunResult): string {
  const summary = summarize(run);
  const lines: string[] = [];

  lines.push(run.update ? "# API Baseline Update" : "# API Guard Report");
  lines.push("");
  lines.push(`**Generated:** ${run.generatedAt}`);
  lines.push(`**Mode:** ${run.mode}${run.failOnAdditions ? " (additions disallowed)" : ""}`);
  lines.push("");

  lines.push("## Summary");
  lines.push("");
  lines.push(`| Metric | Value |`);
  lines.push(`|--------|-------|`);
  lines.push(`| Targets | ${summary.total} |`);
  lines.push(`| Passed | ${summary.passedCount} |`);
  lines.push(`| Failed | ${summary.failedCount} |`);
  lines.push(`| Errors | ${summary.errorCount} |`);
  lines.push("");

  lines.push(run.passed ? "## ✅ No Breaking API Changes" : "## ❌ API Guard Failed");
  lines.push("");

  for (const result of run.results) {
    const statusIcon = isPassing(result) ? "✅" : "❌";
    lines.push(`### ${statusIcon} ${result.target}`);
    lines.push("");

    switch (result.status) {
      case "updated":
        lines.push(`Baseline written with ${result.symbolCount} public symbols.`);
        lines.push("");
        break;

      case "error":
        lines.push(`**${result.error.kind}:** ${result.error.message}`);
        lines.push("");
        break;

      case "checked": {
        const { diff, outcome } = result.decision;
        lines.push(`- **Outcome:** ${outcome}`);
        lines.push(`- **Removed:** ${diff.removed.length}`);
        lines.push(`- **Changed:** ${diff.changed.length}`);
        lines.push(`- **Added:** ${diff.added.length}`);
        lines.push("");

        if (diff.removed.length > 0) {
          lines.push("#### Removed");
          lines.push("");
          for (const id of diff.removed) lines.push(`- \`${id}\``);
          lines.push("");
        }

        if (result.changes.length > 0) {
          lines.push("#### Changed");
          lines.push("");
          lines.push("```diff");
          lines.push(result.changes.map(formatSignatureChange).join("\n"));
          lines.push("```");
          lines.push("");
        }

        if (diff.added.length > 0) {
          lines.push("<details>");
          lines.push(`<summary><strong>Added (${diff.added.length})</strong></summary>`);
          lines.push("");
          for (const id of diff.added) lines.push(`- \`${id}\``);
          lines.push("");
          lines.push("</details>");
          lines.push("");
        }
        break;
      }
    }
  }

  return lines.join("\n");
}

/**
 * Save JSON and markdown reports under `<outputDir>/apiguard-report`
 */
export function saveReport(run: GuardRunResult, markdown: string, outputDir: string): SavedReport {
  const reportDir = path.join(outputDir, "apiguard-report");
  fs.mkdirSync(reportDir, { recursive: true });

  const jsonPath = path.join(reportDir, "apiguard-report.json");
  fs.writeFileSync(jsonPath, canonicalStringify(run) + "\n");
  log.info(`📄 JSON report saved to: ${jsonPath}`);

  const markdownPath = path.join(reportDir, "API_GUARD_REPORT.md");
  fs.writeFileSync(markdownPath, markdown);
  log.info(`📄 Markdown report saved to: ${markdownPath}`);

  return { jsonPath, markdownPath };
}

/**
 * Publish step outputs for the Action
 */
export function setActionOutputs(run: GuardRunResult, saved: SavedReport): void {
  const summary = summarize(run);
  core.setOutput("status", run.passed ? "passed" : "failed");
  core.setOutput("report_path", saved.markdownPath);
  core.setOutput("json_report_path", saved.jsonPath);
  core.setOutput("passed_count", summary.passedCount);
  core.setOutput("failed_count", summary.failedCount);
}
