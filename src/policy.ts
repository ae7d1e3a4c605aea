/**
 * Breaking-change policy
 */

import type { Decision, DecisionOutcome, GuardMode, SnapshotDiff } from "./types.js";

interface Verdict {
  outcome: DecisionOutcome;
  reason?: string;
}

function judge(diff: SnapshotDiff, mode: GuardMode, failOnAdditions: boolean): Verdict {
  const hasBreaking = diff.removed.length > 0 || diff.changed.length > 0;
  const hasAdditions = diff.added.length > 0;

  switch (mode) {
    case "strict":
      if (hasBreaking || hasAdditions) {
        return {
          outcome: "strict-violation",
          reason: "strict mode: any API change is disallowed",
        };
      }
      return { outcome: "pass" };

    case "semver":
      if (hasBreaking) {
        return { outcome: "breaking-change", reason: "semver mode: breaking API change" };
      }
      if (failOnAdditions && hasAdditions) {
        return { outcome: "breaking-change", reason: "semver mode: additions are not allowed" };
      }
      return { outcome: "pass" };
  }
}

function renderReport(diff: SnapshotDiff, verdict: Verdict): string {
  const lines: string[] = [`Target: ${diff.target}`];

  lines.push(`  Removed: ${diff.removed.length}`);
  for (const id of diff.removed) lines.push(`    - ${id}`);

  lines.push(`  Changed: ${diff.changed.length}`);
  for (const id of diff.changed) lines.push(`    ~ ${id}`);

  lines.push(`  Added: ${diff.added.length}`);

  lines.push(verdict.reason ? `  Result: FAIL (${verdict.reason})` : "  Result: OK");
  return lines.join("\n");
}

/**
 * Decide whether a diff is acceptable under the given mode.
 * The report is produced for passing decisions too.
 */
export function evaluatePolicy(
  diff: SnapshotDiff,
  mode: GuardMode,
  failOnAdditions: boolean
): Decision {
  const verdict = judge(diff, mode, failOnAdditions);
  return {
    target: diff.target,
    mode,
    failOnAdditions,
    passed: verdict.outcome === "pass",
    outcome: verdict.outcome,
    diff,
    report: renderReport(diff, verdict),
  };
}
