/**
 * Type definitions for the API guard
 */

import type { ErrorInfo } from "./errors.js";

export type GuardMode = "semver" | "strict";

export interface GuardConfig {
  targets: string[];
  mode: GuardMode;
  baselineDir: string;
  outputDir: string;
  failOnAdditions: boolean;
  exportCommand: string[];
  symbolGraphDir: string;
  exportTimeoutMs: number;
}

/**
 * Normalized public API surface of one target at a point in time
 */
export interface Snapshot {
  target: string;
  /** ISO-8601; informational only, never compared */
  createdAt: string;
  /** precise identifier -> normalized declaration */
  symbols: Map<string, string>;
}

export interface SnapshotDiff {
  target: string;
  added: string[];
  removed: string[];
  changed: string[];
}

export interface SignatureChange {
  identifier: string;
  before: string;
  after: string;
}

export type DecisionOutcome = "pass" | "breaking-change" | "strict-violation";

export interface Decision {
  target: string;
  mode: GuardMode;
  failOnAdditions: boolean;
  passed: boolean;
  outcome: DecisionOutcome;
  diff: SnapshotDiff;
  report: string;
}

interface TargetResultBase {
  target: string;
  durationMs: number;
}

export interface UpdatedTargetResult extends TargetResultBase {
  status: "updated";
  symbolCount: number;
  baselinePath: string;
}

export interface CheckedTargetResult extends TargetResultBase {
  status: "checked";
  decision: Decision;
  changes: SignatureChange[];
}

export interface FailedTargetResult extends TargetResultBase {
  status: "error";
  error: ErrorInfo;
}

export type TargetResult = UpdatedTargetResult | CheckedTargetResult | FailedTargetResult;

export interface GuardRunResult {
  generatedAt: string;
  update: boolean;
  mode: GuardMode;
  failOnAdditions: boolean;
  results: TargetResult[];
  passed: boolean;
}
