import * as core from "@actions/core";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { QuietLogger, setLogger } from "../logger.js";
import { evaluatePolicy } from "../policy.js";
import {
  generateMarkdownReport,
  generateTextReport,
  saveReport,
  setActionOutputs,
  summarize,
} from "../reporter.js";
import type { CheckedTargetResult, GuardRunResult, TargetResult } from "../types.js";

jest.mock("@actions/core");

function checked(
  target: string,
  diff: { added?: string[]; removed?: string[]; changed?: string[] },
  changes: CheckedTargetResult["changes"] = []
): CheckedTargetResult {
  const decision = evaluatePolicy(
    { target, added: diff.added ?? [], removed: diff.removed ?? [], changed: diff.changed ?? [] },
    "semver",
    false
  );
  return { status: "checked", target, decision, changes, durationMs: 5 };
}

function run(results: TargetResult[], update = false): GuardRunResult {
  return {
    generatedAt: "2024-05-01T10:00:00.000Z",
    update,
    mode: "semver",
    failOnAdditions: false,
    results,
    passed: results.every(
      (r) => r.status === "updated" || (r.status === "checked" && r.decision.passed)
    ),
  };
}

const missing: TargetResult = {
  status: "error",
  target: "Extras",
  error: { kind: "BaselineMissing", message: "API baseline missing for target: Extras" },
  durationMs: 1,
};

beforeAll(() => {
  setLogger(new QuietLogger());
});

describe("summarize", () => {
  it("counts passing, failing and errored targets", () => {
    const summary = summarize(run([checked("Core", {}), checked("UI", { removed: ["s:x"] }), missing]));
    expect(summary).toEqual({ total: 3, passedCount: 1, failedCount: 2, errorCount: 1 });
  });
});

describe("generateTextReport", () => {
  it("lists each target and ends with OK when everything passes", () => {
    expect(generateTextReport(run([checked("Core", { added: ["s:new"] })]))).toBe(
      [
        "Target: Core",
        "  Removed: 0",
        "  Changed: 0",
        "  Added: 1",
        "  Result: OK",
        "APIGuard: OK",
        "",
      ].join("\n")
    );
  });

  it("includes errors and the failure count", () => {
    expect(generateTextReport(run([checked("Core", {}), missing]))).toBe(
      [
        "Target: Core",
        "  Removed: 0",
        "  Changed: 0",
        "  Added: 0",
        "  Result: OK",
        "Target: Extras",
        "  Error (BaselineMissing): API baseline missing for target: Extras",
        "APIGuard: FAIL (1 of 2 target(s))",
        "",
      ].join("\n")
    );
  });

  it("confirms baseline updates", () => {
    const updated: TargetResult = {
      status: "updated",
      target: "Core",
      symbolCount: 3,
      baselinePath: "/repo/api-baseline/Core.json",
      durationMs: 2,
    };
    expect(generateTextReport(run([updated], true))).toBe(
      "Updated baseline: Core\nAPIGuard: baseline updated.\n"
    );
  });
});

describe("generateMarkdownReport", () => {
  it("renders removals and signature changes", () => {
    const breaking = checked("Core", { removed: ["s:old"], changed: ["s:foo"] }, [
      { identifier: "s:foo", before: "func foo()", after: "func foo(x: Int)" },
    ]);
    const lines = generateMarkdownReport(run([breaking, missing])).split("\n");

    expect(lines[0]).toBe("# API Guard Report");
    expect(lines).toContain("**Generated:** 2024-05-01T10:00:00.000Z");
    expect(lines).toContain("| Failed | 2 |");
    expect(lines).toContain("## ❌ API Guard Failed");
    expect(lines).toContain("### ❌ Core");
    expect(lines).toContain("- **Outcome:** breaking-change");
    expect(lines).toContain("- `s:old`");

    const diffStart = lines.indexOf("```diff");
    expect(lines.slice(diffStart, diffStart + 5)).toEqual([
      "```diff",
      "@@ s:foo",
      "- func foo()",
      "+ func foo(x: Int)",
      "```",
    ]);
    expect(lines).toContain("**BaselineMissing:** API baseline missing for target: Extras");
  });

  it("collapses added symbols", () => {
    const lines = generateMarkdownReport(run([checked("Core", { added: ["s:a", "s:b"] })])).split(
      "\n"
    );
    expect(lines).toContain("## ✅ No Breaking API Changes");
    expect(lines).toContain("<summary><strong>Added (2)</strong></summary>");
    expect(lines).toContain("- `s:b`");
  });
});

describe("saveReport", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "apiguard-report-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes canonical JSON and markdown", () => {
    const result = run([missing]);
    const saved = saveReport(result, "# report", dir);

    expect(saved).toEqual({
      jsonPath: path.join(dir, "apiguard-report", "apiguard-report.json"),
      markdownPath: path.join(dir, "apiguard-report", "API_GUARD_REPORT.md"),
    });
    expect(fs.readFileSync(saved.markdownPath, "utf-8")).toBe("# report");

    const json = fs.readFileSync(saved.jsonPath, "utf-8");
    expect(json.endsWith("}\n")).toBe(true);
    expect(json.startsWith('{"failOnAdditions":false,"generatedAt":"2024-05-01T10:00:00.000Z"')).toBe(
      true
    );
    expect(JSON.parse(json).results[0].error.kind).toBe("BaselineMissing");
  });
});

describe("setActionOutputs", () => {
  it("publishes status and counts", () => {
    setActionOutputs(run([checked("Core", {}), missing]), {
      jsonPath: "/r/report.json",
      markdownPath: "/r/report.md",
    });

    expect(core.setOutput).toHaveBeenCalledWith("status", "failed");
    expect(core.setOutput).toHaveBeenCalledWith("report_path", "/r/report.md");
    expect(core.setOutput).toHaveBeenCalledWith("json_report_path", "/r/report.json");
    expect(core.setOutput).toHaveBeenCalledWith("passed_count", 1);
    expect(core.setOutput).toHaveBeenCalledWith("failed_count", 1);
  });
});
