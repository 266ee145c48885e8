import { describe, it, expect } from "vitest";
import {
  buildJsonReport,
  formatErrorReport,
  formatRunSummary,
  formatSeconds,
} from "../src/reporter.js";
import { DiffUnavailableError, ProcessError } from "../src/errors.js";
import type { RunResult } from "../src/types.js";

// ── Helpers ───────────────────────────────────────────────────────────

const passed: RunResult = {
  filesProcessed: [{ path: "src/a.php" }, { path: "src/b.php" }],
  totalFiles: 2,
  elapsedMillis: 1_234,
  success: true,
};

const aborted: RunResult = {
  filesProcessed: [{ path: "src/a.php" }, { path: "src/b.php" }],
  totalFiles: 5,
  firstFailure: { file: { path: "src/b.php" }, exitCode: 8 },
  elapsedMillis: 2_005,
  success: false,
};

// ── Tests ─────────────────────────────────────────────────────────────

describe("formatSeconds", () => {
  it("prints two decimals", () => {
    expect(formatSeconds(1_234)).toBe("1.23");
    expect(formatSeconds(0)).toBe("0.00");
    expect(formatSeconds(61_500)).toBe("61.50");
  });
});

describe("formatRunSummary", () => {
  it("reports an empty change set", () => {
    const result: RunResult = {
      filesProcessed: [],
      totalFiles: 0,
      elapsedMillis: 3,
      success: true,
    };
    expect(formatRunSummary(result)).toEqual(["No changed files to check"]);
  });

  it("reports a clean run", () => {
    expect(formatRunSummary(passed)).toEqual(["Checked 2 files, no style violations"]);
  });

  it("uses the singular for one file", () => {
    const result: RunResult = { ...passed, filesProcessed: [{ path: "a.php" }], totalFiles: 1 };
    expect(formatRunSummary(result)).toEqual(["Checked 1 file, no style violations"]);
  });

  it("names the terminating file and elapsed time on abort", () => {
    expect(formatRunSummary(aborted)).toEqual([
      "Style violations in src/b.php (exit 8)",
      "Aborted after 2 of 5 files in 2.00 seconds",
    ]);
  });
});

describe("formatErrorReport", () => {
  it("names the file for a process error", () => {
    const error = new ProcessError("Failed to run php-cs-fixer on src/c.php: spawn php ENOENT", {
      file: "src/c.php",
    });

    expect(formatErrorReport(error, 1_500)).toEqual([
      "Failed to run php-cs-fixer on src/c.php: spawn php ENOENT",
      "Terminating file: src/c.php",
      "Aborted after 1.50 seconds",
    ]);
  });

  it("prefers the elapsed time recorded by the run", () => {
    const error = new ProcessError("Failed to run php-cs-fixer on src/c.php: killed", {
      file: "src/c.php",
      elapsedMillis: 2_340,
    });

    expect(formatErrorReport(error, 9_999)).toEqual([
      "Failed to run php-cs-fixer on src/c.php: killed",
      "Terminating file: src/c.php",
      "Aborted after 2.34 seconds",
    ]);
  });

  it("flags an interrupted run", () => {
    const error = new DiffUnavailableError("Failed to list changed files", { interrupted: true });

    expect(formatErrorReport(error, 40)).toEqual([
      "Failed to list changed files",
      "Run was interrupted",
      "Aborted after 0.04 seconds",
    ]);
  });

  it("handles non-Error values", () => {
    expect(formatErrorReport("boom", 0)).toEqual(["boom", "Aborted after 0.00 seconds"]);
  });
});

describe("buildJsonReport", () => {
  it("flattens files to paths", () => {
    expect(buildJsonReport(aborted)).toEqual({
      success: false,
      totalFiles: 5,
      filesProcessed: ["src/a.php", "src/b.php"],
      firstFailure: { file: "src/b.php", exitCode: 8 },
      elapsedMillis: 2_005,
    });
  });

  it("uses null when nothing failed", () => {
    expect(buildJsonReport(passed).firstFailure).toBeNull();
  });
});
