import type { RunResult } from "./types.js";
import { FixerRunError, ProcessError } from "./errors.js";

export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

function plural(n: number): string {
  return `${n} file${n === 1 ? "" : "s"}`;
}

/**
 * Human-readable outcome lines for a completed run.
 */
export function formatRunSummary(result: RunResult): string[] {
  if (result.totalFiles === 0) {
    return ["No changed files to check"];
  }

  if (!result.firstFailure) {
    return [`Checked ${plural(result.filesProcessed.length)}, no style violations`];
  }

  const { file, exitCode } = result.firstFailure;
  return [
    `Style violations in ${file.path} (exit ${exitCode})`,
    `Aborted after ${result.filesProcessed.length} of ${plural(result.totalFiles)} ` +
      `in ${formatSeconds(result.elapsedMillis)} seconds`,
  ];
}

/**
 * Abort report for a fatal error: what failed, on which file if any, and
 * how long the run had been going. The run's own `elapsedMillis`, when the
 * error carries one, wins over `fallbackMillis`.
 */
export function formatErrorReport(error: unknown, fallbackMillis: number): string[] {
  const lines = [error instanceof Error ? error.message : String(error)];
  const recorded = error instanceof FixerRunError ? error.context.elapsedMillis : undefined;
  const elapsedMillis = typeof recorded === "number" ? recorded : fallbackMillis;

  if (error instanceof ProcessError && error.file) {
    lines.push(`Terminating file: ${error.file}`);
  }
  if (error instanceof FixerRunError && error.interrupted) {
    lines.push("Run was interrupted");
  }

  lines.push(`Aborted after ${formatSeconds(elapsedMillis)} seconds`);
  return lines;
}

export interface JsonReport {
  success: boolean;
  totalFiles: number;
  filesProcessed: string[];
  firstFailure: { file: string; exitCode: number } | null;
  elapsedMillis: number;
}

export function buildJsonReport(result: RunResult): JsonReport {
  return {
    success: result.success,
    totalFiles: result.totalFiles,
    filesProcessed: result.filesProcessed.map((f) => f.path),
    firstFailure: result.firstFailure
      ? { file: result.firstFailure.file.path, exitCode: result.firstFailure.exitCode }
      : null,
    elapsedMillis: result.elapsedMillis,
  };
}
