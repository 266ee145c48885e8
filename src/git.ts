import { stat } from "node:fs/promises";
import { join } from "node:path";
import type {
  ChangedFile,
  CommandResult,
  RevisionInputs,
  RevisionPair,
} from "./types.js";
import { DiffUnavailableError, ConfigError } from "./errors.js";
import { exec } from "./utils.js";

/** Wide enough that git never shortens a path with "...". */
const STAT_WIDTH = 1000;

export type GitRunner = (
  args: string[],
  cwd: string,
  signal?: AbortSignal,
) => Promise<CommandResult>;

const runGit: GitRunner = (args, cwd, signal) =>
  exec("git", args, { cwd, signal });

// ── Revision inputs ──────────────────────────────────────────────────

/**
 * Pick the baseline revision: the last successful build's commit when the
 * CI server knows it, otherwise the previous build's commit.
 */
export function toRevisionPair(inputs: RevisionInputs): RevisionPair {
  const current = inputs.currentRevision?.trim();
  if (!current) {
    throw new ConfigError(
      "No current revision. Pass --current or set GIT_COMMIT.",
    );
  }

  const previous =
    inputs.previousSuccessfulRevision?.trim() ||
    inputs.previousRevision?.trim() ||
    undefined;

  return previous
    ? { previousRevision: previous, currentRevision: current }
    : { currentRevision: current };
}

// ── Stat parsing ─────────────────────────────────────────────────────

/**
 * Extract candidate paths from `git diff --stat` output.
 *
 *   src/a.php | 3 ++-
 *   README.md | 1 +
 *    2 files changed, 3 insertions(+), 1 deletion(-)
 *
 * The last line is the summary and never a file.
 */
export function parseStatOutput(output: string): string[] {
  const lines = output.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  const paths: string[] = [];
  for (const line of lines.slice(0, -1)) {
    const path = line.replace(/\|.*$/, "").trim();
    if (path) paths.push(path);
  }
  return paths;
}

/**
 * Case-sensitive suffix match. The suffix alone (e.g. ".php") does not
 * count as a match.
 */
export function matchesExtension(path: string, extension: string): boolean {
  return path.length > extension.length && path.endsWith(extension);
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

// ── Change list ──────────────────────────────────────────────────────

export interface ResolveOptions {
  runGit?: GitRunner;
  signal?: AbortSignal;
}

/**
 * List files changed between two revisions that match `extensionFilter`
 * and still exist under `workingDir`, in git's output order.
 */
export async function resolveChangedFiles(
  pair: RevisionPair,
  workingDir: string,
  extensionFilter: string,
  options: ResolveOptions = {},
): Promise<ChangedFile[]> {
  const { previousRevision, currentRevision } = pair;

  if (previousRevision === undefined || previousRevision === currentRevision) {
    return [];
  }

  const args = [
    "diff",
    `--stat=${STAT_WIDTH}`,
    previousRevision,
    currentRevision,
  ];
  const result = await (options.runGit ?? runGit)(
    args,
    workingDir,
    options.signal,
  );

  if (!result.success) {
    const range = `${previousRevision}..${currentRevision}`;
    const reason = result.interrupted
      ? "interrupted"
      : result.failedToStart
        ? `git could not be started: ${result.stderr.trim()}`
        : `git exited with ${result.exitCode}: ${result.stderr.trim()}`;
    throw new DiffUnavailableError(
      `Failed to list changed files for ${range} (${reason})`,
      {
        range,
        exitCode: result.exitCode,
        interrupted: result.interrupted,
      },
    );
  }

  const files: ChangedFile[] = [];
  for (const path of parseStatOutput(result.stdout)) {
    if (!matchesExtension(path, extensionFilter)) continue;
    // Deleted or renamed away since the diff was taken
    if (!(await isRegularFile(join(workingDir, path)))) continue;
    files.push({ path });
  }

  return files;
}
