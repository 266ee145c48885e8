import type { CommandResult, RunConfiguration } from "./types.js";
import { FixerUnavailableError } from "./errors.js";
import { exec, tokenize } from "./utils.js";

// ── Argument composition ─────────────────────────────────────────────

/**
 * The parameter string for this run. Project parameters replace the
 * global ones outright; the two are never merged.
 */
export function selectParameters(config: RunConfiguration): string {
  return config.projectParameters ? config.projectParameters : config.globalParameters;
}

/**
 * Build the full fixer command line for one file.
 *
 * With an override:  [fixerPath, ...params, targetFile]
 * Without:           [php, php-cs-fixer, ...params, targetFile]
 */
export function composeArguments(
  config: RunConfiguration,
  targetFile: string,
): string[] {
  const head = config.fixerPathOverride
    ? [config.fixerPathOverride]
    : [config.phpBinary, config.artifactPath];

  return [...head, ...tokenize(selectParameters(config)), targetFile];
}

// ── Acquisition ──────────────────────────────────────────────────────

export type DownloadRunner = (
  args: string[],
  cwd: string,
  env: Record<string, string>,
  signal?: AbortSignal,
) => Promise<CommandResult>;

const runDownload: DownloadRunner = (args, cwd, env, signal) =>
  exec("wget", args, { cwd, env, signal });

export interface FixerContext {
  workingDir: string;
  env: Record<string, string>;
  signal?: AbortSignal;
  runDownload?: DownloadRunner;
}

/**
 * Fetch the fixer phar into the working directory when no executable is
 * configured. Fetches again on every call.
 */
export async function acquireFixer(
  config: RunConfiguration,
  context: FixerContext,
): Promise<void> {
  if (config.fixerPathOverride) return;

  const result = await (context.runDownload ?? runDownload)(
    [config.downloadUrl, "-O", config.artifactPath],
    context.workingDir,
    context.env,
    context.signal,
  );

  if (!result.success) {
    const reason = result.interrupted
      ? "interrupted"
      : result.failedToStart
        ? `wget could not be started: ${result.stderr.trim()}`
        : `wget exited with ${result.exitCode}`;
    throw new FixerUnavailableError(
      `Failed to download php-cs-fixer from ${config.downloadUrl} (${reason})`,
      {
        url: config.downloadUrl,
        exitCode: result.exitCode,
        interrupted: result.interrupted,
      },
    );
  }
}

// ── Runner binding ───────────────────────────────────────────────────

/** What the per-file runner needs from the fixer side. */
export interface Fixer {
  /** Called once, before the first file, only when there are files. */
  prepare(): Promise<void>;
  compose(targetFile: string): string[];
}

export function createFixer(
  config: RunConfiguration,
  context: FixerContext,
): Fixer {
  return {
    prepare: () => acquireFixer(config, context),
    compose: (targetFile) => composeArguments(config, targetFile),
  };
}
