import { resolve } from "node:path";
import ora from "ora";
import chalk from "chalk";
import type {
  CliOptions,
  OutputSink,
  RunConfiguration,
  RevisionPair,
  RunResult,
} from "./types.js";
import { loadRunConfiguration } from "./config.js";
import { resolveChangedFiles, toRevisionPair, type GitRunner } from "./git.js";
import { createFixer, type DownloadRunner, type Fixer } from "./fixer.js";
import { ConsoleDecorator } from "./console.js";
import { execaLauncher, type ProcessLauncher } from "./launcher.js";
import { runFixer } from "./runner.js";
import { buildJsonReport, formatErrorReport, formatRunSummary } from "./reporter.js";
import {
  inheritedEnv,
  logInfo,
  logSuccess,
  logWarn,
  logError,
} from "./utils.js";

export const EXIT_OK = 0;
export const EXIT_VIOLATION = 1;
export const EXIT_ERROR = 2;
export const EXIT_INTERRUPTED = 130;

/** Process-facing collaborators; the defaults spawn real processes. */
export interface RunDeps {
  launcher?: ProcessLauncher;
  runGit?: GitRunner;
  runDownload?: DownloadRunner;
  /** Where decorated fixer output goes. Defaults to process.stdout. */
  stdout?: OutputSink;
  /** Cancels the run like SIGINT does. */
  signal?: AbortSignal;
}

async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  done: (value: T) => string,
  failed: string,
): Promise<T> {
  const spinner = ora(text).start();
  try {
    const value = await task();
    spinner.succeed(done(value));
    return value;
  } catch (err) {
    spinner.fail(failed);
    throw err;
  }
}

function describePair(pair: RevisionPair): string {
  return pair.previousRevision
    ? `Checking changes ${pair.previousRevision}..${pair.currentRevision}`
    : `No baseline revision for ${pair.currentRevision}; nothing to compare`;
}

function reportResult(result: RunResult, json: boolean): void {
  const lines = formatRunSummary(result);
  if (result.success) {
    for (const line of lines) logSuccess(line);
  } else {
    for (const line of lines) logWarn(line);
  }

  if (json) {
    console.log(JSON.stringify(buildJsonReport(result), null, 2));
  }
}

/**
 * Resolve, fetch and fix, then map the outcome to a process exit code.
 */
export async function run(opts: CliOptions, deps: RunDeps = {}): Promise<number> {
  const startTime = Date.now();

  console.error(
    chalk.bold("\n  csfix-changed") + chalk.dim("  php-cs-fixer on changed files\n"),
  );

  const workingDir = resolve(opts.cwd ?? process.cwd());

  // ── Step 0: Configuration and revisions ────────────────────────
  let config: RunConfiguration;
  let pair: RevisionPair;
  try {
    config = await loadRunConfiguration({
      workingDir,
      globalConfigPath: opts.globalConfig,
      projectConfigPath: opts.projectConfig,
      overrides: {
        fixerPath: opts.fixerPath,
        parameters: opts.parameters,
        projectParameters: opts.projectParameters,
        extension: opts.extension,
      },
    });
    pair = toRevisionPair({
      previousSuccessfulRevision: opts.previousSuccessful,
      previousRevision: opts.previous,
      currentRevision: opts.current,
    });
  } catch (err) {
    logError(err instanceof Error ? err.message : String(err));
    return EXIT_ERROR;
  }

  logInfo(describePair(pair));

  // ── Step 1: Cancellation ───────────────────────────────────────
  const controller = new AbortController();
  const onSignal = (): void => {
    logWarn("Interrupted, stopping php-cs-fixer...");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  deps.signal?.addEventListener("abort", onSignal, { once: true });
  if (deps.signal?.aborted) controller.abort();

  const signal = controller.signal;
  const env = inheritedEnv();
  const decorator = new ConsoleDecorator(deps.stdout ?? process.stdout, {
    annotate: opts.annotate,
  });
  const baseFixer = createFixer(config, {
    workingDir,
    env,
    signal,
    runDownload: deps.runDownload,
  });

  const fixer: Fixer = {
    prepare: () =>
      config.fixerPathOverride
        ? baseFixer.prepare()
        : withSpinner(
            `Fetching php-cs-fixer from ${config.downloadUrl}...`,
            () => baseFixer.prepare(),
            () => `php-cs-fixer saved to ${config.artifactPath}`,
            "Failed to fetch php-cs-fixer",
          ),
    compose: baseFixer.compose,
  };

  // ── Step 2: Resolve, fetch, fix ────────────────────────────────
  try {
    const result = await runFixer({
      listFiles: () =>
        withSpinner(
          "Resolving changed files...",
          () =>
            resolveChangedFiles(pair, workingDir, config.extensionFilter, {
              signal,
              runGit: deps.runGit,
            }),
          (files) => `${files.length} changed ${config.extensionFilter} file(s)`,
          "Failed to resolve changed files",
        ),
      fixer,
      launcher: deps.launcher ?? execaLauncher,
      decorator,
      workingDir,
      env,
      signal,
    });

    reportResult(result, opts.json);
    return result.success ? EXIT_OK : EXIT_VIOLATION;
  } catch (err) {
    for (const line of formatErrorReport(err, Date.now() - startTime)) {
      logError(line);
    }
    return signal.aborted ? EXIT_INTERRUPTED : EXIT_ERROR;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    deps.signal?.removeEventListener("abort", onSignal);
  }
}
