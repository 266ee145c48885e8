import type { ChangedFile, FirstFailure, RunResult } from "./types.js";
import type { Fixer } from "./fixer.js";
import type { ProcessLauncher } from "./launcher.js";
import type { ConsoleDecorator } from "./console.js";
import { FixerRunError, ProcessError } from "./errors.js";
import { formatSeconds } from "./reporter.js";
import { logInfo, logStep } from "./utils.js";

export interface RunOptions {
  /** Produces the change list; its errors abort the run. */
  listFiles: () => Promise<ChangedFile[]>;
  fixer: Fixer;
  launcher: ProcessLauncher;
  decorator: ConsoleDecorator;
  workingDir: string;
  env: Record<string, string>;
  signal?: AbortSignal;
  clock?: () => number;
}

/**
 * Run the fixer over each changed file in turn, stopping at the first
 * non-zero exit. The decorator is flushed exactly once however the run ends,
 * and a fatal error leaves with the same `elapsedMillis` the log reports.
 */
export async function runFixer(options: RunOptions): Promise<RunResult> {
  const { fixer, launcher, decorator, workingDir, env, signal } = options;
  const clock = options.clock ?? Date.now;
  const startTime = clock();

  logStep("Starting to run php-cs-fixer");

  const filesProcessed: ChangedFile[] = [];
  let firstFailure: FirstFailure | undefined;
  let totalFiles = 0;
  let elapsedMillis = 0;
  let failure: unknown;

  try {
    const files = await options.listFiles();
    totalFiles = files.length;

    if (files.length > 0) {
      await fixer.prepare();
    }

    for (const file of files) {
      let exitCode: number;
      try {
        exitCode = await launcher.launch({
          argv: fixer.compose(file.path),
          cwd: workingDir,
          env,
          output: decorator,
          signal,
        });
      } catch (err) {
        const cause = err instanceof Error ? err.message : String(err);
        const context = err instanceof ProcessError ? err.context : {};
        throw new ProcessError(`Failed to run php-cs-fixer on ${file.path}: ${cause}`, {
          ...context,
          file: file.path,
        });
      }

      filesProcessed.push(file);

      if (exitCode !== 0) {
        firstFailure = { file, exitCode };
        break;
      }
    }
  } catch (err) {
    failure = err;
    throw err;
  } finally {
    elapsedMillis = clock() - startTime;
    if (failure instanceof FixerRunError) {
      failure.context.elapsedMillis = elapsedMillis;
    }
    logInfo(`Finished php-cs-fixer in ${formatSeconds(elapsedMillis)} seconds`);
    decorator.forceEol();
  }

  return Object.freeze({
    filesProcessed: Object.freeze(filesProcessed.map((file) => Object.freeze({ ...file }))),
    totalFiles,
    firstFailure: firstFailure && Object.freeze({
      file: Object.freeze({ ...firstFailure.file }),
      exitCode: firstFailure.exitCode,
    }),
    elapsedMillis,
    success: firstFailure === undefined,
  });
}
