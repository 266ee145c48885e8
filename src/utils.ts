import { execa, ExecaError } from "execa";
import chalk from "chalk";
import type { CommandResult } from "./types.js";

// ── Logging ──────────────────────────────────────────────────────────

export function logInfo(msg: string): void {
  console.error(chalk.blue("info") + "  " + msg);
}

export function logSuccess(msg: string): void {
  console.error(chalk.green("done") + "  " + msg);
}

export function logWarn(msg: string): void {
  console.error(chalk.yellow("warn") + "  " + msg);
}

export function logError(msg: string): void {
  console.error(chalk.red("fail") + "  " + msg);
}

export function logStep(step: string): void {
  console.error(chalk.cyan("step") + "  " + chalk.bold(step));
}

// ── Shell execution ──────────────────────────────────────────────────

export interface ExecOptions {
  cwd?: string;
  /** Full environment for the child; process.env is not merged in. */
  env?: Record<string, string>;
  timeout?: number;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Run a command and return structured result.
 * Never throws -- start failures and cancellation are reported through
 * `failedToStart` and `interrupted`.
 */
export async function exec(
  command: string,
  args: string[] = [],
  options: ExecOptions = {},
): Promise<CommandResult> {
  try {
    const result = await execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      extendEnv: options.env === undefined,
      cancelSignal: options.signal,
      reject: false,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      killSignal: "SIGKILL", // ensure the process tree is killed on timeout
    });

    const interrupted = result.isCanceled || options.signal?.aborted === true;
    const failedToStart =
      result.failed &&
      result.exitCode === undefined &&
      result.signal === undefined &&
      !result.timedOut &&
      !interrupted;
    const reason = result instanceof ExecaError ? result.shortMessage : "";

    return {
      stdout: result.stdout ?? "",
      stderr: result.timedOut
        ? `[TIMEOUT] Process killed after ${((options.timeout ?? DEFAULT_TIMEOUT_MS) / 1000).toFixed(0)}s\n${result.stderr ?? ""}`
        : failedToStart
          ? reason
          : result.stderr ?? "",
      exitCode: result.exitCode ?? (result.timedOut ? 124 : 1),
      success: !result.failed && result.exitCode === 0,
      failedToStart,
      interrupted,
    };
  } catch (err: unknown) {
    // execa validates its options synchronously and throws on bad input
    return {
      stdout: "",
      stderr: err instanceof Error ? err.message : String(err),
      exitCode: 1,
      success: false,
      failedToStart: true,
      interrupted: false,
    };
  }
}

/**
 * Snapshot of process.env with unset entries removed, suitable for
 * passing to a child process as its whole environment.
 */
export function inheritedEnv(
  source: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

// ── Argument tokenizing ──────────────────────────────────────────────

/**
 * Split a parameter string into arguments on whitespace.
 * Single or double quotes group a token and are stripped.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (const ch of text) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (inToken) tokens.push(current);
  return tokens;
}
