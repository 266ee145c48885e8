import { execa, ExecaError } from "execa";
import type { ProcessOutput } from "./types.js";
import { ProcessError } from "./errors.js";

export interface LaunchRequest {
  /** argv[0] is the executable. */
  argv: string[];
  cwd: string;
  env: Record<string, string>;
  /** Receives stdout and stderr as they arrive. */
  output: ProcessOutput;
  signal?: AbortSignal;
}

/** Starts a process and resolves with its exit code. */
export interface ProcessLauncher {
  launch(request: LaunchRequest): Promise<number>;
}

/**
 * Launcher backed by execa. Throws ProcessError when the process cannot be
 * started, is killed by a signal, or is cancelled through `signal`.
 */
export const execaLauncher: ProcessLauncher = {
  async launch({ argv, cwd, env, output, signal }) {
    const [command, ...args] = argv;
    if (!command) {
      throw new ProcessError("Cannot launch an empty command line");
    }

    const subprocess = execa(command, args, {
      cwd,
      env,
      extendEnv: false,
      cancelSignal: signal,
      stdin: "ignore",
      buffer: false,
      reject: false,
    });

    const streams = [
      ["stdout", subprocess.stdout],
      ["stderr", subprocess.stderr],
    ] as const;
    for (const [name, stream] of streams) {
      stream?.setEncoding("utf8");
      stream?.on("data", (chunk: string) => {
        output.write(chunk, name);
      });
    }

    const result = await subprocess;

    if (result.isCanceled || signal?.aborted) {
      throw new ProcessError(`${command} was interrupted`, {
        command,
        interrupted: true,
      });
    }

    if (result.exitCode === undefined) {
      const reason =
        result instanceof ExecaError ? result.shortMessage : "no exit code";
      throw new ProcessError(`${command} did not run to completion: ${reason}`, {
        command,
        signal: result.signal,
      });
    }

    return result.exitCode;
  },
};
