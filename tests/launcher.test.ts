import { describe, it, expect } from "vitest";
import { tmpdir } from "node:os";
import { execaLauncher, type LaunchRequest } from "../src/launcher.js";
import { ProcessError } from "../src/errors.js";
import { inheritedEnv } from "../src/utils.js";
import type { StreamName } from "../src/types.js";

// Children are the running node binary

// ── Helpers ───────────────────────────────────────────────────────────

const node = process.execPath;

function collect() {
  const received: Record<StreamName, string> = { stdout: "", stderr: "" };
  const output = {
    write: (chunk: string, stream: StreamName) => {
      received[stream] += chunk;
    },
  };
  return { received, output };
}

function request(argv: string[], overrides: Partial<LaunchRequest> = {}): LaunchRequest {
  return {
    argv,
    cwd: tmpdir(),
    env: inheritedEnv(),
    output: collect().output,
    ...overrides,
  };
}

// ── Tests ─────────────────────────────────────────────────────────────

describe("execaLauncher", () => {
  it("resolves with the exit code and streams each output", async () => {
    const { received, output } = collect();
    const script =
      "process.stdout.write('Checked src/a.php\\n');" +
      "process.stderr.write('PHP Notice: x\\n');" +
      "process.exitCode = 3;";

    const code = await execaLauncher.launch(request([node, "-e", script], { output }));

    expect(code).toBe(3);
    expect(received).toEqual({
      stdout: "Checked src/a.php\n",
      stderr: "PHP Notice: x\n",
    });
  });

  it("resolves 0 for a clean exit", async () => {
    await expect(execaLauncher.launch(request([node, "-e", "0"]))).resolves.toBe(0);
  });

  it("passes the given environment only", async () => {
    const { received, output } = collect();
    const script = "process.stdout.write(String(process.env.CSFIX_MARKER));";

    await execaLauncher.launch(
      request([node, "-e", script], { env: { CSFIX_MARKER: "set-by-test" }, output }),
    );

    expect(received.stdout).toBe("set-by-test");
  });

  it("throws ProcessError for a missing executable", async () => {
    const error = await execaLauncher
      .launch(request(["/nonexistent/php-cs-fixer", "fix", "a.php"]))
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error instanceof ProcessError && error.message).toMatch(
      /^\/nonexistent\/php-cs-fixer did not run to completion: .*ENOENT/,
    );
    expect(error instanceof ProcessError && error.interrupted).toBe(false);
  });

  it("throws ProcessError when the process is killed by a signal", async () => {
    const error = await execaLauncher
      .launch(request([node, "-e", "process.kill(process.pid, 'SIGKILL')"]))
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error instanceof ProcessError && error.context.signal).toBe("SIGKILL");
  });

  it("throws an interrupted ProcessError when cancelled", async () => {
    const controller = new AbortController();
    const launch = execaLauncher.launch(
      request([node, "-e", "setInterval(() => {}, 1000)"], { signal: controller.signal }),
    );
    setTimeout(() => controller.abort(), 100);

    const error = await launch.catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error instanceof ProcessError && error.context.interrupted).toBe(true);
  });

  it("refuses an empty command line", async () => {
    await expect(execaLauncher.launch(request([]))).rejects.toThrow(
      new ProcessError("Cannot launch an empty command line"),
    );
  });
});
