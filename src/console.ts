import chalk, { type ChalkInstance } from "chalk";
import type { LineSeverity, OutputSink, ProcessOutput, StreamName } from "./types.js";

export type LineClassifier = (line: string) => LineSeverity | null;

const PHP_ERROR_MARKERS: ReadonlyArray<[string, LineSeverity]> = [
  ["Notice", "notice"],
  ["Warning error", "warning"],
  ["Parse error", "parse"],
  ["Fatal error", "fatal"],
];

/** First matching marker wins. */
export const classifyPhpErrorLine: LineClassifier = (line) => {
  for (const [marker, severity] of PHP_ERROR_MARKERS) {
    if (line.includes(marker)) return severity;
  }
  return null;
};

export function styleLine(
  colors: ChalkInstance,
  severity: LineSeverity,
  line: string,
): string {
  switch (severity) {
    case "notice":
      return colors.cyan(line);
    case "warning":
      return colors.yellow(line);
    case "parse":
      return colors.magenta(line);
    case "fatal":
      return colors.red.bold(line);
  }
}

export interface ConsoleDecoratorOptions {
  classifier?: LineClassifier;
  /** When false, lines pass through unstyled. */
  annotate?: boolean;
  colors?: ChalkInstance;
}

/**
 * Line-buffers streamed process output and highlights PHP error lines.
 * Each stream has its own buffer, so a partial stdout line is never joined
 * to a stderr line. `forceEol` writes out whatever partial lines are pending.
 */
export class ConsoleDecorator implements ProcessOutput {
  private readonly pending: Record<StreamName, string> = { stdout: "", stderr: "" };
  private readonly classifier: LineClassifier;
  private readonly annotate: boolean;
  private readonly colors: ChalkInstance;

  constructor(
    private readonly sink: OutputSink,
    options: ConsoleDecoratorOptions = {},
  ) {
    this.classifier = options.classifier ?? classifyPhpErrorLine;
    this.annotate = options.annotate ?? true;
    this.colors = options.colors ?? chalk;
  }

  write(chunk: string, stream: StreamName = "stdout"): void {
    const parts = (this.pending[stream] + chunk).split("\n");
    this.pending[stream] = parts.pop() ?? "";
    for (const line of parts) {
      this.sink.write(this.decorate(line) + "\n");
    }
  }

  forceEol(): void {
    for (const stream of ["stdout", "stderr"] as const) {
      const line = this.pending[stream];
      if (line === "") continue;
      this.pending[stream] = "";
      this.sink.write(this.decorate(line) + "\n");
    }
  }

  private decorate(line: string): string {
    if (!this.annotate) return line;
    // Keep a trailing \r out of the styled span
    const body = line.endsWith("\r") ? line.slice(0, -1) : line;
    const severity = this.classifier(body);
    if (!severity) return line;
    return styleLine(this.colors, severity, body) + line.slice(body.length);
  }
}
