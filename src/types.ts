/** Two git revisions bounding the change set */
export interface RevisionPair {
  /** Absent when there is no prior baseline (first build). */
  previousRevision?: string;
  currentRevision: string;
}

/** Raw revision inputs as a CI server exposes them */
export interface RevisionInputs {
  previousSuccessfulRevision?: string;
  previousRevision?: string;
  currentRevision?: string;
}

/** A changed file that passed the extension and existence filters */
export interface ChangedFile {
  /** Relative to the working directory. */
  path: string;
}

/** Immutable settings for one run, folded from all config layers */
export interface RunConfiguration {
  /** Fixer executable to call directly. Absent means "download the phar". */
  fixerPathOverride?: string;
  globalParameters: string;
  /** Replaces `globalParameters` entirely when non-empty. */
  projectParameters?: string;
  phpBinary: string;
  artifactPath: string;
  downloadUrl: string;
  extensionFilter: string;
}

export interface FirstFailure {
  file: ChangedFile;
  exitCode: number;
}

/** Outcome of a fixer run over the changed files */
export interface RunResult {
  /** Files the fixer was invoked on, in order, including a failing one. */
  filesProcessed: readonly ChangedFile[];
  totalFiles: number;
  firstFailure?: FirstFailure;
  elapsedMillis: number;
  success: boolean;
}

/** Result from running a shell command */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  success: boolean;
  /** The executable could not be spawned (ENOENT, EACCES, ...). */
  failedToStart: boolean;
  /** The wait ended because the run was cancelled. */
  interrupted: boolean;
}

/** Severity assigned to a line of fixer output */
export type LineSeverity = "notice" | "warning" | "parse" | "fatal";

/** Anything console output can be written to */
export interface OutputSink {
  write(text: string): unknown;
}

export type StreamName = "stdout" | "stderr";

/** Receives a child process's output, tagged with the stream it came from */
export interface ProcessOutput {
  write(chunk: string, stream: StreamName): unknown;
}

/** CLI options parsed from command line */
export interface CliOptions {
  cwd?: string;
  current?: string;
  previous?: string;
  previousSuccessful?: string;
  fixerPath?: string;
  parameters?: string;
  projectParameters?: string;
  extension?: string;
  globalConfig?: string;
  projectConfig?: string;
  annotate: boolean;
  json: boolean;
}
