export enum FixerRunErrorCode {
  DIFF_UNAVAILABLE = "DIFF_UNAVAILABLE",
  FIXER_UNAVAILABLE = "FIXER_UNAVAILABLE",
  PROCESS_ERROR = "PROCESS_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
}

/**
 * Base class for every condition that aborts a run.
 * A style violation is not one of these: it is the fixer's exit code.
 */
export class FixerRunError extends Error {
  readonly code: FixerRunErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    code: FixerRunErrorCode,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "FixerRunError";
    this.code = code;
    this.context = context;
  }

  get interrupted(): boolean {
    return this.context.interrupted === true;
  }
}

/** The change list could not be computed. */
export class DiffUnavailableError extends FixerRunError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(FixerRunErrorCode.DIFF_UNAVAILABLE, message, context);
    this.name = "DiffUnavailableError";
  }
}

/** The fixer executable could not be resolved or fetched. */
export class FixerUnavailableError extends FixerRunError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(FixerRunErrorCode.FIXER_UNAVAILABLE, message, context);
    this.name = "FixerUnavailableError";
  }
}

/** A fixer invocation could not start, or was killed or cancelled mid-run. */
export class ProcessError extends FixerRunError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(FixerRunErrorCode.PROCESS_ERROR, message, context);
    this.name = "ProcessError";
  }

  get file(): string | undefined {
    const file = this.context.file;
    return typeof file === "string" ? file : undefined;
  }
}

/** Invalid configuration or revision inputs, rejected before a run starts. */
export class ConfigError extends FixerRunError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(FixerRunErrorCode.CONFIG_ERROR, message, context);
    this.name = "ConfigError";
  }
}
