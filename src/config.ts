import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { RunConfiguration } from "./types.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_PARAMETERS = "fix --level=psr2 --dry-run --diff";
export const DEFAULT_PHP_BINARY = "php";
export const DEFAULT_ARTIFACT_PATH = "php-cs-fixer";
export const DEFAULT_DOWNLOAD_URL = "http://get.sensiolabs.org/php-cs-fixer.phar";
export const DEFAULT_EXTENSION = ".php";

export const PROJECT_CONFIG_FILE = ".csfix-changed.yml";

// ── Schemas ──────────────────────────────────────────────────────────

// YAML turns `key:` with no value into null, so null reads as unset
const optionalString = z.string().nullish().transform((v) => v ?? undefined);
const optionalNonEmpty = z.string().min(1).nullish().transform((v) => v ?? undefined);

export const globalConfigSchema = z
  .object({
    fixerPath: optionalString,
    parameters: optionalString,
    phpBinary: optionalNonEmpty,
    artifactPath: optionalNonEmpty,
    downloadUrl: z.string().url().nullish().transform((v) => v ?? undefined),
  })
  .strict();

export const projectConfigSchema = z
  .object({
    parameters: optionalString,
    extension: optionalNonEmpty,
  })
  .strict();

export type GlobalConfig = z.infer<typeof globalConfigSchema>;
export type ProjectConfig = z.infer<typeof projectConfigSchema>;

/** Values given on the command line; they beat both files. */
export interface ConfigOverrides {
  fixerPath?: string;
  parameters?: string;
  projectParameters?: string;
  extension?: string;
}

// ── Loading ──────────────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read and validate a YAML config file. A missing file yields `undefined`
 * unless `required` is set.
 */
export async function loadConfigFile<T extends z.ZodTypeAny>(
  path: string,
  schema: T,
  required = false,
): Promise<z.output<T> | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err) && !required) return undefined;
    throw new ConfigError(`Cannot read config file ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw, { filename: path });
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const result = schema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${path}: ${issues}`, { path });
  }
  return result.data;
}

export function defaultGlobalConfigPath(
  env: Record<string, string | undefined> = process.env,
): string {
  return env.CSFIX_GLOBAL_CONFIG || join(homedir(), ".config", "csfix-changed", "config.yml");
}

// ── Folding ──────────────────────────────────────────────────────────

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

/**
 * Fold defaults, global file, project file and CLI overrides into one
 * frozen configuration. Later layers win key by key.
 */
export function buildRunConfiguration(
  global: GlobalConfig | undefined,
  project: ProjectConfig | undefined,
  overrides: ConfigOverrides = {},
): RunConfiguration {
  const fixerPathOverride = nonEmpty(overrides.fixerPath ?? global?.fixerPath);
  const projectParameters = nonEmpty(overrides.projectParameters ?? project?.parameters);

  return Object.freeze({
    ...(fixerPathOverride ? { fixerPathOverride } : {}),
    globalParameters: overrides.parameters ?? global?.parameters ?? DEFAULT_PARAMETERS,
    ...(projectParameters ? { projectParameters } : {}),
    phpBinary: global?.phpBinary ?? DEFAULT_PHP_BINARY,
    artifactPath: global?.artifactPath ?? DEFAULT_ARTIFACT_PATH,
    downloadUrl: global?.downloadUrl ?? DEFAULT_DOWNLOAD_URL,
    extensionFilter: overrides.extension ?? project?.extension ?? DEFAULT_EXTENSION,
  });
}

export interface LoadConfigOptions {
  workingDir: string;
  globalConfigPath?: string;
  projectConfigPath?: string;
  overrides?: ConfigOverrides;
  env?: Record<string, string | undefined>;
}

/**
 * Load both config files and fold them with the CLI overrides. Files named
 * explicitly must exist; the default locations are optional.
 */
export async function loadRunConfiguration(
  options: LoadConfigOptions,
): Promise<RunConfiguration> {
  const globalPath = options.globalConfigPath ?? defaultGlobalConfigPath(options.env);
  const projectPath = options.projectConfigPath
    ? resolve(options.workingDir, options.projectConfigPath)
    : join(options.workingDir, PROJECT_CONFIG_FILE);

  const [global, project] = await Promise.all([
    loadConfigFile(globalPath, globalConfigSchema, options.globalConfigPath !== undefined),
    loadConfigFile(projectPath, projectConfigSchema, options.projectConfigPath !== undefined),
  ]);

  return buildRunConfiguration(global, project, options.overrides);
}
