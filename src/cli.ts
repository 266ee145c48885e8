#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Command, Option } from "commander";
import type { CliOptions } from "./types.js";
import { run } from "./main.js";

// ── Resolve package metadata ─────────────────────────────────────────

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(
  readFileSync(resolve(__dirname, "..", "package.json"), "utf-8"),
);
const version =
  pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

// ── CLI definition ───────────────────────────────────────────────────

const program = new Command();

program
  .name("csfix-changed")
  .description(
    "Run php-cs-fixer on the PHP files changed between two git revisions. " +
    "Stops at the first file the fixer rejects.",
  )
  .version(version)
  .addOption(new Option("--cwd <dir>", "Working tree to check").env("WORKSPACE"))
  .addOption(new Option("--current <rev>", "Revision being built").env("GIT_COMMIT"))
  .addOption(
    new Option("--previous <rev>", "Previous build's revision").env("GIT_PREVIOUS_COMMIT"),
  )
  .addOption(
    new Option("--previous-successful <rev>", "Last successful build's revision")
      .env("GIT_PREVIOUS_SUCCESSFUL_COMMIT"),
  )
  .option("--fixer-path <path>", "Fixer executable to run instead of downloading the phar")
  .option("--parameters <params>", "Global fixer parameters")
  .option("--project-parameters <params>", "Project fixer parameters (replace the global ones)")
  .option("--extension <suffix>", "Only check files ending in this suffix")
  .option("--global-config <file>", "Global YAML config file")
  .option("--project-config <file>", "Project YAML config file")
  .option("--no-annotate", "Do not highlight PHP error lines")
  .option("--json", "Print a JSON report to stdout after the run", false)
  .action(async (opts: CliOptions) => {
    process.exitCode = await run(opts);
  });

await program.parseAsync();
