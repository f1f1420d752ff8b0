/**
 * phpforge CLI - Validate Command
 *
 * Checks a manifest against the schema, the semantic rules and its helper
 * template.
 *
 * Exit codes:
 *   0 - Manifest valid
 *   1 - One or more errors
 */

import { Command } from "commander";
import { validateManifestFile } from "@phpforge/catalog";
import { resolveManifestPath } from "../config";
import { printError, printStageError, printSuccess, colors } from "../output";

export interface ValidateCommandOptions {
  manifest?: string;
}

export function runValidate(opts: ValidateCommandOptions): number {
  const manifestPath = resolveManifestPath(opts.manifest);
  const result = validateManifestFile(manifestPath);

  if (result.valid) {
    printSuccess(`${manifestPath} is valid`);
    return 0;
  }

  for (const error of result.errors) {
    printStageError(`${colors.dim(`[${error.rule}]`)} ${error.path}: ${error.message}`);
  }
  printError(`${manifestPath} has ${result.errors.length} error(s)`);
  return 1;
}

export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Validate a provisioning manifest")
    .option("--manifest <file>", "Validate a custom manifest")
    .action((opts: ValidateCommandOptions) => {
      const code = runValidate(opts);
      if (code !== 0) process.exit(code);
    });
}
