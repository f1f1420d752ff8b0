#!/usr/bin/env node

/**
 * phpforge CLI — Entry Point
 *
 * Provisions a multi-version PHP development environment for the user who
 * runs it through sudo.
 *
 * Commands:
 *   phpforge [install]         Provision everything (default)
 *   phpforge plan              List what the manifest installs
 *   phpforge validate          Validate a manifest
 *
 * Global options:
 *   --debug                    Engine logs and stack traces
 */

import { Command } from "commander";
import { registerInstallCommand } from "./commands/install";
import { registerPlanCommand } from "./commands/plan";
import { registerValidateCommand } from "./commands/validate";
import { setDebugMode } from "./output";

const program = new Command();

program
  .name("phpforge")
  .description("Install PHP runtimes, Composer and framework CLIs on Debian/Ubuntu")
  .version("0.1.0")
  .option("--debug", "Show engine logs and stack traces", false)
  .hook("preAction", (thisCommand) => {
    setDebugMode(thisCommand.opts<{ debug: boolean }>().debug);
  });

registerInstallCommand(program);
registerPlanCommand(program);
registerValidateCommand(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
