/**
 * phpforge CLI - Plan Command
 *
 * Lists every unit a manifest would install. Reads nothing from the host.
 *
 * Usage:
 *   phpforge plan
 *   phpforge plan --manifest my.yaml
 */

import { Command } from "commander";
import { InstallableUnit, ManifestError } from "@phpforge/engine";
import { installableUnits, loadManifest } from "@phpforge/catalog";
import { resolveManifestPath } from "../config";
import { printError, printInfo, printTable, colors } from "../output";

export interface PlanCommandOptions {
  manifest?: string;
}

export function runPlan(opts: PlanCommandOptions): number {
  const manifestPath = resolveManifestPath(opts.manifest);

  let units: InstallableUnit[];
  try {
    units = installableUnits(loadManifest(manifestPath));
  } catch (err) {
    if (err instanceof ManifestError) {
      printError(err.message);
      return 1;
    }
    throw err;
  }

  printInfo(`${colors.bold(String(units.length))} units from ${manifestPath}`);
  printTable({
    head: ["Unit", "Version", "Kind"],
    rows: units.map((unit) => [
      colors.app(unit.name),
      unit.version ? colors.version(unit.version) : colors.dim("-"),
      unit.kind,
    ]),
  });
  return 0;
}

export function registerPlanCommand(program: Command): void {
  program
    .command("plan")
    .description("List the runtimes, extensions, packages and tools a manifest installs")
    .option("--manifest <file>", "Read a custom manifest")
    .action((opts: PlanCommandOptions) => {
      const code = runPlan(opts);
      if (code !== 0) process.exit(code);
    });
}
