import { StepRecord } from "../types";
import { AlternativeEntry } from "../adapters";
import { resolveVariables } from "../utils/variables";
import { BaseStep, StepContext, dryRunMessage, stepRecord } from "./base-step";

/** "8.2" registers at priority 82 */
export function alternativePriority(version: string): number {
  return Number(version.replace(/\D/g, ""));
}

function sameEntries(a: AlternativeEntry[], b: AlternativeEntry[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((entry) =>
    b.some((other) => other.path === entry.path && other.priority === entry.priority),
  );
}

export class PhpAlternativesStep extends BaseStep {
  readonly name = "php-alternatives";
  readonly fatal = false;

  async run(ctx: StepContext): Promise<StepRecord[]> {
    const { php } = ctx.manifest;

    // In dry-run, binaries from this run's installs do not exist yet
    const desired = php.versions
      .map((version) => ({
        path: resolveVariables(php.binary, { PHP_VERSION: version }),
        priority: alternativePriority(version),
      }))
      .filter((entry) => ctx.dryRun || ctx.fileOps.exists(entry.path));

    if (desired.length === 0) {
      return [stepRecord(this.name, "failed-nonfatal", "No PHP binaries found to register")];
    }

    const current = await ctx.alternatives.query(php.alternatives.name);
    if (sameEntries(current, desired)) {
      return [
        stepRecord(
          this.name,
          "skipped-already-present",
          `${desired.length} PHP binaries already registered`,
        ),
      ];
    }

    await ctx.alternatives.removeAll(php.alternatives.name);
    for (const entry of desired) {
      await ctx.alternatives.install(
        php.alternatives.link,
        php.alternatives.name,
        entry.path,
        entry.priority,
      );
    }

    return [
      stepRecord(
        this.name,
        "success",
        dryRunMessage(
          ctx.dryRun,
          `register ${desired.length} PHP binaries`,
          `Registered ${desired.length} PHP binaries`,
        ),
      ),
    ];
  }
}
