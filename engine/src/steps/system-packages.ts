import { StepRecord } from "../types";
import { BaseStep, StepContext, dryRunMessage, stepRecord } from "./base-step";

/**
 * Build and runtime dependencies from the distribution archive.
 */
export class SystemPackagesStep extends BaseStep {
  readonly name = "system-packages";
  readonly fatal = true;

  async run(ctx: StepContext): Promise<StepRecord[]> {
    const missing = await ctx.packages.missingPackages(
      ctx.manifest.system_packages,
    );

    if (missing.length === 0) {
      return [
        stepRecord(this.name, "skipped-already-present", "All system packages are installed"),
      ];
    }

    ctx.logger.info({ packages: missing }, "Installing system packages");
    await ctx.packages.update();
    await ctx.packages.install(missing);

    return [
      stepRecord(
        this.name,
        "success",
        dryRunMessage(
          ctx.dryRun,
          `install ${missing.join(" ")}`,
          `Installed ${missing.join(" ")}`,
        ),
      ),
    ];
  }
}
