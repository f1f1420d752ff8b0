/**
 * phpforge Engine — PHP Runtimes
 *
 * One record per version. A version that fails to install is reported as
 * failed-nonfatal and the remaining versions still run.
 */

import { StepRecord } from "../types";
import { PackageManagerError, PrivilegeError, errorMessage } from "../errors";
import { applyIniSettings } from "../config-editor";
import { resolveVariables } from "../utils/variables";
import { BaseStep, StepContext, stepRecord } from "./base-step";

export function runtimePackages(version: string, extensions: string[]): string[] {
  return [`php${version}`, ...extensions.map((ext) => `php${version}-${ext}`)];
}

export class PhpRuntimesStep extends BaseStep {
  readonly name = "php-runtimes";
  readonly fatal = false;

  async run(ctx: StepContext): Promise<StepRecord[]> {
    const records: StepRecord[] = [];

    for (const version of ctx.manifest.php.versions) {
      const name = `php-${version}`;
      try {
        records.push(await this.provisionVersion(ctx, version, name));
      } catch (err) {
        if (err instanceof PrivilegeError) throw err;
        ctx.logger.warn({ version, error: errorMessage(err) }, "PHP version failed");
        records.push(stepRecord(name, "failed-nonfatal", errorMessage(err)));
      }
    }

    return records;
  }

  private async provisionVersion(
    ctx: StepContext,
    version: string,
    name: string,
  ): Promise<StepRecord> {
    const { php } = ctx.manifest;
    const vars = { PHP_VERSION: version };
    const binary = resolveVariables(php.binary, vars);
    const changes: string[] = [];

    const missing = await ctx.packages.missingPackages(
      runtimePackages(version, php.extensions),
    );
    if (missing.length > 0) {
      await ctx.packages.install(missing);
      changes.push(`installed ${missing.join(" ")}`);
    }

    if (!ctx.dryRun && !ctx.fileOps.exists(binary)) {
      throw new PackageManagerError(`PHP ${version} binary not found at ${binary}`, {
        version,
        binary,
      });
    }

    let configChanged = false;
    for (const template of php.ini_files) {
      const result = applyIniSettings(
        resolveVariables(template, vars),
        php.ini_settings,
        {
          fileOps: ctx.fileOps,
          logger: ctx.logger,
          dryRun: ctx.dryRun,
          now: ctx.now,
        },
      );
      if (result.status === "updated") configChanged = true;
    }
    if (configChanged) changes.push("updated php.ini");

    if (changes.length > 0 && !ctx.dryRun) {
      const service = resolveVariables(php.fpm_service, vars);
      if (await ctx.services.isActive(service)) {
        const restarted = await ctx.services.restart(service);
        changes.push(restarted ? `restarted ${service}` : `restart of ${service} failed`);
      }
    }

    if (changes.length === 0) {
      return stepRecord(
        name,
        "skipped-already-present",
        `PHP ${version} is installed and configured`,
      );
    }
    const prefix = ctx.dryRun ? "[DRY RUN] " : "";
    return stepRecord(name, "success", `${prefix}PHP ${version}: ${changes.join(", ")}`);
  }
}
