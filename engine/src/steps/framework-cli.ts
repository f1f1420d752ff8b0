/**
 * phpforge Engine — Framework CLIs
 *
 * Laravel and Symfony installers write into the invoking identity's home,
 * so everything here runs through gateway.runAsUser(). Failures are
 * nonfatal: a missing framework CLI doesn't make the PHP setup unusable.
 */

import {
  ComposerGlobalCli,
  FrameworkCli,
  InstallerScriptCli,
  StepRecord,
} from "../types";
import { CommandResult } from "../process-runner";
import { PackageManagerError } from "../errors";
import { findOnPath } from "../tool-lookup";
import { resolveVariables } from "../utils/variables";
import { BaseStep, StepContext, stepRecord } from "./base-step";

function check(result: CommandResult, message: string): void {
  if (result.exitCode === 0) return;
  const lastLine = result.stderr.trim().split("\n").pop();
  throw new PackageManagerError(lastLine ? `${message}: ${lastLine}` : message, {
    exit_code: result.exitCode,
  });
}

export class FrameworkCliStep extends BaseStep {
  readonly name: string;
  readonly fatal = false;

  constructor(private readonly cli: FrameworkCli) {
    super();
    this.name = cli.id;
  }

  async run(ctx: StepContext): Promise<StepRecord[]> {
    const existing = findOnPath(this.cli.command, ctx.searchPath, ctx.fileOps);
    if (existing) {
      return [
        stepRecord(
          this.name,
          "skipped-already-present",
          `${this.cli.command} already available at ${existing}`,
        ),
      ];
    }

    if (this.cli.method === "composer-global") {
      await this.installWithComposer(ctx, this.cli);
    } else {
      if (ctx.dryRun) {
        return [
          stepRecord(
            this.name,
            "success",
            `[DRY RUN] Would install ${this.cli.command} from ${this.cli.installer_url}`,
          ),
        ];
      }
      await this.installWithScript(ctx, this.cli);
    }

    if (ctx.dryRun) {
      return [
        stepRecord(this.name, "success", `[DRY RUN] Would install ${this.cli.command}`),
      ];
    }

    const installed = findOnPath(this.cli.command, ctx.searchPath, ctx.fileOps);
    if (!installed) {
      throw new PackageManagerError(
        `${this.cli.command} was installed but is not on the user's PATH`,
      );
    }
    return [
      stepRecord(this.name, "success", `Installed ${this.cli.command} at ${installed}`),
    ];
  }

  private async installWithComposer(
    ctx: StepContext,
    cli: ComposerGlobalCli,
  ): Promise<void> {
    const { composer } = ctx.manifest;
    const composerBin =
      findOnPath(composer.command, ctx.searchPath, ctx.fileOps) ??
      composer.install_path;

    const result = await ctx.gateway.runAsUser({
      program: composerBin,
      args: ["global", "require", cli.package, "--no-interaction"],
      env: { COMPOSER_NO_INTERACTION: "1" },
    });
    check(result, `composer global require ${cli.package} failed`);
  }

  private async installWithScript(
    ctx: StepContext,
    cli: InstallerScriptCli,
  ): Promise<void> {
    const { identity } = ctx.context;
    const installDir = resolveVariables(cli.install_dir, { HOME: identity.home });
    const workDir = ctx.fileOps.makeTempDir("phpforge-installer-");

    try {
      // The installer runs as the user, who must be able to read it
      ctx.fileOps.chown(workDir, identity.uid, identity.gid);
      const download = await ctx.downloader.download(
        cli.installer_url,
        workDir,
        "installer",
      );
      ctx.fileOps.chown(download.file_path, identity.uid, identity.gid);

      check(
        await ctx.gateway.runAsUser({ program: "mkdir", args: ["-p", installDir] }),
        `Could not create ${installDir}`,
      );
      check(
        await ctx.gateway.runAsUser({
          program: "bash",
          args: [download.file_path, `--install-dir=${installDir}`],
        }),
        `${cli.command} installer failed`,
      );
    } finally {
      ctx.fileOps.remove(workDir);
    }
  }
}
