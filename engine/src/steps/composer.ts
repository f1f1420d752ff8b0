/**
 * phpforge Engine — Composer Bootstrap
 *
 * Installs composer.phar directly rather than through the PHP installer
 * script, so no PHP runtime is needed yet. The phar is only installed when
 * its SHA-256 matches the checksum Composer publishes beside it.
 */

import * as path from "path";
import { StepRecord } from "../types";
import {
  IntegrityError,
  PackageManagerError,
  ProvisionError,
  errorMessage,
} from "../errors";
import { parseChecksumFile, verifyChecksum } from "../verifier";
import { findOnPath } from "../tool-lookup";
import { BaseStep, StepContext, stepRecord } from "./base-step";

export class ComposerStep extends BaseStep {
  readonly name = "composer";
  readonly fatal = true;

  async run(ctx: StepContext): Promise<StepRecord[]> {
    const { composer } = ctx.manifest;
    const existing = findOnPath(composer.command, ctx.searchPath, ctx.fileOps);

    if (existing) {
      return [
        stepRecord(
          this.name,
          "skipped-already-present",
          `Composer already installed at ${existing}`,
        ),
      ];
    }

    if (ctx.dryRun) {
      return [
        stepRecord(
          this.name,
          "success",
          `[DRY RUN] Would install Composer to ${composer.install_path}`,
        ),
      ];
    }

    const workDir = ctx.fileOps.makeTempDir("phpforge-composer-");
    try {
      const download = await ctx.downloader.download(
        composer.download_url,
        workDir,
        "composer.phar",
      );
      const checksum = parseChecksumFile(
        await ctx.downloader.fetchText(composer.checksum_url),
      );
      const verification = await verifyChecksum(download.file_path, checksum);

      if (!verification.valid) {
        throw new IntegrityError(
          `Checksum mismatch for composer.phar: expected ${verification.expected}, got ${verification.actual}`,
          { expected: verification.expected, actual: verification.actual },
        );
      }

      const { identity } = ctx.context;
      ctx.fileOps.mkdirp(path.dirname(composer.install_path));
      ctx.fileOps.copyFile(download.file_path, composer.install_path);
      ctx.fileOps.chmod(composer.install_path, 0o755);
      ctx.fileOps.chown(composer.install_path, identity.uid, identity.gid);
    } catch (err) {
      if (err instanceof PackageManagerError) throw err;
      throw new PackageManagerError(
        `Composer installation failed: ${errorMessage(err)}`,
        {
          cause_category: err instanceof ProvisionError ? err.category : undefined,
        },
      );
    } finally {
      ctx.fileOps.remove(workDir);
    }

    ctx.logger.info({ path: composer.install_path }, "Composer installed");
    return [
      stepRecord(this.name, "success", `Installed Composer to ${composer.install_path}`),
    ];
  }
}
