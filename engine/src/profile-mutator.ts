/**
 * phpforge Engine — Profile Mutator
 *
 * Appends blocks to the invoking identity's shell profile. The profile is
 * append-only: a block whose marker is already present is never rewritten.
 *
 * Each mutation follows backup, append-if-marker-absent, verify. If the
 * verify token is missing afterwards (or any write fails) the profile is
 * restored from the backup and ProfileMutationError is thrown.
 */

import * as path from "path";
import { InvokingIdentity } from "./types";
import { FileOps } from "./fs-ops";
import { ProfileMutationError, errorMessage } from "./errors";
import { Logger } from "./utils/logger";

export interface ProfileBlock {
  /** Used to name the staging file */
  id: string;
  /** Presence of this substring means the block is already in place */
  marker: string;
  /** Must be present in the profile after the mutation */
  verify: string;
  content: string;
}

export type BlockStatus = "appended" | "present";

export interface ProfileMutatorOptions {
  identity: InvokingIdentity;
  /** Profile file relative to the identity's home */
  file: string;
  fileOps: FileOps;
  logger: Logger;
  dryRun: boolean;
}

export class ProfileMutator {
  readonly profilePath: string;

  constructor(private readonly options: ProfileMutatorOptions) {
    this.profilePath = path.join(options.identity.home, options.file);
  }

  private readProfile(): string {
    const { fileOps } = this.options;
    return fileOps.exists(this.profilePath)
      ? fileOps.readFile(this.profilePath)
      : "";
  }

  /**
   * Make sure a block is in the profile.
   *
   * @throws ProfileMutationError after restoring the profile
   */
  ensureBlock(block: ProfileBlock): BlockStatus {
    const { fileOps, logger, identity, dryRun } = this.options;

    if (dryRun) {
      if (this.readProfile().includes(block.marker)) return "present";
      logger.info(
        { profile: this.profilePath, block: block.id },
        "[DRY RUN] Would append block to profile",
      );
      return "appended";
    }

    const staging = fileOps.makeTempDir("phpforge-profile-");
    const backupPath = `${this.profilePath}.phpforge-${process.pid}.bak`;
    const existed = fileOps.exists(this.profilePath);

    try {
      const stagedPath = path.join(staging, `${block.id}.block`);
      fileOps.writeFileAtomic(stagedPath, block.content);

      if (existed) fileOps.copyFile(this.profilePath, backupPath);

      let status: BlockStatus;
      try {
        const current = existed ? fileOps.readFile(this.profilePath) : "";

        if (current.includes(block.marker)) {
          status = "present";
        } else {
          let staged = fileOps.readFile(stagedPath);
          if (!staged.endsWith("\n")) staged += "\n";
          const separator = current === "" || current.endsWith("\n") ? "" : "\n";
          fileOps.writeFileAtomic(this.profilePath, current + separator + staged);
          status = "appended";
        }

        const after = fileOps.exists(this.profilePath)
          ? fileOps.readFile(this.profilePath)
          : "";
        if (!after.includes(block.verify)) {
          throw new ProfileMutationError(
            `Verification failed for ${this.profilePath}: "${block.verify}" not found`,
            { profile: this.profilePath, block: block.id },
          );
        }
      } catch (err) {
        this.restore(existed, backupPath);
        throw err instanceof ProfileMutationError
          ? err
          : new ProfileMutationError(
              `Failed to update ${this.profilePath}: ${errorMessage(err)}`,
              { profile: this.profilePath, block: block.id },
            );
      }

      fileOps.chown(this.profilePath, identity.uid, identity.gid);
      if (existed) fileOps.remove(backupPath);

      logger.info(
        { profile: this.profilePath, block: block.id, status },
        "Profile block ensured",
      );
      return status;
    } finally {
      fileOps.remove(staging);
    }
  }

  private restore(existed: boolean, backupPath: string): void {
    const { fileOps, logger, identity } = this.options;

    logger.warn({ profile: this.profilePath }, "Restoring profile from backup");
    if (existed) {
      fileOps.copyFile(backupPath, this.profilePath);
      fileOps.chown(this.profilePath, identity.uid, identity.gid);
      fileOps.remove(backupPath);
    } else {
      fileOps.remove(this.profilePath);
    }
  }
}
