import * as path from "path";
import { StepRecord } from "../types";
import { FileOps } from "../fs-ops";
import { BaseStep, StepContext, dryRunMessage, stepRecord } from "./base-step";

const SOURCE_FILE = /\.(list|sources)$/;

/**
 * Whether any apt source file mentions the marker. Directories are scanned
 * one level deep for *.list and *.sources files.
 */
export function repositoryRegistered(
  sources: string[],
  marker: string,
  fileOps: FileOps,
): boolean {
  for (const source of sources) {
    if (fileOps.isDirectory(source)) {
      const files = fileOps
        .readDir(source)
        .filter((entry) => SOURCE_FILE.test(entry))
        .map((entry) => path.join(source, entry));
      if (files.some((file) => fileOps.readFile(file).includes(marker))) {
        return true;
      }
    } else if (fileOps.exists(source)) {
      if (fileOps.readFile(source).includes(marker)) return true;
    }
  }
  return false;
}

export class PhpRepositoryStep extends BaseStep {
  readonly name = "php-repository";
  readonly fatal = true;

  async run(ctx: StepContext): Promise<StepRecord[]> {
    const { repository } = ctx.manifest;

    if (repositoryRegistered(repository.sources, repository.marker, ctx.fileOps)) {
      return [
        stepRecord(
          this.name,
          "skipped-already-present",
          `Repository ${repository.id} is already configured`,
        ),
      ];
    }

    await ctx.packages.addRepository(repository.id);
    await ctx.packages.update();

    return [
      stepRecord(
        this.name,
        "success",
        dryRunMessage(
          ctx.dryRun,
          `add repository ${repository.id}`,
          `Added repository ${repository.id}`,
        ),
      ),
    ];
  }
}
