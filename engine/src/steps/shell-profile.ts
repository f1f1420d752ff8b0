import { ProvisionManifest, StepRecord } from "../types";
import { renderTemplate, resolveVariables } from "../utils/variables";
import { BaseStep, StepContext, stepRecord } from "./base-step";

/**
 * Variables available to the helper template as {{NAME}}.
 */
export function templateVariables(manifest: ProvisionManifest): Record<string, string> {
  const versions = [...manifest.php.versions].sort((a, b) =>
    a.localeCompare(b, undefined, { numeric: true }),
  );
  return {
    LATEST_VERSION: versions[versions.length - 1] ?? "",
    VERSIONS: versions.join(" "),
    // Shell parameters stand in for the version inside the helper functions
    PHP_BINARY: resolveVariables(manifest.php.binary, { PHP_VERSION: "$1" }),
    FPM_SERVICE: resolveVariables(manifest.php.fpm_service, { PHP_VERSION: "$version" }),
    ALTERNATIVES_NAME: manifest.php.alternatives.name,
  };
}

/**
 * PATH entries first, then the helper function block.
 */
export class ShellProfileStep extends BaseStep {
  readonly name = "shell-profile";
  readonly fatal = true;

  async run(ctx: StepContext): Promise<StepRecord[]> {
    const { profile } = ctx.manifest;
    const records: StepRecord[] = [];
    const target = ctx.profile.profilePath;
    const verb = ctx.dryRun ? "[DRY RUN] Would add" : "Added";

    for (const entry of profile.path_entries) {
      const name = `profile-path:${entry.fragment}`;
      const status = ctx.profile.ensureBlock({
        id: `path-${records.length}`,
        marker: entry.fragment,
        verify: entry.fragment,
        content: entry.line,
      });
      records.push(
        status === "appended"
          ? stepRecord(name, "success", `${verb} ${entry.fragment} to PATH in ${target}`)
          : stepRecord(name, "skipped-already-present", `${entry.fragment} already on PATH`),
      );
    }

    const template = ctx.fileOps.readFile(profile.template);
    const block = renderTemplate(template, templateVariables(ctx.manifest));
    const status = ctx.profile.ensureBlock({
      id: "helpers",
      marker: profile.marker,
      verify: profile.verify,
      content: `\n${block}`,
    });
    records.push(
      status === "appended"
        ? stepRecord("profile-helpers", "success", `${verb} PHP helper functions to ${target}`)
        : stepRecord(
            "profile-helpers",
            "skipped-already-present",
            "PHP helper functions already present",
          ),
    );

    return records;
  }
}
