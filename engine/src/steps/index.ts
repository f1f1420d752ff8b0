/**
 * phpforge Engine — Step Registry
 *
 * The provisioning order is fixed: later steps depend on what earlier
 * ones install (the repository before runtimes, Composer before Laravel).
 */

import { ProvisionManifest } from "../types";
import { BaseStep } from "./base-step";
import { SystemPackagesStep } from "./system-packages";
import { PhpRepositoryStep } from "./php-repository";
import { ComposerStep } from "./composer";
import { PhpRuntimesStep } from "./php-runtime";
import { PhpAlternativesStep } from "./alternatives";
import { FrameworkCliStep } from "./framework-cli";
import { ShellProfileStep } from "./shell-profile";

export function createDefaultSteps(manifest: ProvisionManifest): BaseStep[] {
  return [
    new SystemPackagesStep(),
    new PhpRepositoryStep(),
    new ComposerStep(),
    new PhpRuntimesStep(),
    new PhpAlternativesStep(),
    ...manifest.frameworks.map((cli) => new FrameworkCliStep(cli)),
    new ShellProfileStep(),
  ];
}

export { BaseStep, stepRecord } from "./base-step";
export type { StepContext } from "./base-step";
export { SystemPackagesStep } from "./system-packages";
export { PhpRepositoryStep, repositoryRegistered } from "./php-repository";
export { ComposerStep } from "./composer";
export { PhpRuntimesStep, runtimePackages } from "./php-runtime";
export { PhpAlternativesStep, alternativePriority } from "./alternatives";
export { FrameworkCliStep } from "./framework-cli";
export { ShellProfileStep, templateVariables } from "./shell-profile";
