/**
 * phpforge Engine — Base Step
 *
 * Every provisioning step (packages, repository, composer, runtimes,
 * alternatives, framework CLIs, profile) extends this class. A step checks
 * what is already present, changes only what is missing, and reports what
 * it did as one or more step records.
 */

import {
  ProvisionContext,
  ProvisionManifest,
  StepOutcome,
  StepRecord,
} from "../types";
import { CommandGateway } from "../gateway";
import {
  AlternativesManager,
  PackageManager,
  ServiceManager,
} from "../adapters";
import { Downloader } from "../downloader";
import { FileOps } from "../fs-ops";
import { ProfileMutator } from "../profile-mutator";
import { Logger } from "../utils/logger";

export interface StepContext {
  context: ProvisionContext;
  manifest: ProvisionManifest;
  gateway: CommandGateway;
  packages: PackageManager;
  services: ServiceManager;
  alternatives: AlternativesManager;
  downloader: Downloader;
  fileOps: FileOps;
  profile: ProfileMutator;
  /** PATH of the invoking identity once the profile is sourced */
  searchPath: string[];
  logger: Logger;
  /** If true, steps report what they would do without changing anything */
  dryRun: boolean;
  now: () => Date;
}

export abstract class BaseStep {
  abstract readonly name: string;
  /** A fatal step's failure aborts the run */
  abstract readonly fatal: boolean;

  /**
   * Bring the host to the desired state for this step.
   *
   * @throws ProvisionError when the step cannot complete
   */
  abstract run(ctx: StepContext): Promise<StepRecord[]>;
}

export function stepRecord(
  name: string,
  outcome: StepOutcome,
  message?: string,
): StepRecord {
  return message === undefined ? { name, outcome } : { name, outcome, message };
}

export function dryRunMessage(dryRun: boolean, action: string, done: string): string {
  return dryRun ? `[DRY RUN] Would ${action}` : done;
}
