/**
 * phpforge Engine — Provisioner
 *
 * Runs the provisioning steps in a fixed order against one host and
 * reports what each one did. The provisioner has no UI logic; the CLI
 * subscribes to events for progress and renders the final report.
 *
 * Failure policy:
 * - a fatal step that throws is recorded as failed-fatal and ends the run
 * - a nonfatal step that throws is recorded as failed-nonfatal
 * - PrivilegeError is fatal wherever it is raised
 *
 * Runs are not retried and concurrent runs against the same host are not
 * supported.
 */

import * as crypto from "crypto";
import {
  ProvisionContext,
  ProvisionEvent,
  ProvisionEventHandler,
  ProvisionManifest,
  ProvisionReport,
  StepRecord,
} from "./types";
import { PrivilegeError, errorMessage } from "./errors";
import { CommandGateway } from "./gateway";
import { ProcessRunner, spawnRunner } from "./process-runner";
import {
  AptPackageManager,
  SystemctlServiceManager,
  UpdateAlternativesManager,
} from "./adapters";
import { Downloader, HttpsDownloader } from "./downloader";
import { FileOps, nodeFileOps } from "./fs-ops";
import { ProfileMutator } from "./profile-mutator";
import { userSearchPath } from "./tool-lookup";
import { BaseStep, StepContext, createDefaultSteps, stepRecord } from "./steps";
import { Logger } from "./utils/logger";

export interface ProvisionerOptions {
  context: ProvisionContext;
  manifest: ProvisionManifest;
  logger: Logger;
  dryRun?: boolean;
  runner?: ProcessRunner;
  fileOps?: FileOps;
  downloader?: Downloader;
  now?: () => Date;
  /** System part of the user's PATH; defaults to SYSTEM_PATH */
  systemPath?: readonly string[];
  /** Defaults to createDefaultSteps(manifest) */
  steps?: BaseStep[];
}

export class Provisioner {
  private eventHandlers: ProvisionEventHandler[] = [];
  private readonly steps: BaseStep[];
  private readonly stepContext: StepContext;

  constructor(private readonly options: ProvisionerOptions) {
    const { context, manifest, logger } = options;
    const dryRun = options.dryRun ?? false;
    const fileOps = options.fileOps ?? nodeFileOps;
    const searchPath = userSearchPath(context.identity, manifest, options.systemPath);

    const gateway = new CommandGateway(
      context,
      options.runner ?? spawnRunner,
      logger,
      { dryRun, userPath: searchPath },
    );

    this.steps = options.steps ?? createDefaultSteps(manifest);
    this.stepContext = {
      context,
      manifest,
      gateway,
      packages: new AptPackageManager(gateway, logger),
      services: new SystemctlServiceManager(gateway, logger),
      alternatives: new UpdateAlternativesManager(gateway, logger),
      downloader: options.downloader ?? new HttpsDownloader(logger),
      fileOps,
      profile: new ProfileMutator({
        identity: context.identity,
        file: manifest.profile.file,
        fileOps,
        logger,
        dryRun,
      }),
      searchPath,
      logger,
      dryRun,
      now: options.now ?? (() => new Date()),
    };
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. Returns a function that unregisters it.
   */
  on(handler: ProvisionEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
    };
  }

  private emit(event: ProvisionEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err) {
        this.options.logger.warn(
          { event: event.type, error: errorMessage(err) },
          "Event handler threw",
        );
      }
    }
  }

  // ─── Run ─────────────────────────────────────────────────────

  async run(): Promise<ProvisionReport> {
    const { logger } = this.options;
    const ctx = this.stepContext;
    const runId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const records: StepRecord[] = [];
    let fatalError: Error | undefined;

    const record = (entry: StepRecord): void => {
      records.push(entry);
      this.emit({
        type: "step_record",
        timestamp: new Date().toISOString(),
        record: entry,
      });
    };

    logger.info(
      { run_id: runId, user: ctx.context.identity.username, dry_run: ctx.dryRun },
      "Provisioning started",
    );

    if (!ctx.context.elevated) {
      fatalError = new PrivilegeError(
        "phpforge",
        "This command must be run as root or with sudo",
      );
      record(stepRecord("preflight", "failed-fatal", fatalError.message));
    }

    for (const step of fatalError ? [] : this.steps) {
      this.emit({
        type: "step_start",
        timestamp: new Date().toISOString(),
        step: step.name,
      });

      try {
        const stepRecords = await step.run(ctx);
        stepRecords.forEach(record);
      } catch (err) {
        const fatal = step.fatal || err instanceof PrivilegeError;
        const message = errorMessage(err);
        logger.error({ step: step.name, error: message, fatal }, "Step failed");

        if (fatal) {
          fatalError = err instanceof Error ? err : new Error(message);
          record(stepRecord(step.name, "failed-fatal", message));
          break;
        }
        record(stepRecord(step.name, "failed-nonfatal", message));
      }
    }

    const warnings = records.filter((r) => r.outcome === "failed-nonfatal");
    for (const warning of warnings) {
      logger.warn({ step: warning.name, message: warning.message }, "Step warning");
    }

    const report: ProvisionReport = {
      run_id: runId,
      records,
      success: fatalError === undefined,
      fatal_error: fatalError,
      warnings,
      dry_run: ctx.dryRun,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
    };

    logger.info(
      { run_id: runId, success: report.success, warnings: warnings.length },
      "Provisioning finished",
    );
    return report;
  }
}
