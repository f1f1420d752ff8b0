/**
 * phpforge CLI -- Install Command
 *
 * Provisions the PHP environment for the user who invoked sudo.
 * This is the default command, so a bare `sudo phpforge` runs it.
 *
 * Usage:
 *   sudo phpforge                      Provision with the bundled manifest
 *   sudo phpforge install --dry-run    Preview; only read-only commands run
 *   sudo phpforge --manifest my.yaml   Provision from a custom manifest
 *
 * Output:
 *   One line per step record, then any warnings, then a summary. When the
 *   run fails, the reason for the failure is the last line printed.
 *
 *   Provisioning PHP for alice
 *
 *     ✔ system-packages: Installed unzip git
 *     ○ php-repository: Repository ppa:ondrej/php is already configured
 *     ⚠ php-7.4: apt-get install failed for php7.4 ...
 *
 *   ✔ Provisioned PHP for alice in 3m 12s
 */

import { Command } from "commander";
import {
  Downloader,
  FileOps,
  IdentityResolutionError,
  IdentitySource,
  ManifestError,
  ProcessRunner,
  ProvisionError,
  ProvisionContext,
  ProvisionEvent,
  ProvisionManifest,
  Provisioner,
  StepRecord,
  createLogger,
  resolveInvokingIdentity,
  systemIdentitySource,
} from "@phpforge/engine";
import { loadManifest } from "@phpforge/catalog";
import { engineLogLevel, resolveManifestPath } from "../config";
import {
  printSuccess,
  printError,
  printDryRun,
  printInfo,
  printWarn,
  printHeader,
  printDetail,
  printBlank,
  printDebug,
  printStageWarn,
  isDebugMode,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  outcomeSymbol,
  colors,
} from "../output";

export interface InstallCommandOptions {
  dryRun: boolean;
  verbose: boolean;
  manifest?: string;
}

/**
 * Host access used by the command. Tests substitute in-process fakes;
 * the defaults touch the real system.
 */
export interface InstallDependencies {
  identitySource?: IdentitySource;
  runner?: ProcessRunner;
  fileOps?: FileOps;
  downloader?: Downloader;
  now?: () => Date;
  systemPath?: readonly string[];
}

function printRecord(record: StepRecord): void {
  const message = record.message ? `: ${colors.dim(record.message)}` : "";
  console.log(`  ${outcomeSymbol(record.outcome)} ${record.name}${message}`);
}

function latestVersion(manifest: ProvisionManifest): string {
  const versions = [...manifest.php.versions].sort((a, b) =>
    a.localeCompare(b, undefined, { numeric: true }),
  );
  return versions[versions.length - 1] ?? "";
}

/**
 * Run the install flow and return the process exit code.
 */
export async function runInstall(
  opts: InstallCommandOptions,
  deps: InstallDependencies = {},
): Promise<number> {
  const logger = createLogger({
    level: engineLogLevel(opts.verbose, isDebugMode()),
  });
  const source = deps.identitySource ?? systemIdentitySource();

  // 1. Elevation
  if (source.effectiveUid !== 0) {
    printInfo(`Please run: ${colors.bold("sudo phpforge")}`);
    printError("This command must be run as root or with sudo");
    return 1;
  }

  // 2. Invoking identity + manifest
  let context: ProvisionContext;
  let manifest: ProvisionManifest;
  try {
    context = await resolveInvokingIdentity(source, logger);
    manifest = loadManifest(resolveManifestPath(opts.manifest));
  } catch (err) {
    if (err instanceof IdentityResolutionError || err instanceof ManifestError) {
      printError(err.message);
      return 1;
    }
    throw err;
  }

  const { username } = context.identity;
  if (opts.dryRun) {
    printDryRun(`Would provision PHP for ${colors.app(username)}`);
  } else {
    printHeader(`Provisioning PHP for ${colors.app(username)}`);
  }

  // 3. Wire up progress display
  const provisioner = new Provisioner({
    context,
    manifest,
    logger,
    dryRun: opts.dryRun,
    runner: deps.runner,
    fileOps: deps.fileOps,
    downloader: deps.downloader,
    now: deps.now,
    systemPath: deps.systemPath,
  });

  const spinner = createSpinner("Starting...");
  provisioner.on((event: ProvisionEvent) => {
    if (event.type === "step_start") {
      spinner.text = `Running ${event.step}...`;
      printDebug(`step ${event.step} started at ${event.timestamp}`);
      return;
    }
    spinner.stop();
    printRecord(event.record);
    spinner.start();
  });

  // 4. Provision
  spinner.start();
  const startTime = Date.now();
  const report = await provisioner.run();
  spinner.stop();
  const elapsed = Date.now() - startTime;

  if (report.warnings.length > 0) {
    printBlank();
    printWarn(`${report.warnings.length} step(s) finished with warnings:`);
    report.warnings.forEach((warning, i) => {
      printStageWarn(`${i + 1}. ${warning.name}: ${warning.message ?? "failed"}`);
    });
  }

  if (!report.success) {
    printBlank();
    const fatal = report.fatal_error;
    if (fatal instanceof ProvisionError) {
      printDetail("Reason", formatErrorCategory(fatal.category));
    }
    if (fatal?.stack && isDebugMode()) {
      console.error(colors.muted(fatal.stack));
    }
    printError(fatal?.message ?? "Provisioning failed");
    return 1;
  }

  printBlank();
  if (opts.dryRun) {
    printDryRun(`Dry run complete for ${colors.app(username)}`);
    return 0;
  }

  printSuccess(
    `Provisioned PHP for ${colors.app(username)} in ${formatDuration(elapsed)}`,
  );
  printInfo("To complete the setup, run:");
  printDetail("1", `source ~/${manifest.profile.file}`);
  printDetail("2", `php_switch ${latestVersion(manifest)} (or your preferred version)`);
  printBlank();
  printInfo("Available commands:");
  printDetail("php_switch", "<version>");
  printDetail("php_project", "<laravel|cakephp|symfony>");
  printDetail("php_service", "<start|stop|restart|status> <version>");
  printDetail("php_extension", "<install|remove> <version> <extension>");
  return 0;
}

export function registerInstallCommand(program: Command): void {
  program
    .command("install", { isDefault: true })
    .description("Install PHP runtimes, Composer and framework CLIs for the invoking user")
    .option("--dry-run", "Preview provisioning; only read-only commands run", false)
    .option("--manifest <file>", "Provision from a custom manifest")
    .option("--verbose", "Show engine logs on stderr", false)
    .action(async (opts: InstallCommandOptions) => {
      const code = await runInstall(opts);
      if (code !== 0) process.exit(code);
    });
}
