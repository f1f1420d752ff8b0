/**
 * phpforge Engine — apt Adapter
 *
 * Package state is read with dpkg-query (no root needed); changes go
 * through apt-get and add-apt-repository, which the gateway only runs
 * when the process is root.
 */

import { CommandGateway } from "../gateway";
import { CommandResult } from "../process-runner";
import { PackageManagerError } from "../errors";
import { Logger } from "../utils/logger";
import { PackageManager } from "./types";

const NONINTERACTIVE_ENV = { DEBIAN_FRONTEND: "noninteractive" };

/** dpkg-query output format: "<package> <status-abbrev>" per line */
const STATUS_FORMAT = "-f=${Package} ${db:Status-Abbrev}\\n";

/**
 * Parse dpkg-query output into the set of fully installed packages.
 * "ii" means desired=install, status=installed.
 */
export function parseInstalledPackages(output: string): Set<string> {
  const installed = new Set<string>();
  for (const line of output.split("\n")) {
    const [name, status] = line.trim().split(/\s+/);
    if (name && status?.startsWith("ii")) {
      installed.add(name);
    }
  }
  return installed;
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1] ?? "";
}

export class AptPackageManager implements PackageManager {
  constructor(
    private readonly gateway: CommandGateway,
    private readonly logger: Logger,
  ) {}

  async missingPackages(packages: string[]): Promise<string[]> {
    if (packages.length === 0) return [];

    // dpkg-query exits 1 when some packages are unknown; stdout still lists the rest
    const result = await this.gateway.run({
      program: "dpkg-query",
      args: ["-W", STATUS_FORMAT, ...packages],
      readOnly: true,
    });

    const installed = parseInstalledPackages(result.stdout);
    const missing = packages.filter((pkg) => !installed.has(pkg));
    this.logger.debug(
      { requested: packages.length, missing },
      "Checked package state",
    );
    return missing;
  }

  async update(): Promise<void> {
    const result = await this.gateway.run({
      program: "apt-get",
      args: ["update"],
      env: NONINTERACTIVE_ENV,
    });
    this.check(result, "apt-get update failed");
  }

  async install(packages: string[]): Promise<void> {
    this.logger.info({ packages }, "Installing packages");
    const result = await this.gateway.run({
      program: "apt-get",
      args: ["install", "-y", ...packages],
      env: NONINTERACTIVE_ENV,
    });
    this.check(result, `apt-get install failed for ${packages.join(" ")}`, {
      packages,
    });
  }

  async addRepository(id: string): Promise<void> {
    this.logger.info({ repository: id }, "Adding package repository");
    const result = await this.gateway.run({
      program: "add-apt-repository",
      args: ["-y", id],
      env: NONINTERACTIVE_ENV,
    });
    this.check(result, `add-apt-repository failed for ${id}`, {
      repository: id,
    });
  }

  private check(
    result: CommandResult,
    message: string,
    details: Record<string, unknown> = {},
  ): void {
    if (result.exitCode === 0) return;
    const reason = lastLine(result.stderr);
    throw new PackageManagerError(
      reason ? `${message}: ${reason}` : message,
      { ...details, exit_code: result.exitCode },
    );
  }
}
