/**
 * phpforge Engine — update-alternatives Adapter
 */

import { CommandGateway } from "../gateway";
import { PackageManagerError } from "../errors";
import { Logger } from "../utils/logger";
import { AlternativeEntry, AlternativesManager } from "./types";

/**
 * Parse `update-alternatives --query` output. Each alternative is a stanza
 * with "Alternative: <path>" followed by "Priority: <n>".
 */
export function parseAlternativesQuery(output: string): AlternativeEntry[] {
  const entries: AlternativeEntry[] = [];
  let current: string | null = null;

  for (const line of output.split("\n")) {
    const alternative = line.match(/^Alternative:\s*(\S+)/);
    if (alternative) {
      current = alternative[1];
      continue;
    }

    const priority = line.match(/^Priority:\s*(-?\d+)/);
    if (priority && current) {
      entries.push({ path: current, priority: Number(priority[1]) });
      current = null;
    }
  }

  return entries;
}

export class UpdateAlternativesManager implements AlternativesManager {
  constructor(
    private readonly gateway: CommandGateway,
    private readonly logger: Logger,
  ) {}

  async query(name: string): Promise<AlternativeEntry[]> {
    // Exit code 2 means no alternatives are registered under this name
    const result = await this.gateway.run({
      program: "update-alternatives",
      args: ["--query", name],
      readOnly: true,
    });
    if (result.exitCode !== 0) return [];
    return parseAlternativesQuery(result.stdout);
  }

  async removeAll(name: string): Promise<boolean> {
    const result = await this.gateway.run({
      program: "update-alternatives",
      args: ["--remove-all", name],
    });
    if (result.exitCode !== 0) {
      this.logger.debug({ name }, "No alternatives removed");
      return false;
    }
    return true;
  }

  async install(
    link: string,
    name: string,
    target: string,
    priority: number,
  ): Promise<void> {
    const result = await this.gateway.run({
      program: "update-alternatives",
      args: ["--install", link, name, target, String(priority)],
    });
    if (result.exitCode !== 0) {
      throw new PackageManagerError(
        `update-alternatives could not register ${target}`,
        { name, target, priority, exit_code: result.exitCode },
      );
    }
    this.logger.info({ name, target, priority }, "Registered alternative");
  }
}
