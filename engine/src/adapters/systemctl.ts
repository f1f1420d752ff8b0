import { CommandGateway } from "../gateway";
import { Logger } from "../utils/logger";
import { ServiceManager } from "./types";

export class SystemctlServiceManager implements ServiceManager {
  constructor(
    private readonly gateway: CommandGateway,
    private readonly logger: Logger,
  ) {}

  async isActive(service: string): Promise<boolean> {
    const result = await this.gateway.run({
      program: "systemctl",
      args: ["is-active", "--quiet", service],
      readOnly: true,
    });
    return result.exitCode === 0;
  }

  async restart(service: string): Promise<boolean> {
    const result = await this.gateway.run({
      program: "systemctl",
      args: ["restart", service],
    });

    if (result.exitCode !== 0) {
      this.logger.warn(
        { service, exitCode: result.exitCode },
        "Service restart failed",
      );
      return false;
    }

    this.logger.info({ service }, "Restarted service");
    return true;
  }
}
