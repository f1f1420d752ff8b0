/**
 * phpforge Engine — Command Gateway
 *
 * The only path by which the engine runs external programs. Programs on the
 * elevation allow-list fail with PrivilegeError before anything is spawned
 * when the process is not root.
 *
 * runAsUser() is the identity switch: tools that write into the operator's
 * home (composer global, the Symfony installer) run with the operator's
 * uid/gid and environment even though the process itself is root.
 */

import * as path from "path";
import { ProvisionContext } from "./types";
import { PrivilegeError } from "./errors";
import { Logger } from "./utils/logger";
import { CommandResult, ProcessRunner, SpawnRequest } from "./process-runner";

/** Programs that structurally require root */
export const ELEVATED_PROGRAMS: readonly string[] = [
  "apt",
  "apt-get",
  "dpkg",
  "systemctl",
  "update-alternatives",
  "add-apt-repository",
];

export function requiresElevation(program: string): boolean {
  return ELEVATED_PROGRAMS.includes(path.basename(program));
}

export interface CommandSpec {
  program: string;
  args: string[];
  /** Queries that change nothing still execute in dry-run mode */
  readOnly?: boolean;
  cwd?: string;
  env?: Record<string, string>;
}

export interface GatewayOptions {
  dryRun: boolean;
  /** PATH directories the invoking identity's login shell would see */
  userPath: string[];
}

function definedEntries(
  env: Readonly<Record<string, string | undefined>>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export class CommandGateway {
  constructor(
    private readonly context: ProvisionContext,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
    private readonly options: GatewayOptions,
  ) {}

  get dryRun(): boolean {
    return this.options.dryRun;
  }

  /**
   * Run a program with the process's own privileges.
   *
   * @throws PrivilegeError if the program needs root and the process is not root
   */
  async run(spec: CommandSpec): Promise<CommandResult> {
    if (requiresElevation(spec.program) && !this.context.elevated) {
      this.logger.warn(
        { program: spec.program },
        "Command requires root privileges",
      );
      throw new PrivilegeError(spec.program);
    }

    return this.execute(spec, {
      program: spec.program,
      args: spec.args,
      cwd: spec.cwd,
      env: { ...definedEntries(this.context.env), ...spec.env },
    });
  }

  /**
   * Run a program as the invoking identity, never elevated.
   *
   * @throws PrivilegeError if the program is on the elevation allow-list
   */
  async runAsUser(spec: CommandSpec): Promise<CommandResult> {
    if (requiresElevation(spec.program)) {
      throw new PrivilegeError(
        spec.program,
        `Command '${spec.program}' requires root and cannot run as ${this.context.identity.username}`,
      );
    }

    const { identity } = this.context;
    const request: SpawnRequest = {
      program: spec.program,
      args: spec.args,
      cwd: spec.cwd ?? identity.home,
      env: { ...this.userEnvironment(), ...spec.env },
    };

    // Only root can switch identity; otherwise we already are the user
    if (this.context.elevated) {
      request.uid = identity.uid;
      request.gid = identity.gid;
    }

    return this.execute(spec, request);
  }

  /**
   * The environment a login shell of the invoking identity would have.
   */
  userEnvironment(): Record<string, string> {
    const { identity, env } = this.context;
    const result: Record<string, string> = {
      HOME: identity.home,
      USER: identity.username,
      LOGNAME: identity.username,
      SHELL: identity.shell,
      PATH: this.options.userPath.join(":"),
    };
    if (env.LANG) result.LANG = env.LANG;
    return result;
  }

  private async execute(
    spec: CommandSpec,
    request: SpawnRequest,
  ): Promise<CommandResult> {
    const commandLine = [spec.program, ...spec.args].join(" ");

    if (this.options.dryRun && !spec.readOnly) {
      this.logger.info({ command: commandLine }, "[DRY RUN] Would run");
      return { exitCode: 0, stdout: "", stderr: "" };
    }

    this.logger.debug(
      { command: commandLine, uid: request.uid },
      "Running command",
    );
    const result = await this.runner.run(request);

    if (result.exitCode !== 0) {
      this.logger.debug(
        {
          command: commandLine,
          exitCode: result.exitCode,
          stderr: result.stderr.trim().slice(-2000),
        },
        "Command exited non-zero",
      );
    }

    return result;
  }
}
