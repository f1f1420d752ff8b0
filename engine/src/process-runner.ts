/**
 * phpforge Engine — Process Runner
 *
 * Spawns one external program and waits for it to exit. No timeout is
 * applied: apt on a slow mirror can legitimately take many minutes, and a
 * provisioning run is operator-attended.
 */

import { spawn } from "child_process";

export interface SpawnRequest {
  program: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
  /** Run as this uid/gid (requires root) */
  uid?: number;
  gid?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(request: SpawnRequest): Promise<CommandResult>;
}

/** Exit code reported when the program could not be launched at all */
export const LAUNCH_FAILURE_EXIT_CODE = 127;

export const spawnRunner: ProcessRunner = {
  run(request) {
    return new Promise<CommandResult>((resolve) => {
      let stdout = "";
      let stderr = "";
      let settled = false;

      const child = spawn(request.program, request.args, {
        cwd: request.cwd,
        env: request.env,
        uid: request.uid,
        gid: request.gid,
        stdio: ["ignore", "pipe", "pipe"],
      });

      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf-8");
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf-8");
      });

      child.on("close", (code) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        resolve({
          exitCode: LAUNCH_FAILURE_EXIT_CODE,
          stdout,
          stderr: `Failed to launch ${request.program}: ${err.message}`,
        });
      });
    });
  },
};
