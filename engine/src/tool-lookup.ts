/**
 * phpforge Engine — Tool Lookup
 *
 * Answers "would the invoking identity find this command on PATH?" without
 * spawning a shell. The search path is the system default plus the
 * directories the profile step adds, so a tool installed on an earlier run
 * counts as present even before the user opens a new shell.
 */

import * as path from "path";
import { InvokingIdentity, ProvisionManifest } from "./types";
import { FileOps } from "./fs-ops";
import { resolveVariables } from "./utils/variables";

export const SYSTEM_PATH: readonly string[] = [
  "/usr/local/sbin",
  "/usr/local/bin",
  "/usr/sbin",
  "/usr/bin",
  "/sbin",
  "/bin",
];

/**
 * Build the PATH the invoking identity sees once the profile is sourced.
 */
export function userSearchPath(
  identity: InvokingIdentity,
  manifest: ProvisionManifest,
  systemPath: readonly string[] = SYSTEM_PATH,
): string[] {
  const userDirs = manifest.profile.path_entries.map((entry) =>
    resolveVariables(entry.dir, { HOME: identity.home }),
  );
  return [...new Set([...userDirs, ...systemPath])];
}

/**
 * Find an executable by name in the given directories.
 *
 * @returns Absolute path of the first match, or null
 */
export function findOnPath(
  command: string,
  searchPath: string[],
  fileOps: FileOps,
): string | null {
  for (const dir of searchPath) {
    const candidate = path.join(dir, command);
    if (fileOps.isExecutable(candidate)) return candidate;
  }
  return null;
}
