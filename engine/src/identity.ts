/**
 * phpforge Engine — Privilege Resolver
 *
 * Determines the human operator the run is for, even when the process was
 * started through sudo. Package installs need root, but the profile,
 * user-local binaries and Composer's global directory must belong to the
 * operator.
 *
 * Resolution order when elevated: SUDO_USER → login name → USER.
 * When not elevated: the current process user.
 * Home, uid and gid always come from the user database, never from $HOME,
 * which under sudo may still point at the operator's or root's home.
 */

import * as fs from "fs";
import * as os from "os";
import { execFile } from "child_process";
import { promisify } from "util";
import { InvokingIdentity, ProvisionContext } from "./types";
import { IdentityResolutionError } from "./errors";
import { Logger } from "./utils/logger";

const execFileAsync = promisify(execFile);

export interface PasswdEntry {
  username: string;
  uid: number;
  gid: number;
  home: string;
  shell: string;
}

/**
 * Everything the resolver reads from the host. The system source reads the
 * real process; tests supply their own.
 */
export interface IdentitySource {
  env: Readonly<Record<string, string | undefined>>;
  effectiveUid: number;
  currentUsername(): string;
  loginName(): Promise<string | null>;
  lookupUser(username: string): Promise<PasswdEntry | null>;
  isDirectory(dirPath: string): boolean;
}

/**
 * Parse one passwd(5) line: name:password:uid:gid:gecos:home:shell
 */
export function parsePasswdLine(line: string): PasswdEntry | null {
  const fields = line.trim().split(":");
  if (fields.length < 7) return null;

  const [username, , uidField, gidField, , home, shell] = fields;
  const uid = Number(uidField);
  const gid = Number(gidField);
  if (!username || !Number.isInteger(uid) || !Number.isInteger(gid)) {
    return null;
  }

  return { username, uid, gid, home, shell };
}

/**
 * Look a user up via NSS (getent), falling back to /etc/passwd when getent
 * is unavailable.
 */
async function lookupPasswd(username: string): Promise<PasswdEntry | null> {
  // getent exits 2 for unknown users; the file scan then gives the same answer
  const viaGetent = await execFileAsync("getent", ["passwd", username]).then(
    ({ stdout }) => parsePasswdLine(stdout.split("\n")[0] ?? ""),
    () => undefined,
  );
  if (viaGetent) return viaGetent;

  try {
    const content = fs.readFileSync("/etc/passwd", "utf-8");
    for (const line of content.split("\n")) {
      const entry = parsePasswdLine(line);
      if (entry && entry.username === username) return entry;
    }
  } catch {
    return null;
  }
  return null;
}

export function systemIdentitySource(): IdentitySource {
  return {
    env: { ...process.env },
    effectiveUid: process.geteuid?.() ?? -1,
    currentUsername: () => os.userInfo().username,
    loginName: async () => {
      try {
        const { stdout } = await execFileAsync("logname");
        return stdout.trim() || null;
      } catch {
        return null;
      }
    },
    lookupUser: lookupPasswd,
    isDirectory: (dirPath) => {
      try {
        return fs.statSync(dirPath).isDirectory();
      } catch {
        return false;
      }
    },
  };
}

async function resolveUsername(
  source: IdentitySource,
  elevated: boolean,
): Promise<string> {
  if (!elevated) return source.currentUsername().trim();

  const sudoUser = source.env.SUDO_USER?.trim();
  if (sudoUser) return sudoUser;

  const loginName = (await source.loginName())?.trim();
  if (loginName) return loginName;

  return source.env.USER?.trim() ?? "";
}

/**
 * Resolve the invoking identity and build the provisioning context.
 *
 * @throws IdentityResolutionError if the user is unknown or has no home directory
 */
export async function resolveInvokingIdentity(
  source: IdentitySource,
  logger?: Logger,
): Promise<ProvisionContext> {
  const elevated = source.effectiveUid === 0;
  const username = await resolveUsername(source, elevated);

  if (!username) {
    throw new IdentityResolutionError(
      "Could not determine the invoking user",
    );
  }

  const entry = await source.lookupUser(username);
  if (!entry) {
    throw new IdentityResolutionError(
      `User "${username}" was not found in the user database`,
      { username },
    );
  }

  if (!entry.home || !source.isDirectory(entry.home)) {
    throw new IdentityResolutionError(
      `Home directory for "${username}" does not exist: ${entry.home || "(empty)"}`,
      { username, home: entry.home },
    );
  }

  const identity: InvokingIdentity = {
    username: entry.username,
    uid: entry.uid,
    gid: entry.gid,
    home: entry.home,
    shell: entry.shell,
  };

  logger?.debug({ identity, elevated }, "Resolved invoking identity");

  return { identity, elevated, env: source.env };
}
