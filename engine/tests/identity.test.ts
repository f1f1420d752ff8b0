/**
 * phpforge Engine — Privilege Resolver Tests
 */

import { describe, it, expect } from "vitest";
import {
  IdentitySource,
  PasswdEntry,
  parsePasswdLine,
  resolveInvokingIdentity,
} from "../src/identity";
import { IdentityResolutionError } from "../src/errors";

const USERS: Record<string, PasswdEntry> = {
  alice: { username: "alice", uid: 1001, gid: 1001, home: "/home/alice", shell: "/usr/bin/zsh" },
  bob: { username: "bob", uid: 1002, gid: 100, home: "/home/bob", shell: "/bin/bash" },
  root: { username: "root", uid: 0, gid: 0, home: "/root", shell: "/bin/bash" },
  ghost: { username: "ghost", uid: 1003, gid: 1003, home: "/home/ghost", shell: "/bin/sh" },
};

function source(overrides: Partial<IdentitySource> = {}): IdentitySource {
  return {
    env: {},
    effectiveUid: 0,
    currentUsername: () => "root",
    loginName: async () => null,
    lookupUser: async (name) => USERS[name] ?? null,
    isDirectory: (dir) => dir !== "/home/ghost",
    ...overrides,
  };
}

describe("parsePasswdLine", () => {
  it("parses the seven passwd fields", () => {
    expect(parsePasswdLine("alice:x:1001:1001:Alice,,,:/home/alice:/usr/bin/zsh\n")).toEqual({
      username: "alice",
      uid: 1001,
      gid: 1001,
      home: "/home/alice",
      shell: "/usr/bin/zsh",
    });
  });

  it("rejects short or malformed lines", () => {
    expect(parsePasswdLine("alice:x:1001")).toBeNull();
    expect(parsePasswdLine("alice:x:abc:1001::/home/alice:/bin/sh")).toBeNull();
    expect(parsePasswdLine("")).toBeNull();
  });
});

describe("resolveInvokingIdentity", () => {
  it("uses SUDO_USER when elevated, with home from the user database", async () => {
    const ctx = await resolveInvokingIdentity(
      source({ env: { SUDO_USER: "alice", HOME: "/root", USER: "root" } }),
    );

    expect(ctx.elevated).toBe(true);
    expect(ctx.identity).toEqual({
      username: "alice",
      uid: 1001,
      gid: 1001,
      home: "/home/alice",
      shell: "/usr/bin/zsh",
    });
  });

  it("falls back to the login name, then USER", async () => {
    const viaLogin = await resolveInvokingIdentity(
      source({ env: { USER: "root" }, loginName: async () => "bob" }),
    );
    expect(viaLogin.identity.username).toBe("bob");

    const viaUser = await resolveInvokingIdentity(source({ env: { USER: "root" } }));
    expect(viaUser.identity.username).toBe("root");
    expect(viaUser.identity.home).toBe("/root");
  });

  it("uses the current user when not elevated and ignores SUDO_USER", async () => {
    const ctx = await resolveInvokingIdentity(
      source({ effectiveUid: 1002, currentUsername: () => "bob", env: { SUDO_USER: "alice" } }),
    );

    expect(ctx.elevated).toBe(false);
    expect(ctx.identity.username).toBe("bob");
  });

  it("fails for an unknown user", async () => {
    const pending = resolveInvokingIdentity(source({ env: { SUDO_USER: "mallory" } }));

    await expect(pending).rejects.toBeInstanceOf(IdentityResolutionError);
    await expect(pending).rejects.toThrow(
      'User "mallory" was not found in the user database',
    );
  });

  it("fails when the home directory is missing", async () => {
    await expect(
      resolveInvokingIdentity(source({ env: { SUDO_USER: "ghost" } })),
    ).rejects.toThrow('Home directory for "ghost" does not exist: /home/ghost');
  });

  it("fails when no user name can be determined", async () => {
    await expect(resolveInvokingIdentity(source())).rejects.toThrow(
      "Could not determine the invoking user",
    );
  });
});
