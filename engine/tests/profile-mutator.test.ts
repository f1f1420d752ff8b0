/**
 * phpforge Engine — Profile Mutator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ProfileMutator } from "../src/profile-mutator";
import { ProfileMutationError } from "../src/errors";
import { InvokingIdentity } from "../src/types";
import { RecordingFileOps, makeTempRoot, silentLogger } from "./helpers/fixtures";

const HELPERS = {
  id: "helpers",
  marker: "# PHP Helper Functions",
  verify: "function php_switch()",
  content: "\n# PHP Helper Functions\nfunction php_switch() {\n  echo switch\n}\n",
};

let home: string;
let profile: string;
let fileOps: RecordingFileOps;
let identity: InvokingIdentity;

beforeEach(() => {
  home = makeTempRoot("phpforge-home-");
  profile = path.join(home, ".zshrc");
  fileOps = new RecordingFileOps();
  identity = { username: "alice", uid: 1001, gid: 1001, home, shell: "/usr/bin/zsh" };
});

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true });
});

function mutator(dryRun = false): ProfileMutator {
  return new ProfileMutator({ identity, file: ".zshrc", fileOps, logger: silentLogger, dryRun });
}

describe("ProfileMutator", () => {
  it("resolves the profile inside the identity's home", () => {
    expect(mutator().profilePath).toBe(profile);
  });

  it("creates the profile when it does not exist", () => {
    expect(mutator().ensureBlock(HELPERS)).toBe("appended");

    expect(fs.readFileSync(profile, "utf-8")).toBe(HELPERS.content);
    expect(fileOps.ownersOf(profile)).toEqual([{ path: profile, uid: 1001, gid: 1001 }]);
  });

  it("appends after existing content and adds a missing trailing newline", () => {
    fs.writeFileSync(profile, "alias ll='ls -l'");
    mutator().ensureBlock({ id: "path", marker: ".local/bin", verify: ".local/bin", content: 'export PATH="$HOME/.local/bin:$PATH"' });

    expect(fs.readFileSync(profile, "utf-8")).toBe(
      "alias ll='ls -l'\nexport PATH=\"$HOME/.local/bin:$PATH\"\n",
    );
    expect(fs.readdirSync(home)).toEqual([".zshrc"]);
  });

  it("leaves the profile byte-identical when the marker is present", () => {
    const original = "# PHP Helper Functions\nfunction php_switch() {}\n";
    fs.writeFileSync(profile, original);

    expect(mutator().ensureBlock(HELPERS)).toBe("present");
    expect(fs.readFileSync(profile, "utf-8")).toBe(original);
    expect(fs.readdirSync(home)).toEqual([".zshrc"]);
  });

  it("restores the original when verification fails", () => {
    const original = "export EDITOR=vim\n";
    fs.writeFileSync(profile, original);
    fileOps.blockedWrites.add(profile);

    expect(() => mutator().ensureBlock(HELPERS)).toThrow(
      `Verification failed for ${profile}: "function php_switch()" not found`,
    );
    expect(fs.readFileSync(profile, "utf-8")).toBe(original);
    expect(fs.readdirSync(home)).toEqual([".zshrc"]);
  });

  it("removes a profile it created when verification fails", () => {
    fileOps.blockedWrites.add(profile);

    expect(() => mutator().ensureBlock(HELPERS)).toThrow(ProfileMutationError);
    expect(fs.existsSync(profile)).toBe(false);
  });

  it("fails when a present marker lacks the verify token", () => {
    const original = "# PHP Helper Functions\n# (functions removed by hand)\n";
    fs.writeFileSync(profile, original);

    expect(() => mutator().ensureBlock(HELPERS)).toThrow(ProfileMutationError);
    expect(fs.readFileSync(profile, "utf-8")).toBe(original);
  });

  it("appends through a symlinked profile", () => {
    const original = "export EDITOR=vim\n";
    const dotfiles = path.join(home, "dotfiles");
    fs.mkdirSync(dotfiles);
    fs.writeFileSync(path.join(dotfiles, "zshrc"), original);
    fs.symlinkSync(path.join(dotfiles, "zshrc"), profile);

    expect(mutator().ensureBlock(HELPERS)).toBe("appended");

    expect(fs.lstatSync(profile).isSymbolicLink()).toBe(true);
    expect(fs.readFileSync(path.join(dotfiles, "zshrc"), "utf-8")).toBe(
      original + HELPERS.content,
    );
    expect(fs.readdirSync(dotfiles)).toEqual(["zshrc"]);
  });

  it("leaves the user's own .bak file alone", () => {
    fs.writeFileSync(profile, "export EDITOR=vim\n");
    fs.writeFileSync(`${profile}.bak`, "my backup\n");

    mutator().ensureBlock(HELPERS);
    expect(fs.readFileSync(`${profile}.bak`, "utf-8")).toBe("my backup\n");

    fileOps.blockedWrites.add(profile);
    expect(() =>
      mutator().ensureBlock({ ...HELPERS, marker: "# other", verify: "other_fn()" }),
    ).toThrow(ProfileMutationError);
    expect(fs.readFileSync(`${profile}.bak`, "utf-8")).toBe("my backup\n");
    expect(fs.readdirSync(home).sort()).toEqual([".zshrc", ".zshrc.bak"]);
  });

  it("writes nothing in dry-run", () => {
    const m = mutator(true);

    expect(m.ensureBlock(HELPERS)).toBe("appended");
    expect(fs.existsSync(profile)).toBe(false);
    expect(fileOps.chowns).toEqual([]);
  });

  it("reports a present marker in dry-run", () => {
    fs.writeFileSync(profile, "# PHP Helper Functions\n");
    expect(mutator(true).ensureBlock(HELPERS)).toBe("present");
  });
});
