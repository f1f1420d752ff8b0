/**
 * phpforge Engine — INI Config Editor Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  applyIniSettings,
  applyIniSettingsToContent,
  formatBackupStamp,
  IniEditOptions,
} from "../src/config-editor";
import { nodeFileOps } from "../src/fs-ops";
import { makeTempRoot, silentLogger } from "./helpers/fixtures";

describe("formatBackupStamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatBackupStamp(new Date(2024, 2, 7, 4, 5, 9))).toBe("20240307_040509");
  });
});

describe("applyIniSettingsToContent", () => {
  it("rewrites an existing directive in place", () => {
    const result = applyIniSettingsToContent(
      "[PHP]\nmemory_limit = 128M\nmax_execution_time = 30\n",
      { memory_limit: "512M" },
    );
    expect(result).toEqual({
      content: "[PHP]\nmemory_limit = 512M\nmax_execution_time = 30\n",
      changed: ["memory_limit"],
    });
  });

  it("rewrites every active occurrence and leaves comments alone", () => {
    const result = applyIniSettingsToContent(
      ";memory_limit = 64M\nmemory_limit=128M\n[Date]\n  memory_limit = 256M\n",
      { memory_limit: "512M" },
    );
    expect(result.content).toBe(
      ";memory_limit = 64M\nmemory_limit = 512M\n[Date]\nmemory_limit = 512M\n",
    );
  });

  it("treats a quoted value as equal to the bare value", () => {
    const result = applyIniSettingsToContent('memory_limit = "512M"\n', {
      memory_limit: "512M",
    });
    expect(result.changed).toEqual([]);
  });

  it("inserts a missing directive after [PHP]", () => {
    const result = applyIniSettingsToContent("[PHP]\nengine = On\n", {
      upload_max_filesize: "64M",
    });
    expect(result.content).toBe("[PHP]\nupload_max_filesize = 64M\nengine = On\n");
  });

  it("appends a missing directive when there is no [PHP] section", () => {
    const result = applyIniSettingsToContent("engine = On\n", { post_max_size: "64M" });
    expect(result.content).toBe("engine = On\npost_max_size = 64M\n");
  });

  it("does not match a key that only shares a prefix", () => {
    const result = applyIniSettingsToContent("[PHP]\npost_max_size_extra = 1\n", {
      post_max_size: "64M",
    });
    expect(result.content).toBe(
      "[PHP]\npost_max_size = 64M\npost_max_size_extra = 1\n",
    );
  });
});

describe("applyIniSettings", () => {
  let dir: string;
  let file: string;
  let options: IniEditOptions;

  beforeEach(() => {
    dir = makeTempRoot("phpforge-ini-");
    file = path.join(dir, "php.ini");
    options = {
      fileOps: nodeFileOps,
      logger: silentLogger,
      dryRun: false,
      now: () => new Date(2024, 0, 15, 9, 30, 5),
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports a missing file without creating it", () => {
    expect(applyIniSettings(file, { memory_limit: "512M" }, options)).toEqual({
      file,
      status: "missing",
      changed_keys: [],
    });
    expect(fs.existsSync(file)).toBe(false);
  });

  it("backs up the original before writing a change", () => {
    fs.writeFileSync(file, "memory_limit = 128M\n");
    const result = applyIniSettings(file, { memory_limit: "512M" }, options);

    expect(result).toEqual({
      file,
      status: "updated",
      changed_keys: ["memory_limit"],
      backup_path: `${file}.bak.20240115_093005`,
    });
    expect(fs.readFileSync(file, "utf-8")).toBe("memory_limit = 512M\n");
    expect(fs.readFileSync(`${file}.bak.20240115_093005`, "utf-8")).toBe(
      "memory_limit = 128M\n",
    );
  });

  it("neither backs up nor writes when nothing changes", () => {
    fs.writeFileSync(file, "memory_limit = 512M\n");
    const result = applyIniSettings(file, { memory_limit: "512M" }, options);

    expect(result.status).toBe("unchanged");
    expect(fs.readdirSync(dir)).toEqual(["php.ini"]);
  });

  it("leaves the file untouched in dry-run", () => {
    fs.writeFileSync(file, "memory_limit = 128M\n");
    const result = applyIniSettings(file, { memory_limit: "512M" }, { ...options, dryRun: true });

    expect(result.status).toBe("updated");
    expect(result.backup_path).toBeUndefined();
    expect(fs.readFileSync(file, "utf-8")).toBe("memory_limit = 128M\n");
    expect(fs.readdirSync(dir)).toEqual(["php.ini"]);
  });
});
