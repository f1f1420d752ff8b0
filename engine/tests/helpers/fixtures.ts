/**
 * Shared test fixtures: a manifest rooted in a temp directory, an identity
 * with a real home directory, a FileOps that records ownership changes and
 * a downloader serving canned content.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ProvisionContext, ProvisionManifest } from "../../src/types";
import { FileOps, nodeFileOps } from "../../src/fs-ops";
import { DownloadError } from "../../src/errors";
import { Downloader, DownloadResult } from "../../src/downloader";
import { createLogger } from "../../src/utils/logger";

export const TEMPLATE_PATH = path.resolve(
  __dirname,
  "../../../catalog/templates/php-helpers.zsh",
);

export const COMPOSER_URL = "https://downloads.test/composer.phar";
export const COMPOSER_CHECKSUM_URL = "https://downloads.test/composer.phar.sha256sum";
export const SYMFONY_URL = "https://downloads.test/symfony/installer";
export const PHAR_CONTENT = "#!/usr/bin/env php\n<?php // test phar\n";

export const silentLogger = createLogger({ level: "silent" });

export function makeTempRoot(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function sha256(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

export function testManifest(
  root: string,
  overrides: Partial<ProvisionManifest> = {},
): ProvisionManifest {
  return {
    schema_version: "1",
    repository: {
      id: "ppa:ondrej/php",
      marker: "ondrej/php",
      sources: [
        path.join(root, "etc/apt/sources.list"),
        path.join(root, "etc/apt/sources.list.d"),
      ],
    },
    system_packages: ["unzip", "git", "curl"],
    php: {
      versions: ["8.2", "8.3"],
      extensions: ["cli", "fpm", "mbstring"],
      binary: `${root}/usr/bin/php\${PHP_VERSION}`,
      ini_files: [
        `${root}/etc/php/\${PHP_VERSION}/cli/php.ini`,
        `${root}/etc/php/\${PHP_VERSION}/fpm/php.ini`,
      ],
      ini_settings: {
        memory_limit: "512M",
        upload_max_filesize: "64M",
        post_max_size: "64M",
      },
      fpm_service: "php${PHP_VERSION}-fpm",
      alternatives: { name: "php", link: `${root}/usr/bin/php` },
    },
    composer: {
      command: "composer",
      install_path: path.join(root, "usr/local/bin/composer"),
      download_url: COMPOSER_URL,
      checksum_url: COMPOSER_CHECKSUM_URL,
    },
    frameworks: [
      {
        id: "laravel",
        command: "laravel",
        method: "composer-global",
        package: "laravel/installer",
      },
      {
        id: "symfony",
        command: "symfony",
        method: "installer-script",
        installer_url: SYMFONY_URL,
        install_dir: "${HOME}/.local/bin",
      },
    ],
    profile: {
      file: ".zshrc",
      marker: "# PHP Helper Functions",
      verify: "function php_switch()",
      template: TEMPLATE_PATH,
      path_entries: [
        {
          dir: "${HOME}/.config/composer/vendor/bin",
          fragment: "composer/vendor/bin",
          line: 'export PATH="$HOME/.config/composer/vendor/bin:$PATH"',
        },
        {
          dir: "${HOME}/.local/bin",
          fragment: ".local/bin",
          line: 'export PATH="$HOME/.local/bin:$PATH"',
        },
      ],
    },
    ...overrides,
  };
}

/** System PATH directories inside the fake root */
export function testSystemPath(root: string): string[] {
  return [path.join(root, "usr/local/bin"), path.join(root, "usr/bin")];
}

export function aliceContext(root: string, elevated = true): ProvisionContext {
  const home = path.join(root, "home/alice");
  fs.mkdirSync(home, { recursive: true });
  return {
    identity: { username: "alice", uid: 1001, gid: 1001, home, shell: "/usr/bin/zsh" },
    elevated,
    env: { PATH: "/usr/sbin:/usr/bin", SUDO_USER: "alice", HOME: "/root" },
  };
}

export interface ChownCall {
  path: string;
  uid: number;
  gid: number;
}

/**
 * Real filesystem operations, except chown is recorded instead of applied
 * (tests don't run as root). Writes to `blockedWrites` silently do nothing.
 * Temp directories are remembered so tests can check they were cleaned up.
 */
export class RecordingFileOps implements FileOps {
  readonly chowns: ChownCall[] = [];
  readonly blockedWrites = new Set<string>();
  readonly tempDirs: string[] = [];

  exists(filePath: string): boolean {
    return nodeFileOps.exists(filePath);
  }
  isDirectory(filePath: string): boolean {
    return nodeFileOps.isDirectory(filePath);
  }
  isExecutable(filePath: string): boolean {
    return nodeFileOps.isExecutable(filePath);
  }
  readFile(filePath: string): string {
    return nodeFileOps.readFile(filePath);
  }
  writeFileAtomic(filePath: string, content: string): void {
    if (this.blockedWrites.has(filePath)) return;
    nodeFileOps.writeFileAtomic(filePath, content);
  }
  copyFile(src: string, dest: string): void {
    nodeFileOps.copyFile(src, dest);
  }
  remove(filePath: string): void {
    nodeFileOps.remove(filePath);
  }
  mkdirp(dirPath: string): void {
    nodeFileOps.mkdirp(dirPath);
  }
  makeTempDir(prefix: string): string {
    const dir = nodeFileOps.makeTempDir(prefix);
    this.tempDirs.push(dir);
    return dir;
  }
  readDir(dirPath: string): string[] {
    return nodeFileOps.readDir(dirPath);
  }
  chown(filePath: string, uid: number, gid: number): void {
    this.chowns.push({ path: filePath, uid, gid });
  }
  chmod(filePath: string, mode: number): void {
    nodeFileOps.chmod(filePath, mode);
  }

  ownersOf(filePath: string): ChownCall[] {
    return this.chowns.filter((call) => call.path === filePath);
  }
}

/**
 * Serves fixed content per URL; unknown URLs fail like an HTTP 404.
 */
export class FakeDownloader implements Downloader {
  readonly requested: string[] = [];

  constructor(private readonly content: Record<string, string>) {}

  async download(url: string, destDir: string, filename?: string): Promise<DownloadResult> {
    this.requested.push(url);
    const body = this.content[url];
    if (body === undefined) {
      throw new DownloadError(`Download failed: HTTP 404 for ${url}`, { url, status: 404 });
    }
    const filePath = path.join(destDir, filename ?? path.basename(url));
    fs.mkdirSync(destDir, { recursive: true });
    fs.writeFileSync(filePath, body);
    return { file_path: filePath, bytes_downloaded: body.length, duration_ms: 0 };
  }

  async fetchText(url: string): Promise<string> {
    this.requested.push(url);
    const body = this.content[url];
    if (body === undefined) {
      throw new DownloadError(`Download failed: HTTP 404 for ${url}`, { url, status: 404 });
    }
    return body;
  }
}

/** Downloads for a full run: a phar with a matching checksum and the Symfony installer */
export function standardDownloads(pharContent = PHAR_CONTENT): Record<string, string> {
  return {
    [COMPOSER_URL]: pharContent,
    [COMPOSER_CHECKSUM_URL]: `${sha256(PHAR_CONTENT)}  composer.phar\n`,
    [SYMFONY_URL]: "#!/bin/bash\necho installing symfony\n",
  };
}
