/**
 * phpforge Engine — File Operations
 *
 * Every file the engine touches (profile, php.ini, downloaded tools) goes
 * through this interface. The node implementation is used in production;
 * tests wrap it to record ownership changes or simulate failing writes.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export interface FileOps {
  exists(filePath: string): boolean;
  isDirectory(filePath: string): boolean;
  /** Regular file with at least one execute bit */
  isExecutable(filePath: string): boolean;
  readFile(filePath: string): string;
  /**
   * Replace a file's content by writing a sibling temp file and renaming it
   * over the target. An existing file's mode is preserved, and a symlink is
   * resolved so the file it points to is replaced instead of the link.
   */
  writeFileAtomic(filePath: string, content: string): void;
  copyFile(src: string, dest: string): void;
  /** Recursive, no error if missing */
  remove(filePath: string): void;
  mkdirp(dirPath: string): void;
  makeTempDir(prefix: string): string;
  readDir(dirPath: string): string[];
  chown(filePath: string, uid: number, gid: number): void;
  chmod(filePath: string, mode: number): void;
}

export const nodeFileOps: FileOps = {
  exists(filePath) {
    return fs.existsSync(filePath);
  },

  isDirectory(filePath) {
    try {
      return fs.statSync(filePath).isDirectory();
    } catch {
      return false;
    }
  },

  isExecutable(filePath) {
    try {
      const stat = fs.statSync(filePath);
      return stat.isFile() && (stat.mode & 0o111) !== 0;
    } catch {
      return false;
    }
  },

  readFile(filePath) {
    return fs.readFileSync(filePath, "utf-8");
  },

  writeFileAtomic(filePath, content) {
    // Symlinked dotfiles are written through to their target
    const existed = fs.existsSync(filePath);
    const target = existed ? fs.realpathSync(filePath) : filePath;
    const tmpPath = path.join(
      path.dirname(target),
      `.${path.basename(target)}.phpforge-${process.pid}.tmp`,
    );
    const mode = existed ? fs.statSync(target).mode & 0o7777 : 0o644;

    try {
      fs.writeFileSync(tmpPath, content, { encoding: "utf-8", mode });
      fs.chmodSync(tmpPath, mode);
      fs.renameSync(tmpPath, target);
    } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      throw err;
    }
  },

  copyFile(src, dest) {
    fs.copyFileSync(src, dest);
  },

  remove(filePath) {
    fs.rmSync(filePath, { recursive: true, force: true });
  },

  mkdirp(dirPath) {
    fs.mkdirSync(dirPath, { recursive: true });
  },

  makeTempDir(prefix) {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  },

  readDir(dirPath) {
    return fs.readdirSync(dirPath);
  },

  chown(filePath, uid, gid) {
    fs.chownSync(filePath, uid, gid);
  },

  chmod(filePath, mode) {
    fs.chmodSync(filePath, mode);
  },
};
