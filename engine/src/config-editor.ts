/**
 * phpforge Engine — INI Config Editor
 *
 * Sets directives in php.ini as a read-modify-write over the file's lines.
 * A file is only backed up and rewritten when at least one value actually
 * changes, so repeated runs leave neither a new backup nor a new mtime.
 */

import { FileOps } from "./fs-ops";
import { Logger } from "./utils/logger";

export interface IniEditOptions {
  fileOps: FileOps;
  logger: Logger;
  dryRun: boolean;
  now: () => Date;
}

export type IniEditStatus = "missing" | "unchanged" | "updated";

export interface IniEditResult {
  file: string;
  status: IniEditStatus;
  changed_keys: string[];
  backup_path?: string;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local-time stamp used in backup names: YYYYMMDD_HHMMSS
 */
export function formatBackupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function unquote(value: string): string {
  const match = value.match(/^"(.*)"$/);
  return match ? match[1] : value;
}

/**
 * Apply settings to ini text. Every active occurrence of a key is rewritten
 * (PHP honours the last one); commented-out lines are left alone. A key that
 * is not set anywhere is inserted after the [PHP] section header, or appended.
 */
export function applyIniSettingsToContent(
  content: string,
  settings: Record<string, string>,
): { content: string; changed: string[] } {
  const lines = content.split("\n");
  const changed: string[] = [];

  for (const [key, value] of Object.entries(settings)) {
    const directive = new RegExp(`^\\s*${escapeRegExp(key)}\\s*=\\s*(.*?)\\s*$`);
    let found = false;
    let keyChanged = false;

    for (let i = 0; i < lines.length; i++) {
      const match = lines[i].match(directive);
      if (!match) continue;
      found = true;
      if (unquote(match[1]) !== value) {
        lines[i] = `${key} = ${value}`;
        keyChanged = true;
      }
    }

    if (!found) {
      const section = lines.findIndex((line) => line.trim() === "[PHP]");
      if (section >= 0) {
        lines.splice(section + 1, 0, `${key} = ${value}`);
      } else {
        const end = lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
        lines.splice(end, 0, `${key} = ${value}`);
      }
      keyChanged = true;
    }

    if (keyChanged) changed.push(key);
  }

  return { content: lines.join("\n"), changed };
}

/**
 * Apply settings to an ini file on disk, backing it up first when it will change.
 * A missing file is reported, not created.
 */
export function applyIniSettings(
  file: string,
  settings: Record<string, string>,
  options: IniEditOptions,
): IniEditResult {
  const { fileOps, logger, dryRun } = options;

  if (!fileOps.exists(file)) {
    logger.debug({ file }, "Config file not present, skipping");
    return { file, status: "missing", changed_keys: [] };
  }

  const original = fileOps.readFile(file);
  const { content, changed } = applyIniSettingsToContent(original, settings);

  if (changed.length === 0) {
    logger.debug({ file }, "Config already up to date");
    return { file, status: "unchanged", changed_keys: [] };
  }

  if (dryRun) {
    logger.info({ file, keys: changed }, "[DRY RUN] Would update config");
    return { file, status: "updated", changed_keys: changed };
  }

  const backupPath = `${file}.bak.${formatBackupStamp(options.now())}`;
  logger.info({ file, backup: backupPath }, "Backing up config");
  fileOps.copyFile(file, backupPath);

  fileOps.writeFileAtomic(file, content);
  logger.info({ file, keys: changed }, "Updated config");

  return { file, status: "updated", changed_keys: changed, backup_path: backupPath };
}
