/**
 * phpforge CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module. Engine logs are a
 * separate stream (pino, stderr) and only appear with --verbose.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type { StepOutcome } from "@phpforge/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  skip: chalk.gray("\u25CB"), // ○
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

export function printDryRun(msg: string): void {
  console.log(colors.warn("[DRY RUN] ") + msg);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printStageWarn(msg: string): void {
  console.log(`  ${symbols.warn}  ${msg}`);
}

/**
 * Print a bold header line, e.g.  "Provisioning PHP for alice"
 */
export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Step Outcomes ──────────────────────────────────────────

const OUTCOME_SYMBOLS: Record<StepOutcome, string> = {
  success: symbols.success,
  "skipped-already-present": symbols.skip,
  "failed-nonfatal": symbols.warn,
  "failed-fatal": symbols.error,
};

export function outcomeSymbol(outcome: StepOutcome): string {
  return OUTCOME_SYMBOLS[outcome];
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

export interface TableOptions {
  head: string[];
  rows: string[][];
  colWidths?: number[];
}

export function printTable({ head, rows, colWidths }: TableOptions): void {
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ["gray"] },
    wordWrap: false,
    ...(colWidths ? { colWidths } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  IDENTITY_ERROR: "Could not determine the invoking user",
  PERMISSION_ERROR: "Insufficient permissions",
  PACKAGE_MANAGER_ERROR: "Package installation failed",
  PROFILE_ERROR: "Shell profile update failed",
  NETWORK_ERROR: "Network or download failure",
  INTEGRITY_ERROR: "File integrity check failed",
  VALIDATION_ERROR: "Invalid manifest or configuration",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
