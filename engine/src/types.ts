/**
 * phpforge Engine — Core Type Definitions
 *
 * Shared types for identity, installable units, the provisioning manifest,
 * step outcomes and engine events. The manifest types mirror
 * catalog/schema.json; if one changes, the other must follow.
 */

// ─── Identity & Context ──────────────────────────────────────────

export interface InvokingIdentity {
  username: string;
  uid: number;
  gid: number;
  /** Home directory from the user database, never from $HOME */
  home: string;
  /** Login shell from the user database */
  shell: string;
}

/**
 * Built once at startup and passed explicitly to every component.
 * Nothing below the CLI reads process.env or the effective uid directly.
 */
export interface ProvisionContext {
  readonly identity: InvokingIdentity;
  /** Whether the process holds root privileges */
  readonly elevated: boolean;
  /** Snapshot of the environment the process started with */
  readonly env: Readonly<Record<string, string | undefined>>;
}

// ─── Installable Units ───────────────────────────────────────────

export type UnitKind = "runtime" | "extension" | "package" | "cli_tool";

export interface InstallableUnit {
  name: string;
  version?: string;
  kind: UnitKind;
}

// ─── Provisioning Manifest ───────────────────────────────────────

export interface RepositorySpec {
  /** Argument for add-apt-repository, e.g. "ppa:ondrej/php" */
  id: string;
  /** Substring that proves the repository is already registered */
  marker: string;
  /** Source list files or directories to scan for the marker */
  sources: string[];
}

export interface AlternativesSpec {
  name: string;
  link: string;
}

export interface PhpSpec {
  versions: string[];
  extensions: string[];
  /** Binary path template, e.g. /usr/bin/php${PHP_VERSION} */
  binary: string;
  ini_files: string[];
  ini_settings: Record<string, string>;
  fpm_service: string;
  alternatives: AlternativesSpec;
}

export interface ComposerSpec {
  command: string;
  install_path: string;
  download_url: string;
  checksum_url: string;
}

export interface ComposerGlobalCli {
  id: string;
  command: string;
  method: "composer-global";
  package: string;
}

export interface InstallerScriptCli {
  id: string;
  command: string;
  method: "installer-script";
  installer_url: string;
  install_dir: string;
}

export type FrameworkCli = ComposerGlobalCli | InstallerScriptCli;

export interface ProfilePathEntry {
  /** Directory template, e.g. ${HOME}/.local/bin */
  dir: string;
  /** Substring whose presence means the entry is already configured */
  fragment: string;
  /** Literal line appended to the profile */
  line: string;
}

export interface ProfileSpec {
  /** Profile file relative to the invoking identity's home */
  file: string;
  marker: string;
  /** Definition that must be present after the helper block is written */
  verify: string;
  /** Absolute path to the helper template (resolved by the catalog loader) */
  template: string;
  path_entries: ProfilePathEntry[];
}

export interface ProvisionManifest {
  schema_version: string;
  repository: RepositorySpec;
  system_packages: string[];
  php: PhpSpec;
  composer: ComposerSpec;
  frameworks: FrameworkCli[];
  profile: ProfileSpec;
}

// ─── Step Records ────────────────────────────────────────────────

export type StepOutcome =
  | "success"
  | "skipped-already-present"
  | "failed-nonfatal"
  | "failed-fatal";

export interface StepRecord {
  name: string;
  outcome: StepOutcome;
  message?: string;
}

export interface ProvisionReport {
  run_id: string;
  records: StepRecord[];
  success: boolean;
  /** The error that aborted the run, if any */
  fatal_error?: Error;
  /** Records with outcome failed-nonfatal */
  warnings: StepRecord[];
  dry_run: boolean;
  started_at: string;
  finished_at: string;
}

// ─── Engine Events ───────────────────────────────────────────────

export type ProvisionEvent =
  | { type: "step_start"; timestamp: string; step: string }
  | { type: "step_record"; timestamp: string; record: StepRecord };

export type ProvisionEventHandler = (event: ProvisionEvent) => void;
