/**
 * phpforge Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI and the catalog import from here, never from internal modules.
 */

// Orchestrator
export { Provisioner } from "./provisioner";
export type { ProvisionerOptions } from "./provisioner";

// All types
export type {
  // Identity
  InvokingIdentity,
  ProvisionContext,

  // Units & manifest
  UnitKind,
  InstallableUnit,
  RepositorySpec,
  AlternativesSpec,
  PhpSpec,
  ComposerSpec,
  ComposerGlobalCli,
  InstallerScriptCli,
  FrameworkCli,
  ProfilePathEntry,
  ProfileSpec,
  ProvisionManifest,

  // Outcomes & events
  StepOutcome,
  StepRecord,
  ProvisionReport,
  ProvisionEvent,
  ProvisionEventHandler,
} from "./types";

// Errors
export {
  ProvisionError,
  IdentityResolutionError,
  PrivilegeError,
  PackageManagerError,
  ProfileMutationError,
  DownloadError,
  IntegrityError,
  ManifestError,
  errorMessage,
} from "./errors";
export type { ErrorCategory } from "./errors";

// Identity & privilege boundary
export {
  resolveInvokingIdentity,
  systemIdentitySource,
  parsePasswdLine,
} from "./identity";
export type { IdentitySource, PasswdEntry } from "./identity";
export { CommandGateway, ELEVATED_PROGRAMS, requiresElevation } from "./gateway";
export type { CommandSpec, GatewayOptions } from "./gateway";
export { spawnRunner, LAUNCH_FAILURE_EXIT_CODE } from "./process-runner";
export type { ProcessRunner, SpawnRequest, CommandResult } from "./process-runner";

// Host access
export * from "./adapters";
export { nodeFileOps } from "./fs-ops";
export type { FileOps } from "./fs-ops";
export { HttpsDownloader } from "./downloader";
export type { Downloader, DownloadResult, HttpsDownloaderOptions } from "./downloader";
export { computeFileHash, parseChecksumFile, verifyChecksum } from "./verifier";
export {
  applyIniSettings,
  applyIniSettingsToContent,
  formatBackupStamp,
} from "./config-editor";
export type { IniEditResult, IniEditStatus } from "./config-editor";
export { ProfileMutator } from "./profile-mutator";
export type { ProfileBlock, BlockStatus } from "./profile-mutator";
export { SYSTEM_PATH, userSearchPath, findOnPath } from "./tool-lookup";

// Steps
export * from "./steps";

// Utilities
export { createLogger } from "./utils/logger";
export type { Logger, LoggerOptions } from "./utils/logger";
export {
  resolveVariables,
  validateVariables,
  renderTemplate,
} from "./utils/variables";
export type { VariableMap } from "./utils/variables";
