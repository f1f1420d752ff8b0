/**
 * phpforge Engine — Error Types
 *
 * Every failure the engine raises on purpose is a ProvisionError with a
 * category the CLI can turn into a label. Nothing here is retried.
 */

export type ErrorCategory =
  | "IDENTITY_ERROR"
  | "PERMISSION_ERROR"
  | "PACKAGE_MANAGER_ERROR"
  | "PROFILE_ERROR"
  | "NETWORK_ERROR"
  | "INTEGRITY_ERROR"
  | "VALIDATION_ERROR";

export class ProvisionError extends Error {
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ProvisionError";
    this.category = category;
    this.details = details;
  }
}

/** The invoking user or their home directory could not be determined. */
export class IdentityResolutionError extends ProvisionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("IDENTITY_ERROR", message, details);
    this.name = "IdentityResolutionError";
  }
}

/** An elevation-requiring program was invoked without elevation. */
export class PrivilegeError extends ProvisionError {
  readonly program: string;

  constructor(program: string, message?: string) {
    super(
      "PERMISSION_ERROR",
      message ??
        `Command '${program}' requires root privileges. Re-run with sudo.`,
      { program },
    );
    this.name = "PrivilegeError";
    this.program = program;
  }
}

export class PackageManagerError extends ProvisionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PACKAGE_MANAGER_ERROR", message, details);
    this.name = "PackageManagerError";
  }
}

/** The shell profile could not be updated; the profile has been restored. */
export class ProfileMutationError extends ProvisionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PROFILE_ERROR", message, details);
    this.name = "ProfileMutationError";
  }
}

export class DownloadError extends ProvisionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NETWORK_ERROR", message, details);
    this.name = "DownloadError";
  }
}

export class IntegrityError extends ProvisionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INTEGRITY_ERROR", message, details);
    this.name = "IntegrityError";
  }
}

export class ManifestError extends ProvisionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ManifestError";
  }
}

/**
 * Extract a human-readable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
