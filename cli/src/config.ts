/**
 * phpforge CLI — Configuration
 *
 * Where the manifest comes from and how the engine is set up for a run.
 * phpforge keeps no state between runs, so there is no data directory.
 */

import * as path from "path";
import { BUNDLED_MANIFEST_PATH } from "@phpforge/catalog";
import { LoggerOptions } from "@phpforge/engine";

/**
 * The manifest to provision from: --manifest when given, else the bundled one.
 */
export function resolveManifestPath(manifest?: string): string {
  return manifest ? path.resolve(manifest) : BUNDLED_MANIFEST_PATH;
}

/**
 * Engine log level. Engine logs stay silent unless asked for.
 */
export function engineLogLevel(
  verbose: boolean = false,
  debug: boolean = false,
): LoggerOptions["level"] {
  return verbose || debug ? "debug" : "silent";
}
