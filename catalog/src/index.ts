/**
 * phpforge Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the manifest loader, validator, and unit listing.
 */

export { loadManifest, validateManifestFile, BUNDLED_MANIFEST_PATH } from './loader';
export { validateManifest, SCHEMA_PATH } from './validator';
export type { ValidationResult, ValidationError } from './validator';
export { installableUnits } from './units';
