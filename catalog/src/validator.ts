/**
 * phpforge Catalog — Manifest Validator
 *
 * Validates provisioning manifests against the JSON Schema defined in schema.json.
 * Uses AJV for JSON Schema validation.
 *
 * Two levels of validation:
 * 1. Schema validation (structure, types, patterns) via AJV
 * 2. Semantic validation (rules JSON Schema can't express) via custom checks
 */

import Ajv, { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import * as fs from 'fs';
import * as path from 'path';
import type { ProvisionManifest } from '@phpforge/engine';
import { validateVariables } from '@phpforge/engine';

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  /** The typed manifest, present when valid */
  manifest?: ProvisionManifest;
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

// Load the JSON Schema
export const SCHEMA_PATH = path.join(__dirname, '..', 'schema.json');

let _validate: ValidateFunction<ProvisionManifest> | null = null;

function getValidator(): ValidateFunction<ProvisionManifest> {
  if (_validate) return _validate;

  const schemaContent = fs.readFileSync(SCHEMA_PATH, 'utf-8');
  const schema = JSON.parse(schemaContent);

  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);

  _validate = ajv.compile<ProvisionManifest>(schema);
  return _validate;
}

/**
 * Validate a parsed manifest against the JSON Schema + semantic rules.
 * Semantic rules only run once the structure is valid.
 */
export function validateManifest(data: unknown): ValidationResult {
  const validate = getValidator();

  if (!validate(data)) {
    const errors = (validate.errors ?? []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message || 'Unknown validation error',
      rule: `schema:${err.keyword}`,
    }));
    return { valid: false, errors };
  }

  const errors = validateSemanticRules(data);
  return errors.length === 0
    ? { valid: true, errors, manifest: data }
    : { valid: false, errors };
}

const VERSION_VARS = ['PHP_VERSION'];
const HOME_VARS = ['HOME'];

function checkVariables(
  errors: ValidationError[],
  pointer: string,
  value: string,
  known: string[],
): void {
  for (const message of validateVariables(value, known)) {
    errors.push({ path: pointer, message, rule: 'semantic:known-variables' });
  }
}

function checkHttps(errors: ValidationError[], pointer: string, url: string): void {
  if (!url.startsWith('https://')) {
    errors.push({
      path: pointer,
      message: `URL "${url}" must use HTTPS`,
      rule: 'semantic:https-only',
    });
  }
}

/**
 * Rules beyond what JSON Schema can express.
 */
function validateSemanticRules(manifest: ProvisionManifest): ValidationError[] {
  const errors: ValidationError[] = [];
  const { php, composer, frameworks, profile } = manifest;

  // Path templates may only reference the variables available where they are resolved
  checkVariables(errors, '/php/binary', php.binary, VERSION_VARS);
  php.ini_files.forEach((file, i) =>
    checkVariables(errors, `/php/ini_files/${i}`, file, VERSION_VARS),
  );
  checkVariables(errors, '/php/fpm_service', php.fpm_service, VERSION_VARS);
  checkVariables(errors, '/php/alternatives/link', php.alternatives.link, []);
  checkVariables(errors, '/composer/install_path', composer.install_path, []);
  manifest.repository.sources.forEach((source, i) =>
    checkVariables(errors, `/repository/sources/${i}`, source, []),
  );
  profile.path_entries.forEach((entry, i) =>
    checkVariables(errors, `/profile/path_entries/${i}/dir`, entry.dir, HOME_VARS),
  );

  // Downloads are HTTPS only
  checkHttps(errors, '/composer/download_url', composer.download_url);
  checkHttps(errors, '/composer/checksum_url', composer.checksum_url);

  const seen = new Set<string>();
  frameworks.forEach((cli, i) => {
    if (seen.has(cli.id)) {
      errors.push({
        path: `/frameworks/${i}/id`,
        message: `Duplicate framework id "${cli.id}"`,
        rule: 'semantic:unique-framework-ids',
      });
    }
    seen.add(cli.id);

    if (cli.method === 'installer-script') {
      checkHttps(errors, `/frameworks/${i}/installer_url`, cli.installer_url);
      checkVariables(errors, `/frameworks/${i}/install_dir`, cli.install_dir, HOME_VARS);
    }
  });

  // The profile must stay inside the user's home
  if (path.isAbsolute(profile.file) || profile.file.split('/').includes('..')) {
    errors.push({
      path: '/profile/file',
      message: `Profile "${profile.file}" must be a path relative to the home directory`,
      rule: 'semantic:profile-in-home',
    });
  }

  // A line without its own fragment would be appended again on every run
  profile.path_entries.forEach((entry, i) => {
    if (!entry.line.includes(entry.fragment)) {
      errors.push({
        path: `/profile/path_entries/${i}/line`,
        message: `Line does not contain its fragment "${entry.fragment}"`,
        rule: 'semantic:fragment-in-line',
      });
    }
  });

  return errors;
}
